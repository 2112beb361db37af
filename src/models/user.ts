import { Schema, model } from 'mongoose';

export type UserRole = 'staff' | 'customer';

export interface IUser {
  username: string;
  passwordHash: string;
  role: UserRole;
  // Customer Name values this login may see; must match the order book spelling
  customerNames: string[];
  isActive: boolean;
  lastLoginAt?: Date;
}

const UserSchema = new Schema<IUser>({
  username: { type: String, required: true, unique: true, index: true },
  passwordHash: { type: String, required: true },
  role: { type: String, enum: ['staff', 'customer'], default: 'customer' },
  customerNames: [{ type: String }],
  isActive: { type: Boolean, default: true },
  lastLoginAt: { type: Date },
}, { timestamps: true });

export const UserModel = model<IUser>('User', UserSchema);
