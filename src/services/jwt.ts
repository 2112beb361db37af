import jwt from 'jsonwebtoken';
import type { UserRole } from '../models/user';

const JWT_SECRET = process.env.JWT_SECRET || 'dev-secret';
const DEFAULT_EXPIRY_SECONDS = Number(process.env.JWT_EXPIRES_IN_SECONDS) || 8 * 60 * 60;

export interface JwtPayload {
  userId: string;
  username: string;
  role: UserRole;
  customerNames: string[];
}

function isRole(value: unknown): value is UserRole {
  return value === 'staff' || value === 'customer';
}

function toPayload(decoded: string | jwt.JwtPayload): JwtPayload {
  if (typeof decoded === 'string') throw new Error('Unexpected token payload');
  const { userId, username, role, customerNames } = decoded;
  if (typeof userId !== 'string' || typeof username !== 'string' || !isRole(role)) {
    throw new Error('Malformed token payload');
  }
  const names = Array.isArray(customerNames) ? customerNames.filter((n): n is string => typeof n === 'string') : [];
  return { userId, username, role, customerNames: names };
}

export const jwtService = {
  signAccess(payload: JwtPayload, expiresIn: number = DEFAULT_EXPIRY_SECONDS) {
    return jwt.sign(payload, JWT_SECRET, { expiresIn });
  },
  verifyAccess(token: string): JwtPayload {
    return toPayload(jwt.verify(token, JWT_SECRET));
  },
};
