import 'dotenv/config';
import { connectMongo, disconnectMongo } from '../src/mongo/connection';
import { UserModel, type UserRole } from '../src/models/user';
import { password } from '../src/utils/password';

interface SeedUser {
  username: string;
  plainPassword: string;
  role: UserRole;
  customerNames: string[];
}

function splitNames(value: string) {
  return value.split(',').map((s) => s.trim()).filter(Boolean);
}

async function upsertUser(seed: SeedUser) {
  const passwordHash = await password.hash(seed.plainPassword);
  const existing = await UserModel.findOne({ username: seed.username });
  if (!existing) {
    const user = await UserModel.create({
      username: seed.username,
      passwordHash,
      role: seed.role,
      customerNames: seed.customerNames,
      isActive: true,
    });
    console.log('Created user:', user.username, user.role, user._id.toString());
    return;
  }
  await UserModel.updateOne(
    { _id: existing._id },
    { $set: { passwordHash, role: seed.role, customerNames: seed.customerNames, isActive: true } },
  );
  console.log('Updated user:', existing.username, seed.role, existing._id.toString());
}

async function main() {
  await connectMongo();

  await upsertUser({
    username: process.env.SEED_STAFF_USERNAME || 'staff',
    plainPassword: process.env.SEED_STAFF_PASSWORD || 'password123',
    role: 'staff',
    customerNames: [],
  });
  await upsertUser({
    username: process.env.SEED_CUSTOMER_USERNAME || 'customer',
    plainPassword: process.env.SEED_CUSTOMER_PASSWORD || 'password123',
    role: 'customer',
    customerNames: splitNames(process.env.SEED_CUSTOMER_NAMES || 'Acme Corp'),
  });

  await disconnectMongo();
  console.log('Seed complete.');
}

main().catch(async (err) => {
  console.error('Seed failed:', err);
  await disconnectMongo().catch((e) => console.error('Disconnect failed:', e));
  process.exit(1);
});
