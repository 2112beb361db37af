import 'dotenv/config';
import { createApp } from './app';
import { connectMongo } from './mongo/connection';
import { MongoOrderStore } from './services/orderStore';

const PORT = Number(process.env.PORT || 5001);

async function main() {
  await connectMongo();

  const app = createApp(new MongoOrderStore());
  app.listen(PORT, () => {
    console.log(`Server running on http://localhost:${PORT}`);
  });
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
