import mongoose from 'mongoose';

const MONGO_URL = process.env.MONGO_URL || 'mongodb://localhost:27017';
const MONGO_DB = process.env.MONGO_DB || 'order_book';

// The database comes from `dbName`, so MONGO_URL may carry its own path or query options.
export async function connectMongo(url: string = MONGO_URL, dbName: string = MONGO_DB) {
  if (mongoose.connection.readyState === 1) return mongoose.connection;
  await mongoose.connect(url, { dbName });
  console.log(`[Mongo] Connected to database ${dbName}`);
  return mongoose.connection;
}

export async function disconnectMongo() {
  if (mongoose.connection.readyState !== 0) {
    await mongoose.disconnect();
  }
}
