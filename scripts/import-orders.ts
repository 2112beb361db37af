import 'dotenv/config';
import path from 'path';
import fs from 'fs';
import { connectMongo, disconnectMongo } from '../src/mongo/connection';
import { normalize } from '../src/services/normalizer';
import { MongoOrderStore } from '../src/services/orderStore';
import { readSpreadsheet } from '../src/services/spreadsheet';
import { SchemaError } from '../src/utils/errors';

// Usage: npm run import:orders -- <file.xlsx|file.csv>
async function main() {
  const arg = process.argv[2];
  if (!arg) {
    console.error('Usage: import-orders <file.xlsx|file.xls|file.csv>');
    process.exit(1);
  }
  const inputFile = path.resolve(arg);
  if (!fs.existsSync(inputFile)) {
    console.error(`Source file not found: ${inputFile}`);
    process.exit(1);
  }

  const raw = readSpreadsheet(fs.readFileSync(inputFile), path.basename(inputFile));
  const table = normalize(raw);

  await connectMongo();
  const snapshot = await new MongoOrderStore().replace(table, path.basename(inputFile));
  await disconnectMongo();
  console.log(`Imported ${table.rows.length} of ${raw.rows.length} rows from ${path.basename(inputFile)} (v${snapshot.version})`);
}

main().catch(async (err) => {
  if (err instanceof SchemaError) {
    console.error(err.message);
    console.error('Found columns:', err.found.join(', ') || '(none)');
  } else {
    console.error('Import failed:', err);
  }
  await disconnectMongo().catch((e) => console.error('Disconnect failed:', e));
  process.exit(1);
});
