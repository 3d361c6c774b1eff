import { config } from 'dotenv';
import { run } from './cli';

config();

run(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error('❌ Fatal error:', error);
    process.exit(1);
  }
);
