/**
 * Must be imported first so .env is applied before config.ts reads process.env.
 */
import dotenv from 'dotenv';
import path from 'path';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });
