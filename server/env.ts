/**
 * Environment loader - must be imported FIRST before any modules that use env vars
 */
import { config } from 'dotenv';

// .env.local takes precedence over .env (dotenv never overrides a set variable)
config({ path: '.env.local', debug: process.env.DEBUG === 'true' });
config({ path: '.env', debug: process.env.DEBUG === 'true' });

export const env = process.env;
