#!/usr/bin/env node
import dotenv from 'dotenv';
import { runCli } from '../src/cli';

// Load environment variables from .env file (only needed for local development)
if (process.env.TRADEX_ENV !== 'production') {
  dotenv.config({ path: '.env.development.local' });
}

runCli()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
