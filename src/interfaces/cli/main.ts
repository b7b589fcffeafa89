#!/usr/bin/env tsx

import 'reflect-metadata';

// Load environment variables from .env file
import dotenv from 'dotenv';
dotenv.config();

import { hideBin } from 'yargs/helpers';
import { runCli } from './run';

process.exitCode = await runCli({
  argv: hideBin(process.argv),
  env: process.env,
});
