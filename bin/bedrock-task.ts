#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { runCli } from '../src/cli';
import { getErrorMessage } from '../src/common/utils';

// Load environment variables from .env file
dotenv.config();

runCli(process.argv.slice(2))
  .then(exitCode => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error(`Error: ${getErrorMessage(error)}`);
    process.exitCode = 1;
  });
