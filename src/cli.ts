#!/usr/bin/env node
import dotenv from 'dotenv';
import { createProgram } from './main';
import { createLogger } from './logger';
import { errorMessage } from './errors';

dotenv.config();

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    createLogger('error').fatal({ err: error }, errorMessage(error));
    process.exitCode = 1;
  });
