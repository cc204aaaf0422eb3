#!/usr/bin/env node
import 'dotenv/config';
import { createProgram } from './cli';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
