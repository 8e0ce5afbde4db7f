#!/usr/bin/env node
import dotenv from 'dotenv';
import { main } from './cli.js';

dotenv.config();

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
