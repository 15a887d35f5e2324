#!/usr/bin/env node

import { runLd2Dot } from './commands.js';

runLd2Dot(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
