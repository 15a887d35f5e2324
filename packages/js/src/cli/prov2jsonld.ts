#!/usr/bin/env node

import { runProv2JsonLd } from './commands.js';

runProv2JsonLd(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
