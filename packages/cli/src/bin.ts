#!/usr/bin/env -S node --import tsx
import { createProgram } from './tombcheck.js';

const program = createProgram();
program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
