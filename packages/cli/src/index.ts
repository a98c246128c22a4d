#!/usr/bin/env -S node --import tsx
import { createProgram } from "./program.js";

const program = createProgram({
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  setExitCode: (code) => {
    process.exitCode = code;
  },
  env: process.env,
});

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
