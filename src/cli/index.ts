#!/usr/bin/env node

import { createProgram } from "./program.js";

createProgram()
  .parseAsync()
  .catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
