#!/usr/bin/env node

import { createProgram } from './cli/program.js';
import { handleCommandError } from './cli/command-error-handler.js';

try {
  await createProgram().parseAsync(process.argv);
  process.exit(0);
} catch (err) {
  handleCommandError(err);
}
