#!/usr/bin/env node
import { handleError } from '../utils/errors.js';
import { createProgram } from './program.js';
import { runRetrieval } from './run.js';

async function run(): Promise<void> {
  const program = createProgram(async (options) => {
    await runRetrieval(options);
  });
  await program.parseAsync(process.argv);
}

run().then(
  () => process.exit(0),
  (error: unknown) => handleError(error)
);
