#!/usr/bin/env node
import { createProgram, handleCliError } from './program';
import type { GlobalOptions } from './options';

const program = createProgram();

async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (e) {
    process.exit(handleCliError(e, program.opts<GlobalOptions>()));
  }
}

void main();
