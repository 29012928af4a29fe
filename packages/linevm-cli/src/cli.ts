#!/usr/bin/env node
/**
 * linevm CLI - run a program file on the machine
 *
 *   linevm [program]           run program (default: code.txt)
 *   linevm --listing program   print the preprocessed program first
 */

import { Command, InvalidArgumentError } from 'commander';
import { DEFAULT_PROGRAM, runProgramFile } from './run.js';

interface CliOptions {
  listing: boolean;
  trace: boolean;
  maxSteps?: number;
}

function parseStepLimit(value: string): number {
  const steps = Number(value);
  if (!Number.isInteger(steps) || steps <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return steps;
}

const program = new Command();

program
  .name('linevm')
  .description('Run a line-oriented stack machine program')
  .version('0.1.0')
  .option('-l, --listing', 'Print the preprocessed program before running', false)
  .option('--trace', 'Trace every executed line on stderr', false)
  .option('-n, --max-steps <count>', 'Stop after this many instructions', parseStepLimit)
  .argument('[program]', 'Program file', DEFAULT_PROGRAM)
  .action((programFile: string, options: CliOptions) => {
    process.exit(runProgramFile(programFile, options));
  });

program.parse();
