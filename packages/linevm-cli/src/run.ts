/**
 * Program file runner behind the `linevm` command
 */

import * as fs from 'fs';
import * as path from 'path';
import { Machine, consoleOutput, type MachineOutput } from 'linevm-core';

export const DEFAULT_PROGRAM = 'code.txt';

export interface RunFileOptions {
  /** Print the preprocessed program before running */
  listing?: boolean;
  trace?: boolean;
  maxSteps?: number;

  /** Directory the program path is resolved against (default: process.cwd()) */
  cwd?: string;

  /** DEBUG prints stack traces, DEBUG_VM enables the trace (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Load and run a program file. Returns the process exit status.
 */
export function runProgramFile(
  programFile: string = DEFAULT_PROGRAM,
  options: RunFileOptions = {},
  output: MachineOutput = consoleOutput
): number {
  const env = options.env ?? process.env;

  try {
    const programPath = path.resolve(options.cwd ?? process.cwd(), programFile);
    if (!fs.existsSync(programPath)) {
      output.warn(`Error: Program file not found: ${programFile}`);
      return 1;
    }

    const source = fs.readFileSync(programPath, 'utf-8').split(/\r?\n/);
    const machine = new Machine(source, {
      output,
      trace: Boolean(options.trace) || Boolean(env.DEBUG_VM),
    });

    if (options.listing) {
      for (const line of machine.listing()) {
        output.print(line);
      }
    }

    const result = machine.run({ maxSteps: options.maxSteps });
    if (!result.halted) {
      output.warn(`Error: Step limit reached after ${result.steps} instructions (line ${machine.ip})`);
      return 1;
    }
    return 0;
  } catch (error) {
    if (!(error instanceof Error)) {
      throw error;
    }
    output.warn(`Error: ${error.message}`);
    if (env.DEBUG && error.stack) {
      output.warn(error.stack);
    }
    return 1;
  }
}
