/**
 * Output sink for everything the machine prints: `prt` and `dmp` results,
 * the code listing, stack faults and the instruction trace.
 */
export interface MachineOutput {
  /** Program output (stdout in the CLI) */
  print(text: string): void;

  /** Diagnostics (stderr in the CLI) */
  warn(text: string): void;
}

export const consoleOutput: MachineOutput = {
  print: (text) => console.log(text),
  warn: (text) => console.error(text),
};

/**
 * Output that keeps every line in memory
 */
export class BufferedOutput implements MachineOutput {
  readonly printed: string[] = [];
  readonly warnings: string[] = [];

  print(text: string): void {
    this.printed.push(text);
  }

  warn(text: string): void {
    this.warnings.push(text);
  }
}
