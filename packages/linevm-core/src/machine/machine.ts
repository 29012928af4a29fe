/**
 * Execution engine
 *
 * A machine is built from raw program lines. Construction runs both
 * preprocessing passes (label resolution, then mnemonic expansion), so a
 * program with invalid structure never executes a single instruction.
 *
 * The loop, per line:
 *   1. blank and comment lines are skipped
 *   2. operands are staged into r0, r1, ...
 *   3. the opcode runs
 *   4. a non-zero jump register moves the instruction pointer there and is
 *      cleared; otherwise the pointer advances by one
 * The machine halts once the pointer runs past the last line.
 */

import { Cell } from './cell.js';
import { OperandStack, STACK_CAPACITY, type StackFault } from './stack.js';
import { Register, RegisterFile } from './registers.js';
import { decodeInstruction, executeOpcode, type Instruction } from './opcodes.js';
import { consoleOutput, type MachineOutput } from '../output.js';
import { ProgramValidityError, RegisterAddressError } from '../errors.js';
import { resolveLabels } from '../preprocess/labels.js';
import { expandMnemonics } from '../preprocess/mnemonics.js';

export interface MachineOptions {
  /** Where prt, dmp, stack faults and the trace are written (default: console) */
  output?: MachineOutput;

  /** Write every executed line to the warn channel */
  trace?: boolean;

  stackCapacity?: number;
}

export interface RunOptions {
  /** Stop after this many executed instructions, even if not halted */
  maxSteps?: number;
}

export interface RunResult {
  /** Instructions executed by this call */
  steps: number;
  halted: boolean;
}

export interface PreprocessedProgram {
  lines: string[];
  labels: Map<string, number>;
}

/**
 * Run both preprocessing passes over raw program lines
 */
export function preprocess(source: readonly string[]): PreprocessedProgram {
  const resolved = resolveLabels(source);
  return {
    lines: expandMnemonics(resolved.lines),
    labels: resolved.labels,
  };
}

function describeFault(fault: StackFault): string {
  switch (fault.kind) {
    case 'overflow':
      return `STACK OVERFLOW, tried to push ${fault.value}`;
    case 'underflow':
      return 'STACK UNDERFLOW, tried to pop';
  }
}

export class Machine {
  readonly registers = new RegisterFile();

  readonly stack: OperandStack;

  /** Preprocessed program text */
  readonly program: readonly string[];

  /** Label table built during preprocessing */
  readonly labels: ReadonlyMap<string, number>;

  private readonly output: MachineOutput;
  private readonly trace: boolean;

  /** Instruction pointer - index of the next line to run */
  private pointer: number = 0;

  /** Instructions executed since construction */
  private executed: number = 0;

  constructor(source: readonly string[], options: MachineOptions = {}) {
    this.output = options.output ?? consoleOutput;
    this.trace = options.trace ?? false;
    this.stack = new OperandStack(options.stackCapacity ?? STACK_CAPACITY, (fault) =>
      this.output.warn(describeFault(fault))
    );

    const { lines, labels } = preprocess(source);
    this.program = lines;
    this.labels = labels;
  }

  get ip(): number {
    return this.pointer;
  }

  get halted(): boolean {
    return this.pointer >= this.program.length;
  }

  get steps(): number {
    return this.executed;
  }

  /**
   * Preprocessed program as `<index>: <line>` lines
   */
  listing(): string[] {
    return this.program.map((line, index) => `${index}: ${line}`);
  }

  /**
   * Advance to and execute the next instruction. Returns false once halted.
   */
  step(): boolean {
    while (!this.halted) {
      const line = this.pointer;
      const instruction = decodeInstruction(this.program[line], line);
      if (!instruction) {
        this.pointer++;
        continue;
      }

      if (this.trace) {
        this.output.warn(`[Machine] ${line}: ${this.program[line]}`);
      }
      this.execute(instruction, line);
      this.executed++;
      this.pointer = this.nextPointer(line);
      return !this.halted;
    }
    return false;
  }

  /**
   * Run until the program halts, or until maxSteps instructions have run
   */
  run(options: RunOptions = {}): RunResult {
    const limit = options.maxSteps ?? Infinity;
    let steps = 0;
    while (!this.halted && steps < limit) {
      const before = this.executed;
      this.step();
      steps += this.executed - before;
    }
    return { steps, halted: this.halted };
  }

  private execute(instruction: Instruction, line: number): void {
    instruction.operands.forEach((value, index) => {
      this.registers.set(index, Cell.fromInt(value));
    });

    try {
      executeOpcode(instruction.opcode, {
        registers: this.registers,
        stack: this.stack,
        output: this.output,
      });
    } catch (error) {
      if (error instanceof RegisterAddressError && error.line === undefined) {
        throw new RegisterAddressError(error.address, line);
      }
      throw error;
    }
  }

  private nextPointer(line: number): number {
    const target = this.registers.int(Register.jmp);
    if (target === 0) {
      return line + 1;
    }

    this.registers.set(Register.jmp, Cell.ZERO);
    if (target < 0) {
      throw new ProgramValidityError(`Jump target ${target} is before the start of the program`, line);
    }
    return target;
  }
}
