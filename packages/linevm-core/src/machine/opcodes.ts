/**
 * Instruction set
 *
 * Every concrete mnemonic the engine understands. `mov` is absent on purpose:
 * it only exists before mnemonic expansion.
 */

import { Cell } from './cell.js';
import type { OperandStack } from './stack.js';
import { ARGUMENT_REGISTERS, Register, type RegisterFile } from './registers.js';
import type { MachineOutput } from '../output.js';
import { ProgramValidityError } from '../errors.js';
import { splitInstruction } from '../preprocess/syntax.js';

export const OPCODES = [
  'push',
  'pop',
  'dmp',
  'prt',
  'add',
  'sub',
  'mul',
  'set',
  'dec',
  'inc',
  'swp',
  'mov_r2s',
  'mov_s2r',
  'mov_r2r',
  'jmp',
  'jz',
  'jnz',
  'je',
  'jne',
  'shr',
  'shl',
  'not',
  'stb',
  'clr',
] as const;

export type Opcode = (typeof OPCODES)[number];

const OPCODE_SET: ReadonlySet<string> = new Set(OPCODES);

export function isOpcode(mnemonic: string): mnemonic is Opcode {
  return OPCODE_SET.has(mnemonic);
}

export interface Instruction {
  opcode: Opcode;
  operands: number[];
}

const INT_LITERAL = /^[+-]?\d+$/;
const INT32_MIN = -0x80000000;
const INT32_MAX = 0x7fffffff;

export function parseOperand(text: string, line: number): number {
  if (!INT_LITERAL.test(text)) {
    throw new ProgramValidityError(`Operand '${text}' is not an integer`, line);
  }
  const value = Number(text);
  if (value < INT32_MIN || value > INT32_MAX) {
    throw new ProgramValidityError(`Operand ${text} does not fit in 32 bits`, line);
  }
  return value;
}

/**
 * Decode one preprocessed line. Returns null for blank and comment lines.
 */
export function decodeInstruction(text: string, line: number): Instruction | null {
  const parts = splitInstruction(text);
  if (!parts) {
    return null;
  }
  if (!isOpcode(parts.mnemonic)) {
    throw new ProgramValidityError(`Unknown instruction '${parts.mnemonic}'`, line);
  }
  if (parts.operands.length > ARGUMENT_REGISTERS) {
    throw new ProgramValidityError(
      `${parts.mnemonic} has ${parts.operands.length} operands, at most ${ARGUMENT_REGISTERS} are allowed`,
      line
    );
  }
  return {
    opcode: parts.mnemonic,
    operands: parts.operands.map((operand) => parseOperand(operand, line)),
  };
}

/**
 * State an opcode may touch
 */
export interface ExecutionContext {
  registers: RegisterFile;
  stack: OperandStack;
  output: MachineOutput;
}

function assertNever(opcode: never): never {
  throw new Error(`Unhandled opcode: ${String(opcode)}`);
}

/**
 * Pop two operands: a (the old top) into r0, b into r1
 */
function popPair(ctx: ExecutionContext): [number, number] {
  const { registers, stack } = ctx;
  registers.set(Register.arg0, stack.pop());
  registers.set(Register.arg1, stack.pop());
  return [registers.int(Register.arg0), registers.int(Register.arg1)];
}

/**
 * Replace the register addressed by r0 with f(its value, r1)
 */
function updateTarget(ctx: ExecutionContext, f: (value: number, operand: number) => number): void {
  const { registers } = ctx;
  const target = registers.int(Register.arg0);
  registers.setInt(target, f(registers.int(target), registers.int(Register.arg1)));
}

function jumpIf(ctx: ExecutionContext, condition: boolean): void {
  if (condition) {
    ctx.registers.set(Register.jmp, ctx.registers.get(Register.arg0));
  }
}

function dump(ctx: ExecutionContext): void {
  const { stack, registers, output } = ctx;
  output.print(`STACKPTR: ${stack.top}`);
  output.print('DUMP:');
  output.print(stack.snapshot().map(String).join(' '));
  output.print('REGISTERS:');
  for (const { name, value } of registers.snapshot()) {
    output.print(`${name}: ${value}`);
  }
}

/**
 * Run one opcode against the machine state. Operands have already been
 * staged into r0..r3.
 */
export function executeOpcode(opcode: Opcode, ctx: ExecutionContext): void {
  const { registers, stack } = ctx;

  switch (opcode) {
    case 'push':
      stack.push(registers.get(Register.arg0));
      return;

    case 'pop':
      stack.pop();
      return;

    case 'dmp':
      dump(ctx);
      return;

    case 'prt':
      ctx.output.print(String(stack.peekBottom()));
      return;

    case 'add': {
      const [a, b] = popPair(ctx);
      stack.push(Cell.fromInt(a + b));
      return;
    }

    case 'sub': {
      const [a, b] = popPair(ctx);
      stack.push(Cell.fromInt(a - b));
      return;
    }

    case 'mul': {
      const [a, b] = popPair(ctx);
      stack.push(Cell.fromInt(Math.imul(a, b)));
      return;
    }

    case 'set':
      registers.set(registers.int(Register.arg0), registers.get(Register.arg1));
      return;

    case 'dec':
      updateTarget(ctx, (value) => value - 1);
      return;

    case 'inc':
      updateTarget(ctx, (value) => value + 1);
      return;

    case 'swp':
      popPair(ctx);
      stack.push(registers.get(Register.arg0));
      stack.push(registers.get(Register.arg1));
      return;

    case 'mov_r2s':
      stack.push(registers.get(registers.int(Register.arg0)));
      return;

    case 'mov_s2r':
      registers.set(Register.arg1, stack.peekBottom());
      registers.set(registers.int(Register.arg0), registers.get(Register.arg1));
      return;

    case 'mov_r2r':
      registers.set(registers.int(Register.arg1), registers.get(registers.int(Register.arg0)));
      return;

    case 'jmp':
      jumpIf(ctx, true);
      return;

    case 'jz':
      registers.set(Register.arg1, stack.peekBottom());
      jumpIf(ctx, registers.int(Register.arg1) === 0);
      return;

    case 'jnz':
      registers.set(Register.arg1, stack.peekBottom());
      jumpIf(ctx, registers.int(Register.arg1) !== 0);
      return;

    case 'je':
      registers.set(Register.arg2, stack.peekBottom());
      jumpIf(ctx, registers.get(Register.arg1).equals(registers.get(Register.arg2)));
      return;

    case 'jne':
      registers.set(Register.arg2, stack.peekBottom());
      jumpIf(ctx, !registers.get(Register.arg1).equals(registers.get(Register.arg2)));
      return;

    case 'shr':
      updateTarget(ctx, (value, count) => value >> count);
      return;

    case 'shl':
      updateTarget(ctx, (value, count) => value << count);
      return;

    case 'not':
      updateTarget(ctx, (value, bit) => value ^ (1 << bit));
      return;

    case 'stb':
      updateTarget(ctx, (value, bit) => value | (1 << bit));
      return;

    case 'clr':
      updateTarget(ctx, (value, bit) => value & ~(1 << bit));
      return;

    default:
      assertNever(opcode);
  }
}
