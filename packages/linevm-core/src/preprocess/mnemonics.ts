/**
 * Pseudo-instruction expansion
 *
 * `mov` is the only pseudo-instruction. Its operand shape picks the concrete
 * opcode:
 *
 *   mov a, b   ->  mov_r2r a, b   (register to register)
 *   mov [a]    ->  mov_s2r a      (stack to register)
 *   mov a      ->  mov_r2s a      (register to stack)
 *
 * `move` is accepted as a spelling of `mov`.
 */

import { ProgramValidityError } from '../errors.js';
import { formatInstruction, splitInstruction } from './syntax.js';

export const PSEUDO_MOV: ReadonlySet<string> = new Set(['mov', 'move']);

function isStackOperand(operand: string): boolean {
  return operand.startsWith('[');
}

function stripStackOperand(operand: string, line: number): string {
  if (!operand.endsWith(']') || operand.length < 3) {
    throw new ProgramValidityError(`Malformed stack operand ${operand}`, line);
  }
  return operand.slice(1, -1);
}

/**
 * Rewrite a single `mov` operand list into its concrete instruction text
 */
export function expandMov(operands: readonly string[], line: number): string {
  if (operands.length === 2) {
    if (operands.some(isStackOperand)) {
      throw new ProgramValidityError(
        `mov with two operands takes registers only, got ${operands.join(', ')}`,
        line
      );
    }
    return formatInstruction('mov_r2r', operands);
  }

  if (operands.length === 1) {
    const [operand] = operands;
    return isStackOperand(operand)
      ? formatInstruction('mov_s2r', [stripStackOperand(operand, line)])
      : formatInstruction('mov_r2s', [operand]);
  }

  throw new ProgramValidityError(`mov takes one or two operands, got ${operands.length}`, line);
}

export function expandMnemonics(source: readonly string[]): string[] {
  return source.map((line, index) => {
    const instruction = splitInstruction(line);
    if (!instruction || !PSEUDO_MOV.has(instruction.mnemonic)) {
      return line;
    }
    return expandMov(instruction.operands, index);
  });
}
