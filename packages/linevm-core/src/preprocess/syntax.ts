/**
 * Line syntax shared by the preprocessing passes and the execution engine
 *
 *   # comment
 *   :label
 *   mnemonic op1,op2,...
 */

export const COMMENT_MARKER = '#';
export const LABEL_MARKER = ':';

export interface InstructionText {
  mnemonic: string;
  operands: string[];
}

/**
 * True for lines that produce no instruction
 */
export function isSkipped(line: string): boolean {
  const trimmed = line.trim();
  return trimmed === '' || trimmed.startsWith(COMMENT_MARKER);
}

/**
 * Split an instruction line into mnemonic and operand strings.
 * Returns null for blank and comment lines.
 */
export function splitInstruction(line: string): InstructionText | null {
  if (isSkipped(line)) {
    return null;
  }

  const trimmed = line.trim();
  const separator = trimmed.search(/\s/);
  if (separator === -1) {
    return { mnemonic: trimmed, operands: [] };
  }

  const mnemonic = trimmed.substring(0, separator);
  const operands = trimmed.substring(separator + 1).replace(/\s+/g, '').split(',');
  return { mnemonic, operands };
}

/**
 * Render an instruction back to program text
 */
export function formatInstruction(mnemonic: string, operands: readonly string[]): string {
  return operands.length === 0 ? mnemonic : `${mnemonic} ${operands.join(', ')}`;
}
