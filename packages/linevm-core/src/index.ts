/**
 * linevm core - a line-oriented stack and register machine
 *
 * - Numeric cells (int32 / float32 views over one 4-byte store)
 * - Operand stack and register file
 * - Preprocessing: label resolution, `mov` expansion
 * - Execution engine
 */

export { Cell } from './machine/cell.js';
export { OperandStack, STACK_CAPACITY, type StackFault, type StackFaultListener } from './machine/stack.js';
export { Register, RegisterFile, REGISTER_COUNT, ARGUMENT_REGISTERS } from './machine/registers.js';
export {
  OPCODES,
  isOpcode,
  decodeInstruction,
  executeOpcode,
  parseOperand,
  type Opcode,
  type Instruction,
  type ExecutionContext,
} from './machine/opcodes.js';
export {
  Machine,
  preprocess,
  type MachineOptions,
  type RunOptions,
  type RunResult,
  type PreprocessedProgram,
} from './machine/machine.js';
export { resolveLabels, type ResolvedProgram } from './preprocess/labels.js';
export { expandMnemonics, expandMov, PSEUDO_MOV } from './preprocess/mnemonics.js';
export { splitInstruction, formatInstruction, isSkipped, COMMENT_MARKER, LABEL_MARKER, type InstructionText } from './preprocess/syntax.js';
export { consoleOutput, BufferedOutput, type MachineOutput } from './output.js';
export { MachineError, ProgramValidityError, RegisterAddressError } from './errors.js';
