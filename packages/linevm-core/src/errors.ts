/**
 * Machine errors
 *
 * Everything thrown by the preprocessing passes and the execution engine is a
 * MachineError. Stack exhaustion is not an error: it is reported through the
 * machine output and execution continues.
 */

export class MachineError extends Error {
  constructor(message: string, public readonly line?: number) {
    super(line === undefined ? message : `Line ${line}: ${message}`);
    this.name = 'MachineError';
  }
}

/**
 * The program text cannot be run: duplicate labels, a malformed `mov`,
 * an unknown mnemonic or an operand that is not a 32-bit integer.
 */
export class ProgramValidityError extends MachineError {
  constructor(message: string, line?: number) {
    super(message, line);
    this.name = 'ProgramValidityError';
  }
}

/**
 * An instruction addressed a register outside 0-15.
 */
export class RegisterAddressError extends MachineError {
  constructor(public readonly address: number, line?: number) {
    super(`Register address ${address} out of range (0-15)`, line);
    this.name = 'RegisterAddressError';
  }
}
