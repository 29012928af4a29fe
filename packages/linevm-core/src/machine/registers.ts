import { Cell } from './cell.js';
import { RegisterAddressError } from '../errors.js';

/**
 * Register names. Roles are conventions only: arg0-arg3 are overwritten with
 * the operands of every instruction, jmp redirects the instruction pointer
 * when non-zero, loop is the customary loop counter.
 */
export enum Register {
  arg0,
  arg1,
  arg2,
  arg3,
  reg4,
  reg5,
  reg6,
  jmp,
  loop,
  reg9,
  regA,
  regB,
  regC,
  regD,
  regE,
  regF,
}

export const REGISTER_COUNT = 16;

/** Number of leading registers that receive instruction operands */
export const ARGUMENT_REGISTERS = 4;

export class RegisterFile {
  private readonly cells: Cell[] = new Array<Cell>(REGISTER_COUNT).fill(Cell.ZERO);

  get(address: number): Cell {
    return this.cells[this.check(address)];
  }

  set(address: number, value: Cell): void {
    this.cells[this.check(address)] = value;
  }

  /**
   * Integer view of a register
   */
  int(address: number): number {
    return this.get(address).int;
  }

  setInt(address: number, value: number): void {
    this.set(address, Cell.fromInt(value));
  }

  /**
   * Registers in address order, paired with their names
   */
  snapshot(): Array<{ name: string; value: Cell }> {
    return this.cells.map((value, address) => ({ name: Register[address], value }));
  }

  private check(address: number): number {
    if (!Number.isInteger(address) || address < 0 || address >= REGISTER_COUNT) {
      throw new RegisterAddressError(address);
    }
    return address;
  }
}
