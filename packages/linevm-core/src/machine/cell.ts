/**
 * Numeric cell - the machine's 32-bit value
 *
 * One 4-byte store read either as a signed integer or as an IEEE-754 single.
 * Building a cell from one view leaves the other as the reinterpreted bits;
 * nothing is ever converted between the two.
 */
export class Cell {
  static readonly ZERO = Cell.fromInt(0);

  private readonly bits: DataView;

  private constructor() {
    this.bits = new DataView(new ArrayBuffer(4));
  }

  static fromInt(value: number): Cell {
    const cell = new Cell();
    cell.bits.setInt32(0, value);
    return cell;
  }

  static fromFloat(value: number): Cell {
    const cell = new Cell();
    cell.bits.setFloat32(0, value);
    return cell;
  }

  /** Signed 32-bit integer view */
  get int(): number {
    return this.bits.getInt32(0);
  }

  /** 32-bit float view */
  get float(): number {
    return this.bits.getFloat32(0);
  }

  equals(other: Cell): boolean {
    return this.int === other.int;
  }

  toString(): string {
    return `${this.int} (${this.float})`;
  }
}
