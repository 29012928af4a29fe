import { Cell } from './cell.js';
import { MachineError } from '../errors.js';

export const STACK_CAPACITY = 256;

/**
 * Condition reported when the stack cannot honour a push or a pop
 */
export type StackFault =
  | { kind: 'overflow'; value: Cell }
  | { kind: 'underflow' };

export type StackFaultListener = (fault: StackFault) => void;

/**
 * Operand stack - fixed-capacity LIFO of cells
 *
 * Overflow refuses the push and underflow yields Cell.ZERO; both are handed to
 * the fault listener and neither throws.
 */
export class OperandStack {
  /** Index of the current top element, -1 when empty */
  private current: number = -1;

  private readonly storage: Cell[];

  constructor(
    readonly capacity: number = STACK_CAPACITY,
    private readonly onFault: StackFaultListener = () => {}
  ) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new MachineError(`Stack capacity must be a positive integer, got ${capacity}`);
    }
    this.storage = new Array<Cell>(capacity).fill(Cell.ZERO);
  }

  get top(): number {
    return this.current;
  }

  get depth(): number {
    return this.current + 1;
  }

  /**
   * Push a cell. Returns false, leaving the stack untouched, when full.
   */
  push(value: Cell): boolean {
    if (this.current === this.capacity - 1) {
      this.onFault({ kind: 'overflow', value });
      return false;
    }
    this.current++;
    this.storage[this.current] = value;
    return true;
  }

  /**
   * Pop the top cell, clearing its slot. Returns Cell.ZERO when empty.
   */
  pop(): Cell {
    if (this.current === -1) {
      this.onFault({ kind: 'underflow' });
      return Cell.ZERO;
    }
    const value = this.storage[this.current];
    this.storage[this.current] = Cell.ZERO;
    this.current--;
    return value;
  }

  /**
   * Read slot 0, whatever the current depth. An empty stack reads Cell.ZERO
   * because popped slots are cleared.
   */
  peekBottom(): Cell {
    return this.storage[0];
  }

  /**
   * Live cells, oldest first
   */
  snapshot(): Cell[] {
    return this.storage.slice(0, this.current + 1);
  }
}
