/**
 * Variable id allocation.
 *
 * Ids are load-bearing: backpropagation keys its pending-derivative map on
 * them, so an allocator must never hand out the same id twice.
 */
import type { IdAllocator } from "./interfaces.js";

export class CounterIdAllocator implements IdAllocator {
  private _next: number;

  constructor(start = 1) {
    this._next = start;
  }

  next(): number {
    return this._next++;
  }

  /** The id the next call will return. */
  peek(): number {
    return this._next;
  }
}

/** Process-wide allocator used when a variable is built without one. */
export const globalIds: IdAllocator = new CounterIdAllocator();
