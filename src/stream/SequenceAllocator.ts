import type { ISequenceAllocator } from "../ports/segment.js";

export class SequenceAllocator implements ISequenceAllocator {
  private last: number;

  constructor(start = 1) {
    this.last = start - 1;
  }

  next() {
    this.last += 1;
    return this.last;
  }
}
