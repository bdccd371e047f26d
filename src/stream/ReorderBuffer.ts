type Slot<T> = {
  sequence: number;
  settled: boolean;
  value: T | undefined;
};

/**
 * Releases values strictly in registration order. A slot settled without a
 * value (failed or discarded work) is skipped once it reaches the head, so a
 * gap never holds back later values.
 */
export class ReorderBuffer<T> {
  private slots: Slot<T>[] = [];
  private readonly bySequence = new Map<number, Slot<T>>();
  private lastRegistered = -Infinity;

  constructor(private readonly release: (sequence: number, value: T) => void) {}

  register(sequence: number): void {
    if (sequence <= this.lastRegistered) {
      throw new RangeError(
        `sequence ${sequence} registered after ${this.lastRegistered}`
      );
    }
    this.lastRegistered = sequence;
    const slot: Slot<T> = { sequence, settled: false, value: undefined };
    this.slots.push(slot);
    this.bySequence.set(sequence, slot);
  }

  /** Returns false when the sequence is unknown or already settled. */
  settle(sequence: number, value?: T): boolean {
    const slot = this.bySequence.get(sequence);
    if (!slot || slot.settled) return false;

    slot.settled = true;
    slot.value = value;
    this.drain();
    return true;
  }

  /** Settled slots waiting behind an unsettled predecessor. */
  get waiting(): number {
    return this.slots.filter((s) => s.settled).length;
  }

  private drain() {
    let released = 0;
    for (const slot of this.slots) {
      if (!slot.settled) break;
      released++;
      this.bySequence.delete(slot.sequence);
      if (slot.value !== undefined) this.release(slot.sequence, slot.value);
    }
    if (released > 0) this.slots = this.slots.slice(released);
  }
}
