/**
 * Restores sequence order for results that arrive in any order.
 *
 * Results are buffered until every lower sequence number has been seen, then
 * released in order. Sequence numbers start at 0.
 */
export class OrderedReassembler<R> {
  private readonly pending = new Map<number, { value: R }>();
  private next = 0;

  /** Sequence number the next released result will carry. */
  get nextSequence(): number {
    return this.next;
  }

  /** Results held back behind a gap. */
  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Records a result and returns every result that is now in order, oldest
   * first. Throws on a sequence number that was already accepted.
   */
  accept(sequence: number, value: R): Array<{ sequence: number; value: R }> {
    if (sequence < this.next || this.pending.has(sequence)) {
      throw new Error(`duplicate result for sequence ${sequence}`);
    }
    this.pending.set(sequence, { value });

    const ready: Array<{ sequence: number; value: R }> = [];
    for (;;) {
      const entry = this.pending.get(this.next);
      if (!entry) break;
      this.pending.delete(this.next);
      ready.push({ sequence: this.next, value: entry.value });
      this.next++;
    }
    return ready;
  }
}
