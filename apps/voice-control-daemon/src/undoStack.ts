import type { LightSnapshot } from '@lightcue/light-bridge';

/** Pre-mutation state of every targeted device, keyed by device id */
export type UndoEntry = ReadonlyMap<string, LightSnapshot>;

/** Bounded LIFO; pushing onto a full stack drops the oldest entry */
export class UndoStack {
  private readonly entries: UndoEntry[] = [];

  constructor(readonly depth = 5) {
    if (!Number.isInteger(depth) || depth < 1) {
      throw new RangeError(`Undo depth must be a positive integer, got ${depth}`);
    }
  }

  get size(): number {
    return this.entries.length;
  }

  push(entry: UndoEntry): void {
    this.entries.push(new Map(entry));
    if (this.entries.length > this.depth) this.entries.shift();
  }

  pop(): UndoEntry | undefined {
    return this.entries.pop();
  }

  peek(): UndoEntry | undefined {
    return this.entries[this.entries.length - 1];
  }

  clear(): void {
    this.entries.length = 0;
  }
}
