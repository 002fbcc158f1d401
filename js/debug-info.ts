export interface IterationRecord {
  method: "bisection" | "newton";
  iteration: number;
  x: number;
  fx: number;
}

// Crude monitoring of solver progress. Pass an IterationLog in the solver
// options and it keeps the most recent iterations.
export class IterationLog {
  // Ring buffer of recent records.
  recent: IterationRecord[];
  recentIndex = 0;
  // Total number of records ever seen, including overwritten ones.
  count = 0;

  constructor(capacity = 20) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `capacity must be a positive integer, got ${capacity}`
      );
    }
    this.recent = new Array<IterationRecord>(capacity);
  }

  record(entry: IterationRecord): void {
    this.recent[this.recentIndex] = entry;
    this.recentIndex += 1;
    this.recentIndex %= this.recent.length;
    this.count += 1;
  }

  // Oldest first.
  entries(): IterationRecord[] {
    return this.recent
      .slice(this.recentIndex)
      .concat(this.recent.slice(0, this.recentIndex))
      .filter((r) => r !== undefined);
  }

  // Print the recent iterations.
  logRecent(): void {
    for (const r of this.entries()) {
      console.log(`${r.method} #${r.iteration}: x = ${r.x}, f(x) = ${r.fx}`);
    }
  }

  clear(): void {
    this.recent = new Array<IterationRecord>(this.recent.length);
    this.recentIndex = 0;
    this.count = 0;
  }
}
