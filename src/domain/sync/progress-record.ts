/**
 * Keys of files already settled remotely, in the order they were settled.
 * Only grows; a key is never removed once recorded.
 */
export class ProgressRecord {
  private readonly keys: string[] = [];
  private readonly index = new Set<string>();

  static from(keys: Iterable<string>): ProgressRecord {
    const record = new ProgressRecord();
    for (const key of keys) {
      record.add(key);
    }
    return record;
  }

  get size(): number {
    return this.keys.length;
  }

  has(key: string): boolean {
    return this.index.has(key);
  }

  add(key: string): boolean {
    if (this.index.has(key)) {
      return false;
    }
    this.index.add(key);
    this.keys.push(key);
    return true;
  }

  entries(): readonly string[] {
    return [...this.keys];
  }
}
