export class ActivityFeed {
  private lines: string[] = [];

  constructor(private readonly capacity: number) {}

  /** Returns false when the line was empty or repeats the last one. */
  append(line: string): boolean {
    const trimmed = line.trim();
    if (!trimmed || this.lines[this.lines.length - 1] === trimmed) {
      return false;
    }

    this.lines.push(trimmed);
    if (this.lines.length > this.capacity) {
      this.lines = this.lines.slice(-this.capacity);
    }
    return true;
  }

  snapshot(): string[] {
    return [...this.lines];
  }

  clear(): void {
    this.lines = [];
  }
}
