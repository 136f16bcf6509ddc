/**
 * Single-writer queue: tasks run one at a time in call order, so packets
 * from an edit and a running sweep never interleave on the wire.
 */
export class WriteLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.release(),
      () => this.release()
    );
    return result;
  }

  get queued(): number {
    return this.pending;
  }

  private release(): void {
    this.pending--;
  }
}
