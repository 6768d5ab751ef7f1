// ─── Room Queue ──────────────────────────────────────────
// One promise chain per room key. Work for a room runs strictly in
// submission order; different rooms never wait on each other.

export class RoomQueue {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(roomKey: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(roomKey) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(roomKey, tail);
    void tail.then(() => {
      if (this.tails.get(roomKey) === tail) this.tails.delete(roomKey);
    });
    return result;
  }

  /** Rooms with queued or running work. */
  pending(): number {
    return this.tails.size;
  }
}
