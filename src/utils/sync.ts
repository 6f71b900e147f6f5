type Fn<T> = () => T;

/**
 * Exclusive lock for synchronous critical sections.
 *
 * Code on the event loop cannot be preempted, so the only way to contend for
 * the lock is re-entry from inside the critical section. That is reported
 * rather than allowed to interleave with the holder.
 */
export class Mutex {
  private held = false;

  get locked(): boolean {
    return this.held;
  }

  runExclusive<T>(fn: Fn<T>): T {
    if (this.held) {
      throw new Error('mutex is already held');
    }

    this.held = true;
    try {
      return fn();
    } finally {
      this.held = false;
    }
  }
}
