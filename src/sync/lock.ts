/**
 * Non-blocking single-flight guard. At most one sync pass (push, full sync
 * or watch renewal) runs at a time; a second caller is turned away rather
 * than queued so cursor writes stay strictly ordered.
 */
export class OperationLock {
  private holder: string | null = null;

  get busy(): boolean {
    return this.holder !== null;
  }

  get current(): string | null {
    return this.holder;
  }

  /**
   * Run `fn` while holding the lock. Returns `{ acquired: false }` without
   * calling `fn` when another operation holds it.
   */
  async tryRun<T>(name: string, fn: () => Promise<T>): Promise<{ acquired: true; value: T } | { acquired: false; holder: string }> {
    if (this.holder !== null) {
      return { acquired: false, holder: this.holder };
    }

    this.holder = name;
    try {
      return { acquired: true, value: await fn() };
    } finally {
      this.holder = null;
    }
  }
}
