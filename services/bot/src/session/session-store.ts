/**
 * In-memory conversation state. One entry per key; a later `set` replaces the
 * earlier one. Nothing here survives a restart.
 *
 * With `ttlMs` set, a state older than that reads as absent and is dropped;
 * `set` also sweeps every expired entry so unanswered prompts do not pile up.
 *
 * `runExclusive` chains tasks per key so a conversation's events are handled
 * in arrival order while other conversations proceed independently.
 */
export class SessionStore<S> {
  private readonly states = new Map<string, { state: S; expiresAt: number }>();
  private readonly tails = new Map<string, Promise<void>>();
  private readonly ttlMs: number;

  constructor(opts: { ttlMs?: number } = {}) {
    this.ttlMs = opts.ttlMs ?? Number.POSITIVE_INFINITY;
  }

  get(key: string): S | undefined {
    const entry = this.states.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= Date.now()) {
      this.states.delete(key);
      return undefined;
    }
    return entry.state;
  }

  set(key: string, state: S): void {
    this.sweep();
    this.states.set(key, { state, expiresAt: Date.now() + this.ttlMs });
  }

  clear(key: string): boolean {
    return this.states.delete(key);
  }

  size(): number {
    this.sweep();
    return this.states.size;
  }

  private sweep() {
    const now = Date.now();
    for (const [key, entry] of this.states) {
      if (entry.expiresAt <= now) this.states.delete(key);
    }
  }

  /** Number of keys with a task queued or running. */
  pending(): number {
    return this.tails.size;
  }

  runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();
    const run = prev.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      // drop the entry only if nothing was queued behind us
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });
    return run;
  }
}
