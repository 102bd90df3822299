import type { EmissionMode } from '../types.js';

/**
 * Re-entrant guard that serializes a collection's mutations and decides
 * when their notifications go out.
 *
 * Code only ever reaches the guard on the caller's stack, so "concurrent"
 * entry means re-entry: an observer mutating the collection while it is
 * being notified. Entering while already inside is always allowed.
 *
 * In `'immediate'` mode every emission runs as soon as it is requested.
 * In `'deferred'` mode emissions are queued and drained in FIFO order when
 * the outermost {@link run} returns; emissions requested while draining
 * join the same queue, so notifications from different mutations never
 * interleave.
 */
export class MutationGuard {
  private depth = 0;
  private draining = false;
  private readonly pending: (() => void)[] = [];

  constructor(readonly mode: EmissionMode) {}

  /** Whether a mutation is in progress on the current stack */
  get held(): boolean {
    return this.depth > 0;
  }

  /**
   * Run `body` inside the guard. Releases the guard even if `body`
   * throws.
   */
  run<R>(body: () => R): R {
    this.depth++;
    try {
      return body();
    } finally {
      this.depth--;
      if (this.depth === 0) {
        this.drain();
      }
    }
  }

  /** Publish now, or queue until the outermost mutation finishes */
  emit(publish: () => void): void {
    if (this.mode === 'immediate') {
      publish();
      return;
    }
    this.pending.push(publish);
  }

  private drain(): void {
    if (this.draining) return;
    this.draining = true;
    try {
      let next = this.pending.shift();
      while (next) {
        next();
        next = this.pending.shift();
      }
    } finally {
      this.draining = false;
    }
  }
}
