/**
 * Counting limiter keyed by concurrency group.
 *
 * Shared by every build of a process so that, for example, publishing
 * pipelines of two builds never deploy at the same time. Counter updates
 * happen synchronously on acquire/release; waiters are served in FIFO order.
 */

export type Release = () => void;

export interface AcquireResult {
  acquired: boolean;
  release: Release;
}

interface Waiter {
  resolve: (release: Release) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

interface GroupState {
  limit: number;
  active: number;
  waiters: Waiter[];
}

const noop: Release = () => {};

export class ConcurrencyLimiter {
  private readonly groups = new Map<string, GroupState>();

  /** Number of holders currently inside a group. */
  activeCount(group: string): number {
    return this.groups.get(group)?.active ?? 0;
  }

  /** Number of callers waiting for a slot in a group. */
  waitingCount(group: string): number {
    return this.groups.get(group)?.waiters.length ?? 0;
  }

  /**
   * Non-blocking: take a slot if one is free.
   */
  tryAcquire(group: string, limit: number): AcquireResult {
    const state = this.getGroup(group, limit);
    if (state.active >= state.limit || state.waiters.length > 0) {
      return { acquired: false, release: noop };
    }
    state.active++;
    return { acquired: true, release: this.releaser(group) };
  }

  /**
   * Wait for a slot. Rejects when the signal aborts before a slot frees up.
   */
  acquire(group: string, limit: number, signal?: AbortSignal): Promise<Release> {
    const attempt = this.tryAcquire(group, limit);
    if (attempt.acquired) return Promise.resolve(attempt.release);

    if (signal?.aborted) {
      return Promise.reject(new Error(`Wait for concurrency group '${group}' aborted`));
    }

    const state = this.getGroup(group, limit);
    return new Promise<Release>((resolve, reject) => {
      const waiter: Waiter = { resolve, signal };
      if (signal) {
        waiter.onAbort = () => {
          const idx = state.waiters.indexOf(waiter);
          if (idx !== -1) state.waiters.splice(idx, 1);
          reject(new Error(`Wait for concurrency group '${group}' aborted`));
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }
      state.waiters.push(waiter);
    });
  }

  private getGroup(group: string, limit: number): GroupState {
    let state = this.groups.get(group);
    if (!state) {
      state = { limit, active: 0, waiters: [] };
      this.groups.set(group, state);
    } else if (state.active === 0 && state.waiters.length === 0) {
      state.limit = limit;
    }
    return state;
  }

  private releaser(group: string): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const state = this.groups.get(group);
      if (!state) return;
      state.active--;

      const next = state.waiters.shift();
      if (next) {
        if (next.signal && next.onAbort) {
          next.signal.removeEventListener('abort', next.onAbort);
        }
        state.active++;
        next.resolve(this.releaser(group));
      } else if (state.active === 0) {
        this.groups.delete(group);
      }
    };
  }
}
