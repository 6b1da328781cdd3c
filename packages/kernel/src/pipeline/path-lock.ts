/**
 * Bulwark Kernel — Path-Prefix Locks
 *
 * Mutual exclusion for writers keyed on canonical path prefix. Two lock
 * sets conflict when any path in one equals, contains, or is contained by
 * a path in the other. Readers never lock.
 *
 * Waiters are granted in arrival order: a waiter is not overtaken by a
 * later request that conflicts with it.
 */

import { isWithinRoot } from '../policy/sandbox.js';

export type ReleaseLock = () => void;

interface Waiter {
  readonly paths: ReadonlyArray<string>;
  readonly grant: () => void;
}

export function pathsOverlap(a: string, b: string): boolean {
  return a === b || isWithinRoot(a, b) || isWithinRoot(b, a);
}

function setsConflict(a: ReadonlyArray<string>, b: ReadonlyArray<string>): boolean {
  return a.some((left) => b.some((right) => pathsOverlap(left, right)));
}

export class PathLockManager {
  private readonly held = new Set<ReadonlyArray<string>>();
  private waiters: Waiter[] = [];

  /** Resolves once no held or earlier-queued lock set overlaps `paths`. */
  acquire(paths: ReadonlyArray<string>): Promise<ReleaseLock> {
    const key = [...paths];
    return new Promise<ReleaseLock>((resolve) => {
      const grant = (): void => {
        this.held.add(key);
        let released = false;
        resolve(() => {
          if (released) return;
          released = true;
          this.held.delete(key);
          this.drain();
        });
      };

      if (this.canGrant(key, this.waiters)) {
        grant();
      } else {
        this.waiters.push({ paths: key, grant });
      }
    });
  }

  /** Number of lock sets currently held. */
  get heldCount(): number {
    return this.held.size;
  }

  get waitingCount(): number {
    return this.waiters.length;
  }

  private canGrant(paths: ReadonlyArray<string>, ahead: ReadonlyArray<Waiter>): boolean {
    for (const held of this.held) {
      if (setsConflict(paths, held)) return false;
    }
    return !ahead.some((waiter) => setsConflict(paths, waiter.paths));
  }

  private drain(): void {
    const stillWaiting: Waiter[] = [];
    for (const waiter of this.waiters) {
      if (this.canGrant(waiter.paths, stillWaiting)) {
        waiter.grant();
      } else {
        stillWaiting.push(waiter);
      }
    }
    this.waiters = stillWaiting;
  }
}
