/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * FIFO async mutex, reentrant along the async call chain that holds it.
 */

import { AsyncLocalStorage } from 'node:async_hooks';

interface Hold {
  active: boolean;
}

export class Mutex {
  private readonly queue: Array<() => void> = [];
  private readonly owner = new AsyncLocalStorage<Hold>();
  private locked = false;

  async acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true;
      return this.releaser();
    }
    return new Promise((resolve) => {
      this.queue.push(() => resolve(this.releaser()));
    });
  }

  /**
   * Run `task` while holding the lock; the lock is released however it settles.
   * A call made from inside a running task joins the current hold instead of queueing.
   */
  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    if (this.heldByCaller) {
      return task();
    }
    const release = await this.acquire();
    const hold: Hold = { active: true };
    try {
      return await this.owner.run(hold, task);
    } finally {
      hold.active = false;
      release();
    }
  }

  get isLocked(): boolean {
    return this.locked;
  }

  /** True when the current async context is inside a running task. */
  get heldByCaller(): boolean {
    return this.owner.getStore()?.active ?? false;
  }

  /** Number of callers waiting for the lock. */
  get pending(): number {
    return this.queue.length;
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      // Ownership passes straight to the next waiter.
      next();
    } else {
      this.locked = false;
    }
  }
}
