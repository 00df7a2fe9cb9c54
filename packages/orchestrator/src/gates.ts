// In-process FIFO counting semaphore. One instance bounds transfers, a second one with
// capacity 1 serializes conversions on the single GPU.
import { CancelledError } from '@cloud-narrator/contracts';

export interface Permit {
  /** Idempotent. */
  release(): void;
}

interface Waiter {
  grant: (permit: Permit) => void;
  reject: (error: unknown) => void;
  detach: () => void;
}

export class Gate {
  private active = 0;
  private readonly waiters: Waiter[] = [];

  constructor(
    readonly name: string,
    readonly capacity: number,
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Gate "${name}" needs a positive integer capacity, got ${capacity}`);
    }
  }

  get inUse(): number {
    return this.active;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  /**
   * Wait for a slot. Waiters are served strictly in arrival order. Aborting `signal`
   * removes a pending waiter and rejects with CancelledError; a granted permit is unaffected.
   */
  acquire(signal?: AbortSignal): Promise<Permit> {
    if (signal?.aborted) {
      return Promise.reject(new CancelledError(`Cancelled while waiting for ${this.name}`));
    }
    if (this.active < this.capacity && this.waiters.length === 0) {
      this.active += 1;
      return Promise.resolve(this.createPermit());
    }

    return new Promise<Permit>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) this.waiters.splice(index, 1);
        reject(new CancelledError(`Cancelled while waiting for ${this.name}`));
      };
      const waiter: Waiter = {
        grant: resolve,
        reject,
        detach: () => signal?.removeEventListener('abort', onAbort),
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  async withPermit<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const permit = await this.acquire(signal);
    try {
      return await fn();
    } finally {
      permit.release();
    }
  }

  private createPermit(): Permit {
    let released = false;
    return {
      release: () => {
        if (released) return;
        released = true;
        this.handOff();
      },
    };
  }

  private handOff(): void {
    const next = this.waiters.shift();
    if (next) {
      // the slot passes straight to the next waiter; `active` is unchanged
      next.detach();
      next.grant(this.createPermit());
      return;
    }
    this.active -= 1;
  }
}
