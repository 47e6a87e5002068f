import type { Logger } from 'pino';
import { ResourceUnavailable } from '../domain/errors/EtlErrors.js';
import { silentLogger } from '../infrastructure/logging/logger.js';

export interface ConnectionPoolOptions {
  /** Connections kept for steady-state use. Default: `10`. */
  readonly size?: number;
  /** Extra connections allowed under burst load. Default: `20`. */
  readonly maxOverflow?: number;
  /** How long a caller waits for a free connection before `ResourceUnavailable`. Default: `30000`. */
  readonly acquireTimeoutMs?: number;
  readonly logger?: Logger;
}

export interface PoolSettings {
  readonly size: number;
  readonly maxOverflow: number;
  readonly acquireTimeoutMs: number;
}

export interface PoolStats {
  readonly inUse: number;
  /** Holders beyond `size`. */
  readonly overflowInUse: number;
  readonly waiting: number;
}

/** Handle for one borrowed connection slot. `release()` is idempotent. */
export interface PoolSlot {
  release(): void;
}

interface Waiter {
  readonly resolve: (slot: PoolSlot) => void;
  readonly timer: ReturnType<typeof setTimeout>;
}

/**
 * Bounded pool of warehouse connection slots, shared process-wide and passed by reference.
 *
 * Up to `size + maxOverflow` callers hold a slot at once; the rest wait in FIFO order.
 */
export class ConnectionPool {
  readonly settings: PoolSettings;
  private readonly logger: Logger;
  private inUse = 0;
  private readonly waiters: Waiter[] = [];

  constructor(options: ConnectionPoolOptions = {}) {
    this.settings = {
      size: Math.max(1, options.size ?? 10),
      maxOverflow: Math.max(0, options.maxOverflow ?? 20),
      acquireTimeoutMs: options.acquireTimeoutMs ?? 30_000,
    };
    this.logger = (options.logger ?? silentLogger()).child({ component: 'connection_pool' });
  }

  get capacity(): number {
    return this.settings.size + this.settings.maxOverflow;
  }

  stats(): PoolStats {
    return {
      inUse: this.inUse,
      overflowInUse: Math.max(0, this.inUse - this.settings.size),
      waiting: this.waiters.length,
    };
  }

  /** Borrow a slot, waiting up to `acquireTimeoutMs`. */
  acquire(): Promise<PoolSlot> {
    if (this.inUse < this.capacity) {
      this.inUse++;
      return Promise.resolve(this.createSlot());
    }

    return new Promise<PoolSlot>((resolve, reject) => {
      const timer = setTimeout(() => {
        const position = this.waiters.findIndex((w) => w.timer === timer);
        if (position >= 0) this.waiters.splice(position, 1);
        this.logger.warn({ ...this.stats(), timeoutMs: this.settings.acquireTimeoutMs }, 'pool_acquire_timeout');
        reject(
          new ResourceUnavailable(
            `No connection available within ${this.settings.acquireTimeoutMs}ms (${this.inUse} in use)`,
          ),
        );
      }, this.settings.acquireTimeoutMs);
      this.waiters.push({ resolve, timer });
    });
  }

  /** Run `work` on a borrowed slot and give the slot back afterwards. */
  async withConnection<T>(work: () => Promise<T>): Promise<T> {
    const slot = await this.acquire();
    try {
      return await work();
    } finally {
      slot.release();
    }
  }

  private createSlot(): PoolSlot {
    let released = false;
    return {
      release: () => {
        if (released) return;
        released = true;
        this.handOver();
      },
    };
  }

  private handOver(): void {
    const next = this.waiters.shift();
    if (next) {
      clearTimeout(next.timer);
      next.resolve(this.createSlot());
      return;
    }
    this.inUse--;
  }
}
