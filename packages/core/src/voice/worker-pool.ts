import { ErrorCodes, VoiceError } from '../errors';

export type WorkerLane = 'capture' | 'playback' | 'network';

export type WorkerTask<T> = (signal: AbortSignal) => Promise<T>;

export interface WorkerPoolOptions {
  /** Concurrent network requests (default: 4) */
  networkSlots?: number;
}

export interface WorkerPoolStats {
  active: Record<WorkerLane, number>;
  queued: Record<WorkerLane, number>;
  closed: boolean;
}

interface QueuedTask {
  start: () => void;
  reject: (error: Error) => void;
}

function disposedError(): VoiceError {
  return new VoiceError('Voice worker pool has been shut down', {
    code: ErrorCodes.DISPOSED,
    userFacing: false,
  });
}

/**
 * Bounded pool for device loops and network requests.
 *
 * Capture and playback get one slot each; network requests share a
 * configurable number of slots. `shutdown` aborts every task's signal and
 * resolves once all running tasks have settled.
 */
export class WorkerPool {
  private limits: Record<WorkerLane, number>;
  private active: Record<WorkerLane, number> = { capture: 0, playback: 0, network: 0 };
  private queues: Record<WorkerLane, QueuedTask[]> = { capture: [], playback: [], network: [] };
  private running: Set<Promise<void>> = new Set();
  private controller = new AbortController();
  private closed = false;

  constructor(options: WorkerPoolOptions = {}) {
    this.limits = {
      capture: 1,
      playback: 1,
      network: Math.max(1, options.networkSlots ?? 4),
    };
  }

  run<T>(lane: WorkerLane, task: WorkerTask<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(disposedError());
    }

    return new Promise<T>((resolve, reject) => {
      const start = () => {
        this.active[lane] += 1;
        const execution: Promise<void> = Promise.resolve()
          .then(() => task(this.controller.signal))
          .then(resolve, reject)
          .finally(() => {
            this.active[lane] -= 1;
            this.running.delete(execution);
            this.startNext(lane);
          });
        this.running.add(execution);
      };

      if (this.active[lane] < this.limits[lane]) {
        start();
      } else {
        this.queues[lane].push({ start, reject });
      }
    });
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  isClosed(): boolean {
    return this.closed;
  }

  getStats(): WorkerPoolStats {
    return {
      active: { ...this.active },
      queued: {
        capture: this.queues.capture.length,
        playback: this.queues.playback.length,
        network: this.queues.network.length,
      },
      closed: this.closed,
    };
  }

  async shutdown(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      this.controller.abort();
      for (const queue of Object.values(this.queues)) {
        for (const queued of queue.splice(0)) {
          queued.reject(disposedError());
        }
      }
    }
    while (this.running.size > 0) {
      await Promise.all(Array.from(this.running));
    }
  }

  private startNext(lane: WorkerLane): void {
    if (this.closed) return;
    const next = this.queues[lane].shift();
    next?.start();
  }
}
