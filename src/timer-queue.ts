import logger from './logger';

interface ScheduledTask {
  id: number;
  owner: string;
  fireAt: number;
  callback: () => void;
  cancelled: boolean;
}

/**
 * Handle for a single scheduled task.
 */
export interface TimerHandle {
  cancel(): void;
}

const before = (a: ScheduledTask, b: ScheduledTask): boolean =>
  a.fireAt < b.fireAt || (a.fireAt === b.fireAt && a.id < b.id);

/**
 * Cancellable scheduled tasks kept in a min-heap keyed by fire time.
 *
 * Only the earliest task holds a host timer. Every task belongs to an owner
 * (a service name) so all probe and backoff timers of one service can be
 * dropped at once on a stop request. Tasks due at the same instant run in
 * scheduling order.
 */
export class TimerQueue {
  private heap: ScheduledTask[] = [];
  private sequence = 0;
  private timer: NodeJS.Timeout | null = null;
  private armedFor: number | null = null;

  schedule(owner: string, delayMs: number, callback: () => void): TimerHandle {
    const task: ScheduledTask = {
      id: this.sequence++,
      owner,
      fireAt: Date.now() + Math.max(0, delayMs),
      callback,
      cancelled: false,
    };
    this.push(task);
    this.arm();

    return {
      cancel: () => {
        task.cancelled = true;
        this.arm();
      },
    };
  }

  /**
   * Cancel every pending task of `owner`. Returns how many were dropped.
   */
  cancelOwner(owner: string): number {
    let dropped = 0;
    for (const task of this.heap) {
      if (task.owner === owner && !task.cancelled) {
        task.cancelled = true;
        dropped += 1;
      }
    }
    if (dropped > 0) {
      this.compact();
      this.arm();
    }
    return dropped;
  }

  pending(owner?: string): number {
    return this.heap.filter((task) => !task.cancelled && (owner === undefined || task.owner === owner)).length;
  }

  clear(): void {
    this.heap = [];
    this.disarm();
  }

  private fire(): void {
    this.timer = null;
    this.armedFor = null;
    const now = Date.now();

    let top = this.heap[0];
    while (top !== undefined && top.fireAt <= now) {
      this.pop();
      if (!top.cancelled) {
        try {
          top.callback();
        } catch (err) {
          logger.error({ err, owner: top.owner }, 'Scheduled task failed');
        }
      }
      top = this.heap[0];
    }

    this.arm();
  }

  private arm(): void {
    while (this.heap.length > 0 && this.heap[0].cancelled) {
      this.pop();
    }

    const top = this.heap[0];
    if (top === undefined) {
      this.disarm();
      return;
    }
    if (this.timer !== null && this.armedFor === top.fireAt) return;

    this.disarm();
    this.armedFor = top.fireAt;
    this.timer = setTimeout(() => this.fire(), Math.max(0, top.fireAt - Date.now()));
  }

  private disarm(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
    }
    this.timer = null;
    this.armedFor = null;
  }

  private compact(): void {
    // A sorted array satisfies the heap property.
    this.heap = this.heap.filter((task) => !task.cancelled).sort((a, b) => (before(a, b) ? -1 : 1));
  }

  private push(task: ScheduledTask): void {
    const heap = this.heap;
    heap.push(task);
    let i = heap.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!before(heap[i], heap[parent])) break;
      [heap[i], heap[parent]] = [heap[parent], heap[i]];
      i = parent;
    }
  }

  private pop(): ScheduledTask | undefined {
    const heap = this.heap;
    const top = heap[0];
    const last = heap.pop();
    if (top === undefined || last === undefined || heap.length === 0) return top;

    heap[0] = last;
    let i = 0;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < heap.length && before(heap[left], heap[smallest])) smallest = left;
      if (right < heap.length && before(heap[right], heap[smallest])) smallest = right;
      if (smallest === i) break;
      [heap[i], heap[smallest]] = [heap[smallest], heap[i]];
      i = smallest;
    }
    return top;
  }
}
