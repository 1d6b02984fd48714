import { ProgressEvent } from '../../core/entities/Job.js';

export interface SubscribeOptions {
  bufferSize?: number;
}

/**
 * Live feed of one job's progress. Iterate it with `for await`; the loop ends
 * after the job's terminal event or when `close()` is called.
 */
export interface ProgressSubscription extends AsyncIterable<ProgressEvent> {
  readonly jobId: string;
  readonly dropped: number;
  close(): void;
}

class BufferedSubscription implements ProgressSubscription {
  private buffer: ProgressEvent[] = [];
  private waiting: ((result: IteratorResult<ProgressEvent>) => void) | null = null;
  private ended = false;
  private closed = false;
  dropped = 0;

  constructor(
    readonly jobId: string,
    private capacity: number,
    private onClose: (subscription: BufferedSubscription) => void
  ) {}

  push(event: ProgressEvent): void {
    if (this.ended) return;

    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: event, done: false });
      return;
    }

    this.buffer.push(event);
    if (this.buffer.length > this.capacity) {
      this.buffer.shift();
      this.dropped++;
    }
  }

  /** No more events; what is buffered is still delivered. */
  end(): void {
    this.ended = true;
    if (this.waiting && this.buffer.length === 0) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: undefined, done: true });
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.buffer = [];
    this.end();
    this.onClose(this);
  }

  private next(): Promise<IteratorResult<ProgressEvent>> {
    const event = this.buffer.shift();
    if (event) {
      return Promise.resolve({ value: event, done: false });
    }
    if (this.ended) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<ProgressEvent> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }
}

/**
 * Fan-out of job progress to any number of subscribers.
 *
 * `publish` never waits for a consumer: each subscriber owns a bounded
 * buffer and loses its oldest events when it falls behind. The latest event
 * of every job is kept so a subscriber that connects late (or reconnects)
 * starts from the current state.
 */
export class ProgressPublisher {
  private subscribers: Map<string, Set<BufferedSubscription>> = new Map();
  private latest: Map<string, ProgressEvent> = new Map();
  private completed: Set<string> = new Set();

  constructor(private defaultBufferSize: number = 64) {}

  subscribe(jobId: string, options: SubscribeOptions = {}): ProgressSubscription {
    const subscription = new BufferedSubscription(
      jobId,
      Math.max(1, options.bufferSize ?? this.defaultBufferSize),
      (closed) => this.remove(closed)
    );

    const last = this.latest.get(jobId);
    if (last) {
      subscription.push(last);
    }

    if (this.completed.has(jobId)) {
      subscription.end();
      return subscription;
    }

    let set = this.subscribers.get(jobId);
    if (!set) {
      set = new Set();
      this.subscribers.set(jobId, set);
    }
    set.add(subscription);
    return subscription;
  }

  publish(jobId: string, event: ProgressEvent): void {
    if (this.completed.has(jobId)) return;

    this.latest.set(jobId, event);
    const set = this.subscribers.get(jobId);
    if (!set) return;
    for (const subscription of set) {
      subscription.push(event);
    }
  }

  /**
   * End every stream of the job. Further publishes for it are ignored.
   */
  complete(jobId: string): void {
    this.completed.add(jobId);
    const set = this.subscribers.get(jobId);
    if (!set) return;
    for (const subscription of set) {
      subscription.end();
    }
    this.subscribers.delete(jobId);
  }

  /** Drop retained state for jobs that no longer exist. */
  forget(jobIds: readonly string[]): void {
    for (const jobId of jobIds) {
      this.latest.delete(jobId);
      this.completed.delete(jobId);
    }
  }

  getLatest(jobId: string): ProgressEvent | null {
    return this.latest.get(jobId) ?? null;
  }

  getStatistics() {
    let subscribers = 0;
    for (const set of this.subscribers.values()) {
      subscribers += set.size;
    }
    return {
      jobsWithSubscribers: this.subscribers.size,
      subscribers,
      trackedJobs: this.latest.size,
    };
  }

  private remove(subscription: BufferedSubscription): void {
    const set = this.subscribers.get(subscription.jobId);
    if (!set) return;
    set.delete(subscription);
    if (set.size === 0) {
      this.subscribers.delete(subscription.jobId);
    }
  }
}
