
export interface BackoffOptions {
  /** Delay after the first failure, in ms */
  baseDelay: number;
  /** Upper bound of the delay, in ms */
  maxDelay: number;
}

/**
 * Per key exponential backoff: baseDelay * 2^failures, capped at maxDelay
 */
export class ExponentialBackoff<K> {

  private failures = new Map<K, number>();

  constructor(private readonly options: BackoffOptions) {
  }

  public when(key: K): number {
    let failures = this.failures.get(key) || 0;
    this.failures.set(key, failures + 1);
    return Math.min(this.options.baseDelay * Math.pow(2, failures), this.options.maxDelay);
  }

  public retries(key: K): number {
    return this.failures.get(key) || 0;
  }

  public forget(key: K): void {
    this.failures.delete(key);
  }

}

/**
 * Work queue where a key is pending at most once. A key added while it is
 * being processed is queued again when processing is done, so every change
 * is seen by at least one later run and never by two runs at the same time.
 */
export class CoalescingQueue<K> {

  private readonly queue: K[] = [];
  private readonly dirty = new Set<K>();
  private readonly processing = new Set<K>();
  private readonly timers = new Set<NodeJS.Timeout>();
  private waiters: Array<(key: K | undefined) => void> = [];
  private shuttingDown = false;

  constructor(private readonly backoff: ExponentialBackoff<K>) {
  }

  public get length(): number {
    return this.queue.length;
  }

  public get isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  public add(key: K): void {
    if (this.shuttingDown || this.dirty.has(key)) {
      return;
    }
    this.dirty.add(key);
    if (this.processing.has(key)) {
      return;
    }
    this.push(key);
  }

  public addAfter(key: K, delay: number): void {
    if (this.shuttingDown) {
      return;
    }
    if (delay <= 0) {
      this.add(key);
      return;
    }
    let timer = setTimeout(() => {
      this.timers.delete(timer);
      this.add(key);
    }, delay);
    this.timers.add(timer);
  }

  public addRateLimited(key: K): void {
    this.addAfter(key, this.backoff.when(key));
  }

  public forget(key: K): void {
    this.backoff.forget(key);
  }

  public retries(key: K): number {
    return this.backoff.retries(key);
  }

  /**
   * Resolves with the next key, or undefined once the queue is shut down.
   * The key must be handed back with done().
   */
  public get(): Promise<K | undefined> {
    if (this.shuttingDown) {
      return Promise.resolve(undefined);
    }
    let key = this.queue.shift();
    if (key !== undefined) {
      return Promise.resolve(this.take(key));
    }
    return new Promise(resolve => this.waiters.push(resolve));
  }

  public done(key: K): void {
    this.processing.delete(key);
    if (this.dirty.has(key) && !this.shuttingDown) {
      this.push(key);
    }
  }

  /**
   * Stops handing out keys. Keys being processed are not interrupted.
   */
  public shutDown(): void {
    this.shuttingDown = true;
    for (let timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
    let waiters = this.waiters;
    this.waiters = [];
    waiters.forEach(resolve => resolve(undefined));
  }

  private push(key: K): void {
    let waiter = this.waiters.shift();
    if (waiter) {
      waiter(this.take(key));
    } else {
      this.queue.push(key);
    }
  }

  private take(key: K): K {
    this.processing.add(key);
    this.dirty.delete(key);
    return key;
  }

}
