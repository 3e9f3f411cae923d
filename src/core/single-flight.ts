/**
 * Single-flight table: at most one in-flight task per key.
 *
 * Concurrent callers for the same key share the first caller's promise.
 * Entries are released when the task settles or, failing that, after a TTL so
 * a hung task cannot hold the key forever. A caller that aborts only stops
 * waiting: the shared task keeps running and its result is still delivered to
 * the other waiters.
 */

import { getLogger } from './logger.js';

interface FlightEntry<T> {
  promise: Promise<T>;
  timer: ReturnType<typeof setTimeout>;
}

export class SingleFlight<T> {
  private flights = new Map<string, FlightEntry<T>>();
  private logger = getLogger();

  constructor(private readonly ttlMs: number) {}

  run(key: string, task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    let entry = this.flights.get(key);

    if (entry) {
      this.logger.debug({ key }, 'Joining in-flight task');
    } else {
      entry = this.start(key, task);
    }

    return signal ? this.abortable(entry.promise, signal) : entry.promise;
  }

  has(key: string): boolean {
    return this.flights.has(key);
  }

  get size(): number {
    return this.flights.size;
  }

  /**
   * Forget every entry. Running tasks are not cancelled.
   */
  clear(): void {
    for (const entry of this.flights.values()) {
      clearTimeout(entry.timer);
    }
    this.flights.clear();
  }

  private start(key: string, task: () => Promise<T>): FlightEntry<T> {
    const promise = Promise.resolve().then(task);

    const timer = setTimeout(() => {
      if (this.flights.get(key) === entry) {
        this.flights.delete(key);
        this.logger.warn({ key, ttlMs: this.ttlMs }, 'In-flight task exceeded lock TTL; releasing key');
      }
    }, this.ttlMs);
    timer.unref();

    const entry: FlightEntry<T> = { promise, timer };
    this.flights.set(key, entry);

    const release = (): void => {
      clearTimeout(timer);
      if (this.flights.get(key) === entry) {
        this.flights.delete(key);
      }
    };
    // Settling handlers also keep a rejection from going unhandled when every waiter aborted
    void promise.then(release, release);

    return entry;
  }

  private abortable(promise: Promise<T>, signal: AbortSignal): Promise<T> {
    if (signal.aborted) {
      return Promise.reject(signal.reason ?? new Error('Aborted'));
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => reject(signal.reason ?? new Error('Aborted'));
      signal.addEventListener('abort', onAbort, { once: true });
      promise.then(
        value => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (err: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(err);
        },
      );
    });
  }
}
