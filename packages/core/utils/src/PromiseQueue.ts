import {makeDeferredWithPromise, type Deferred} from './Deferred';

type PromiseQueueOpts = {
  maxConcurrent: number;
};

/**
 * Runs async tasks with bounded concurrency. `run()` resolves with every
 * task's result in the order the tasks were added, regardless of the order
 * they finished in. The first failure rejects `run()` once the tasks already
 * in flight have settled.
 */
export default class PromiseQueue<T> {
  _deferred: Deferred<Array<T>> | null = null;
  _maxConcurrent: number;
  _numRunning: number = 0;
  _queue: Array<() => Promise<void>> = [];
  _runPromise: Promise<Array<T>> | null = null;
  _error: {value: unknown} | null = null;
  _count: number = 0;
  _results: Array<T> = [];

  constructor(opts: PromiseQueueOpts = {maxConcurrent: Infinity}) {
    if (opts.maxConcurrent <= 0) {
      throw new TypeError('maxConcurrent must be a positive, non-zero value');
    }

    this._maxConcurrent = opts.maxConcurrent;
  }

  add(fn: () => Promise<T>): void {
    let i = this._count++;
    this._queue.push(async () => {
      this._results[i] = await fn();
    });

    if (this._numRunning > 0 && this._numRunning < this._maxConcurrent) {
      this._next();
    }
  }

  run(): Promise<Array<T>> {
    if (this._runPromise != null) {
      return this._runPromise;
    }

    if (this._queue.length === 0) {
      return Promise.resolve([]);
    }

    let {deferred, promise} = makeDeferredWithPromise<Array<T>>();
    this._deferred = deferred;
    this._runPromise = promise;

    while (this._queue.length && this._numRunning < this._maxConcurrent) {
      this._next();
    }

    return promise;
  }

  _next(): void {
    let fn = this._queue.shift();
    if (fn == null) {
      return;
    }

    void this._runFn(fn).then(() => {
      if (this._queue.length) {
        this._next();
      } else if (this._numRunning === 0) {
        this._done();
      }
    });
  }

  async _runFn(fn: () => Promise<void>): Promise<void> {
    this._numRunning++;
    try {
      await fn();
    } catch (e: unknown) {
      // Only the first error is kept. Concurrent tasks still get to finish.
      if (this._error == null) {
        this._error = {value: e};
      }
    } finally {
      this._numRunning--;
    }
  }

  _resetState(): void {
    this._queue = [];
    this._count = 0;
    this._results = [];
    this._runPromise = null;
    this._numRunning = 0;
    this._deferred = null;
    this._error = null;
  }

  _done(): void {
    let deferred = this._deferred;
    let error = this._error;
    let results = this._results;

    this._resetState();

    if (deferred == null) {
      return;
    }

    if (error != null) {
      deferred.reject(error.value);
    } else {
      deferred.resolve(results);
    }
  }
}
