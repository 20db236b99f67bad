/**
 * Worker Scopes
 * Per-worker storage for values that must not be shared between concurrent
 * pipeline workers (the HTTP session, for one)
 */

import { AsyncLocalStorage } from "node:async_hooks";

export class WorkerScope {
  constructor(readonly id: number) {}
}

const storage = new AsyncLocalStorage<WorkerScope>();

// Used for calls made outside any pipeline worker
const mainScope = new WorkerScope(-1);

export function currentScope(): WorkerScope {
  return storage.getStore() ?? mainScope;
}

/**
 * Run `fn` with `scope` as the current worker scope, including everything
 * it awaits
 */
export function runInScope<R>(scope: WorkerScope, fn: () => R): R {
  return storage.run(scope, fn);
}

/**
 * A value created lazily once per worker scope
 *
 * @example
 * const session = new WorkerLocal(() => new HttpSession());
 * session.get(); // same instance for every call within one worker
 */
export class WorkerLocal<T> {
  private values = new WeakMap<WorkerScope, T>();

  constructor(private factory: () => T) {}

  get(): T {
    const scope = currentScope();
    let value = this.values.get(scope);
    if (value === undefined) {
      value = this.factory();
      this.values.set(scope, value);
    }
    return value;
  }
}

/**
 * Fixed set of scopes handed out to concurrently running tasks
 * With at most `size` tasks in flight, every task gets a scope no other
 * running task holds.
 */
export class ScopePool {
  private free: WorkerScope[];
  private nextId: number;

  constructor(size: number) {
    this.free = Array.from({ length: size }, (_, i) => new WorkerScope(i));
    this.nextId = size;
  }

  async use<R>(fn: () => Promise<R>): Promise<R> {
    const scope = this.free.pop() ?? new WorkerScope(this.nextId++);
    try {
      return await runInScope(scope, fn);
    } finally {
      this.free.push(scope);
    }
  }
}
