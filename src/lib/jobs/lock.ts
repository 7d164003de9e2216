type TailResolver = (value?: void | PromiseLike<void>) => void;

function createTail() {
  let resolveTail: TailResolver = () => {};
  const tail = new Promise<void>((resolve) => {
    resolveTail = resolve;
  });

  return { tail, resolveTail };
}

/**
 * FIFO mutual exclusion for async sections. Each caller chains onto the tail
 * promise left by the previous holder, so handlers run strictly one after the
 * other and the lock is handed on whether the handler resolves or throws.
 */
export class PromiseLock {
  private tail: Promise<void> = Promise.resolve();

  async run<T>(handler: () => Promise<T>): Promise<T> {
    const previousTail = this.tail;
    const next = createTail();
    this.tail = next.tail;

    await previousTail;

    try {
      return await handler();
    } finally {
      next.resolveTail();
    }
  }
}
