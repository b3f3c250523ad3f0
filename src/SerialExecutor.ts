/**
 * Single serialized execution context.
 *
 * Poll ticks and every step of a user-triggered sequence run through one chain so
 * that session writes never interleave. Tasks must not await other enqueued tasks.
 */
export class SerialExecutor {
  private chain: Promise<void> = Promise.resolve();

  /**
   * Run `task` after everything already queued has settled
   */
  enqueue<T>(task: () => Promise<T>): Promise<T> {
    const result = this.chain.then(task);
    this.chain = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /**
   * Resolves once every task queued so far has settled
   */
  whenIdle(): Promise<void> {
    return this.chain;
  }
}
