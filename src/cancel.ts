import { CancelledError } from './errors.js';

/**
 * Cooperative cancellation primitive.
 * Handed to the lock resolver, the prompts and the session driver; checked between steps.
 */
export class CancelToken {
  private cancelled = false;
  private reason = 'Run cancelled';
  private listeners = new Set<() => void>();

  get isCancelled(): boolean {
    return this.cancelled;
  }

  cancel(reason?: string): void {
    if (this.cancelled) return;
    this.cancelled = true;
    if (reason) {
      this.reason = reason;
    }
    for (const listener of this.listeners) {
      listener();
    }
    this.listeners.clear();
  }

  /** Returns an unsubscribe function. Fires immediately when already cancelled. */
  onCancel(listener: () => void): () => void {
    if (this.cancelled) {
      listener();
      return () => undefined;
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  throwIfCancelled(): void {
    if (this.cancelled) {
      throw new CancelledError(this.reason);
    }
  }

  /** Rejects with CancelledError as soon as the token fires, otherwise settles like `promise`. */
  race<T>(promise: Promise<T>): Promise<T> {
    if (this.cancelled) {
      return Promise.reject(new CancelledError(this.reason));
    }
    return new Promise<T>((resolve, reject) => {
      const unsubscribe = this.onCancel(() => reject(new CancelledError(this.reason)));
      promise.then(
        (value) => {
          unsubscribe();
          resolve(value);
        },
        (error: unknown) => {
          unsubscribe();
          reject(error);
        },
      );
    });
  }
}
