/** A promise whose settlement the test controls. */
export class Deferred<T> {
  resolve: (value: T) => void = () => undefined;
  reject: (err: Error) => void = () => undefined;
  readonly promise = new Promise<T>((resolve, reject) => {
    this.resolve = resolve;
    this.reject = reject;
  });
}

/** Lets every queued microtask and I/O callback run. */
export const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

// 56 base32 characters, the length of a v3 onion address
export const ONION = `${'abcdefgh234567'.repeat(4)}.onion`;
