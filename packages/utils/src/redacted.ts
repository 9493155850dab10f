/**
 * Holds a secret (keys, cookie values) so that it never ends up in a log line or an error message.
 */
export class Redacted<T> {
  public constructor(public readonly value: T) {}

  public map<U>(transform: (value: T) => U): Redacted<U> {
    return new Redacted(transform(this.value));
  }

  public toString() {
    return '[Redacted]';
  }

  // pino and JSON.stringify both go through here
  public toJSON() {
    return this.toString();
  }
}
