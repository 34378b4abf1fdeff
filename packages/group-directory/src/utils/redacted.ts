/**
 * Wraps a sensitive value (a connection string, a password) so that it never
 * ends up in a log line or a serialized config dump.
 */
export class Redacted<T> {
  public constructor(public readonly value: T) {}

  public toString(): string {
    return '[Redacted]';
  }

  public toJSON(): string {
    return this.toString();
  }
}
