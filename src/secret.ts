// Sensitive values that must never reach a log line, a journal or stdout.
//
// The wrapped value is only reachable through reveal(); every printing path
// (template strings, JSON.stringify, console.log / util.inspect) yields the
// placeholder instead.

import { inspect } from 'util';

export const REDACTED = '[redacted]';

export class Sensitive<T> {
  readonly #value: T;

  constructor(value: T) {
    this.#value = value;
  }

  /** The only way to read the wrapped value. Call it at the point of use. */
  reveal(): T {
    return this.#value;
  }

  toString(): string {
    return REDACTED;
  }

  toJSON(): string {
    return REDACTED;
  }

  [inspect.custom](): string {
    return REDACTED;
  }
}
