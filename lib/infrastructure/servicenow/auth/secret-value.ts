import { inspect } from "node:util";

const HIDDEN = "***HIDDEN***";

/**
 * Holds a credential without exposing it through string conversion,
 * JSON serialization or console inspection. Only `reveal()` returns the raw value.
 */
export class SecretValue {
  readonly #value: string;

  constructor(value: string) {
    this.#value = value;
  }

  reveal(): string {
    return this.#value;
  }

  isEmpty(): boolean {
    return this.#value.length === 0;
  }

  toString(): string {
    return HIDDEN;
  }

  toJSON(): string {
    return HIDDEN;
  }

  [inspect.custom](): string {
    return `SecretValue(${HIDDEN})`;
  }
}
