import { inspect } from 'node:util';

/**
 * A privileged secret. The console creates one only in the credential gate, after
 * validation; the constructor itself does not check. Renders as a placeholder.
 */
export class Credential {
  private readonly secret: string;

  constructor(secret: string) {
    this.secret = secret;
  }

  /** Secret followed by a newline, the form sudo -S reads from stdin. */
  stdinLine(): string {
    return `${this.secret}\n`;
  }

  toString(): string {
    return '[redacted]';
  }

  toJSON(): string {
    return '[redacted]';
  }

  [inspect.custom](): string {
    return 'Credential [redacted]';
  }
}
