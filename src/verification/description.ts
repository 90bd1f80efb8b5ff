import { safeToString } from './safe.js';

type Part = { kind: 'text'; text: string } | { kind: 'value'; value: unknown };

/**
 * Mismatch text accumulator. Values are kept as-is and only rendered when the
 * description is turned into a string, which happens on failure reporting.
 */
export class Description {
  private parts: Part[] = [];
  private thrown: unknown;
  private hasThrown = false;

  appendText(text: string): this {
    this.parts.push({ kind: 'text', text });
    return this;
  }

  /**
   * Start a new reason, separated from any earlier one.
   */
  appendClause(text: string): this {
    if (this.parts.length > 0) {
      this.parts.push({ kind: 'text', text: ', ' });
    }
    return this.appendText(text);
  }

  appendValue(value: unknown): this {
    this.parts.push({ kind: 'value', value });
    return this;
  }

  /**
   * Append a value thrown during evaluation. The first one is kept as the cause.
   */
  appendThrown(error: unknown): this {
    return this.recordCause(error).appendValue(error);
  }

  recordCause(error: unknown): this {
    if (!this.hasThrown) {
      this.thrown = error;
      this.hasThrown = true;
    }
    return this;
  }

  get cause(): unknown {
    return this.thrown;
  }

  get isEmpty(): boolean {
    return this.parts.length === 0;
  }

  toString(): string {
    return this.parts
      .map(part => (part.kind === 'text' ? part.text : formatValue(part.value)))
      .join('');
  }
}

/**
 * Strings are quoted so that they stand apart from the surrounding prose.
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (value instanceof Error) {
    return `<${safeToString(value)}>`;
  }
  return safeToString(value);
}
