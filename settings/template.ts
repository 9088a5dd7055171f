/**
 * ---------------------------------------------------------
 * Strict {{placeholder}} rendering
 * ---------------------------------------------------------
 */

export class TemplateError extends Error {
  constructor(message: string, readonly offset: number) {
    super(message);
    this.name = "TemplateError";
  }
}

export class MissingPlaceholderError extends Error {
  constructor(readonly key: string) {
    super(`No value bound for template placeholder "${key}"`);
    this.name = "MissingPlaceholderError";
  }
}

const OPEN = "{{";
const CLOSE = "}}";
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Replaces every `{{ key }}` with `values[key]`. Unbound keys and malformed
 * markers throw instead of rendering as empty text. Substituted values are
 * copied through verbatim and never scanned for markers themselves.
 */
export function renderTemplate(
  template: string,
  values: Readonly<Record<string, string>>
): string {
  let out = "";
  let cursor = 0;

  while (cursor < template.length) {
    const start = template.indexOf(OPEN, cursor);
    if (start === -1) {
      out += template.slice(cursor);
      break;
    }

    const end = template.indexOf(CLOSE, start + OPEN.length);
    if (end === -1) {
      throw new TemplateError(`Unclosed placeholder at offset ${start}`, start);
    }

    const key = template.slice(start + OPEN.length, end).trim();
    if (!IDENTIFIER.test(key)) {
      throw new TemplateError(
        `Invalid placeholder "${template.slice(start, end + CLOSE.length)}" at offset ${start}`,
        start
      );
    }

    if (!Object.prototype.hasOwnProperty.call(values, key)) {
      throw new MissingPlaceholderError(key);
    }

    out += template.slice(cursor, start) + values[key];
    cursor = end + CLOSE.length;
  }

  return out;
}
