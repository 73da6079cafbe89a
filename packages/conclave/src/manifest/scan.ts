/**
 * Layout scanner for TOML text. It does not build values (smol-toml does that);
 * it records where tables, keys and array elements sit so edits can splice the
 * raw text and leave every other byte alone.
 */

export interface KeyValue {
  readonly key: readonly string[];
  readonly start: number;
  readonly valueStart: number;
  readonly valueEnd: number;
  /** Position of the line break (or end of text) after the value and any comment. */
  readonly lineEnd: number;
}

export interface TableSection {
  /** Header path; empty for the root table before the first header. */
  readonly path: readonly string[];
  readonly isArrayTable: boolean;
  /** Line end of the header, or 0 for the root table. */
  readonly headerLineEnd: number;
  readonly pairs: readonly KeyValue[];
}

export interface ArrayElement {
  readonly start: number;
  readonly end: number;
  /** Quote character of a single-line string element, else null. */
  readonly quote: '"' | "'" | null;
}

export interface ArraySpan {
  /** Index of `[`. */
  readonly open: number;
  /** Index of the matching `]`. */
  readonly close: number;
  readonly elements: readonly ArrayElement[];
}

export class TomlLayoutError extends Error {
  constructor(message: string, readonly offset: number) {
    super(`${message} (offset ${offset})`);
    this.name = 'TomlLayoutError';
  }
}

const BARE_KEY_CHAR = /[A-Za-z0-9_-]/;

class Scanner {
  pos: number;

  constructor(readonly text: string, start = 0) {
    this.pos = start;
  }

  peek(offset = 0): string {
    return this.text[this.pos + offset] ?? '';
  }

  eof(): boolean {
    return this.pos >= this.text.length;
  }

  startsWith(s: string): boolean {
    return this.text.startsWith(s, this.pos);
  }

  fail(message: string): never {
    throw new TomlLayoutError(message, this.pos);
  }

  expect(ch: string): void {
    if (this.peek() !== ch) this.fail(`Expected '${ch}'`);
    this.pos++;
  }

  skipInlineSpace(): void {
    while (this.peek() === ' ' || this.peek() === '\t') this.pos++;
  }

  skipComment(): void {
    if (this.peek() !== '#') return;
    while (!this.eof() && this.peek() !== '\n' && this.peek() !== '\r') this.pos++;
  }

  /** Whitespace, newlines and comments. */
  skipBlank(): void {
    for (;;) {
      const ch = this.peek();
      if (ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n') {
        this.pos++;
      } else if (ch === '#') {
        this.skipComment();
      } else {
        return;
      }
    }
  }

  /** After a statement: optional comment, then a line break or end of text. */
  endStatement(): number {
    this.skipInlineSpace();
    this.skipComment();
    const lineEnd = this.pos;
    if (this.eof()) return lineEnd;
    if (this.startsWith('\r\n')) {
      this.pos += 2;
    } else if (this.peek() === '\n') {
      this.pos++;
    } else {
      this.fail('Expected end of line');
    }
    return lineEnd;
  }

  readKey(): string[] {
    const segments: string[] = [];
    for (;;) {
      this.skipInlineSpace();
      const ch = this.peek();
      if (ch === '"') {
        const start = this.pos;
        this.skipBasicString();
        segments.push(decodeBasic(this.text.slice(start + 1, this.pos - 1)));
      } else if (ch === "'") {
        const start = this.pos;
        this.skipLiteralString();
        segments.push(this.text.slice(start + 1, this.pos - 1));
      } else {
        const start = this.pos;
        while (BARE_KEY_CHAR.test(this.peek())) this.pos++;
        if (this.pos === start) this.fail('Expected a key');
        segments.push(this.text.slice(start, this.pos));
      }
      this.skipInlineSpace();
      if (this.peek() !== '.') return segments;
      this.pos++;
    }
  }

  skipBasicString(): void {
    this.pos++;
    for (;;) {
      const ch = this.peek();
      if (ch === '' || ch === '\n') this.fail('Unterminated string');
      if (ch === '\\') {
        this.pos += 2;
      } else {
        this.pos++;
        if (ch === '"') return;
      }
    }
  }

  skipLiteralString(): void {
    this.pos++;
    for (;;) {
      const ch = this.peek();
      if (ch === '' || ch === '\n') this.fail('Unterminated string');
      this.pos++;
      if (ch === "'") return;
    }
  }

  skipMultilineString(delimiter: '"""' | "'''"): void {
    const quote = delimiter[0];
    this.pos += 3;
    while (!this.eof()) {
      if (quote === '"' && this.peek() === '\\') {
        this.pos += 2;
        continue;
      }
      if (this.startsWith(delimiter)) {
        this.pos += 3;
        // Up to two quotes may sit right before the closing delimiter.
        for (let extra = 0; extra < 2 && this.peek() === quote; extra++) this.pos++;
        return;
      }
      this.pos++;
    }
    this.fail('Unterminated multi-line string');
  }

  skipValue(inContainer: boolean): void {
    const ch = this.peek();
    if (this.startsWith('"""')) return this.skipMultilineString('"""');
    if (this.startsWith("'''")) return this.skipMultilineString("'''");
    if (ch === '"') return this.skipBasicString();
    if (ch === "'") return this.skipLiteralString();
    if (ch === '[') {
      this.readArray();
      return;
    }
    if (ch === '{') return this.skipInlineTable();
    this.skipScalar(inContainer);
  }

  skipScalar(inContainer: boolean): void {
    const start = this.pos;
    for (;;) {
      const ch = this.peek();
      if (ch === '' || ch === '\n' || ch === '\r' || ch === '#') break;
      if (inContainer && (ch === ',' || ch === ']' || ch === '}')) break;
      this.pos++;
    }
    // Trailing spaces belong to the separator, not the value.
    while (this.pos > start && (this.text[this.pos - 1] === ' ' || this.text[this.pos - 1] === '\t')) this.pos--;
    if (this.pos === start) this.fail('Expected a value');
  }

  readArray(): ArraySpan {
    const open = this.pos;
    this.expect('[');
    const elements: ArrayElement[] = [];
    for (;;) {
      this.skipBlank();
      if (this.peek() === ']') {
        const close = this.pos;
        this.pos++;
        return { open, close, elements };
      }
      if (this.eof()) this.fail('Unterminated array');
      const start = this.pos;
      const triple = this.startsWith('"""') || this.startsWith("'''");
      const first = this.peek();
      this.skipValue(true);
      const quote = !triple && (first === '"' || first === "'") ? first : null;
      elements.push({ start, end: this.pos, quote });
      this.skipBlank();
      if (this.peek() === ',') {
        this.pos++;
      } else if (this.peek() !== ']') {
        this.fail("Expected ',' or ']' in array");
      }
    }
  }

  skipInlineTable(): void {
    this.expect('{');
    for (;;) {
      this.skipBlank();
      if (this.peek() === '}') {
        this.pos++;
        return;
      }
      if (this.eof()) this.fail('Unterminated inline table');
      this.readKey();
      this.expect('=');
      this.skipInlineSpace();
      this.skipValue(true);
      this.skipBlank();
      if (this.peek() === ',') {
        this.pos++;
      } else if (this.peek() !== '}') {
        this.fail("Expected ',' or '}' in inline table");
      }
    }
  }
}

const ESCAPES: Record<string, string> = {
  b: '\b', t: '\t', n: '\n', f: '\f', r: '\r', '"': '"', '\\': '\\',
};

function decodeBasic(body: string): string {
  return body.replace(/\\(u[0-9A-Fa-f]{4}|U[0-9A-Fa-f]{8}|.)/g, (whole, esc: string) => {
    if (esc.length > 1) return String.fromCodePoint(parseInt(esc.slice(1), 16));
    return ESCAPES[esc] ?? whole;
  });
}

/**
 * Split a TOML document into its root table and header sections, recording
 * the position of every key/value pair.
 */
export function scanTables(text: string): TableSection[] {
  const s = new Scanner(text);
  const sections: { path: readonly string[]; isArrayTable: boolean; headerLineEnd: number; pairs: KeyValue[] }[] = [
    { path: [], isArrayTable: false, headerLineEnd: 0, pairs: [] },
  ];
  let current = sections[0];

  // A leading byte-order mark is not part of the first statement.
  if (s.peek() === '\uFEFF') s.pos++;
  s.skipBlank();
  while (!s.eof()) {
    if (s.peek() === '[') {
      const isArrayTable = s.peek(1) === '[';
      s.pos += isArrayTable ? 2 : 1;
      const path = s.readKey();
      s.expect(']');
      if (isArrayTable) s.expect(']');
      const headerLineEnd = s.endStatement();
      current = { path, isArrayTable, headerLineEnd, pairs: [] };
      sections.push(current);
    } else {
      const start = s.pos;
      const key = s.readKey();
      s.expect('=');
      s.skipInlineSpace();
      const valueStart = s.pos;
      s.skipValue(false);
      const valueEnd = s.pos;
      const lineEnd = s.endStatement();
      current.pairs.push({ key, start, valueStart, valueEnd, lineEnd });
    }
    s.skipBlank();
  }
  return sections;
}

/** Element layout of the array literal starting at `open`. */
export function scanArray(text: string, open: number): ArraySpan {
  return new Scanner(text, open).readArray();
}

export function sameKey(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((seg, i) => seg === b[i]);
}
