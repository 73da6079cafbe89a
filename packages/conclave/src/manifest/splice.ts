import type { ArraySpan, ArrayElement } from './scan.js';

export interface TextSplice {
  readonly start: number;
  readonly end: number;
  readonly insert: string;
}

const DEFAULT_INDENT = '    ';

/** Apply non-overlapping splices, right to left so offsets stay valid. */
export function applySplices(text: string, splices: readonly TextSplice[]): string {
  let out = text;
  for (const sp of [...splices].sort((a, b) => b.start - a.start)) {
    out = out.slice(0, sp.start) + sp.insert + out.slice(sp.end);
  }
  return out;
}

export function detectEol(text: string): '\r\n' | '\n' {
  return text.includes('\r\n') ? '\r\n' : '\n';
}

/**
 * Render a requirement as a TOML string. Single quotes when the surrounding
 * list uses them and the value allows it; JSON escaping is valid TOML otherwise.
 */
export function quoteRequirement(value: string, style: '"' | "'" | null): string {
  if (style === "'" && !/['\x00-\x1f\x7f]/.test(value)) return `'${value}'`;
  return JSON.stringify(value);
}

function lineStart(text: string, pos: number): number {
  return text.lastIndexOf('\n', pos - 1) + 1;
}

/** Leading whitespace of the element's line, or null when other text precedes it. */
function ownLineIndent(text: string, el: ArrayElement): string | null {
  const prefix = text.slice(lineStart(text, el.start), el.start);
  return /^[ \t]*$/.test(prefix) ? prefix : null;
}

function guessIndent(text: string, span: ArraySpan): string {
  for (let i = span.elements.length - 1; i >= 0; i--) {
    const indent = ownLineIndent(text, span.elements[i]);
    if (indent) return indent;
  }
  return DEFAULT_INDENT;
}

interface Trailer {
  /** Index of the comma after the element, or -1. */
  comma: number;
  /** Position after the comma and any comment: a line break, `]`, or more content. */
  end: number;
  atLineEnd: boolean;
}

function trailerOf(text: string, el: ArrayElement): Trailer {
  let p = el.end;
  const skipSpace = () => { while (text[p] === ' ' || text[p] === '\t') p++; };
  skipSpace();
  let comma = -1;
  if (text[p] === ',') {
    comma = p;
    p++;
    skipSpace();
  }
  if (text[p] === '#') {
    while (p < text.length && text[p] !== '\n' && text[p] !== '\r') p++;
  }
  return { comma, end: p, atLineEnd: text[p] === '\n' || text[p] === '\r' };
}

export function quoteStyleOf(span: ArraySpan): '"' | "'" | null {
  return span.elements.length > 0 ? span.elements[span.elements.length - 1].quote : null;
}

/** Append `literal` as the last element, following the list's one-line or one-per-line layout. */
export function appendElement(text: string, span: ArraySpan, literal: string, eol: string): TextSplice[] {
  const multiline = text.slice(span.open, span.close).includes('\n');
  const last = span.elements[span.elements.length - 1];

  if (!last) {
    if (!multiline) return [{ start: span.open + 1, end: span.close, insert: literal }];
    const closeLine = lineStart(text, span.close);
    if (/^[ \t]*$/.test(text.slice(closeLine, span.close))) {
      return [{ start: closeLine, end: closeLine, insert: `${DEFAULT_INDENT}${literal},${eol}` }];
    }
    return [{ start: span.close, end: span.close, insert: `${eol}${DEFAULT_INDENT}${literal},${eol}` }];
  }

  if (!multiline) return [{ start: last.end, end: last.end, insert: `, ${literal}` }];

  const indent = guessIndent(text, span);
  const trailer = trailerOf(text, last);
  if (!trailer.atLineEnd) {
    // `]` (or another value) shares the last element's line.
    if (trailer.comma >= 0) {
      return [{ start: trailer.comma + 1, end: trailer.comma + 1, insert: `${eol}${indent}${literal},` }];
    }
    return [{ start: last.end, end: last.end, insert: `,${eol}${indent}${literal}` }];
  }
  if (trailer.comma >= 0) {
    return [{ start: trailer.end, end: trailer.end, insert: `${eol}${indent}${literal},` }];
  }
  return [
    { start: last.end, end: last.end, insert: ',' },
    { start: trailer.end, end: trailer.end, insert: `${eol}${indent}${literal}` },
  ];
}

export function replaceElement(span: ArraySpan, index: number, literal: string): TextSplice[] {
  const el = span.elements[index];
  return [{ start: el.start, end: el.end, insert: literal }];
}

/** Remove one element: its whole line when it sits alone on one, else the element and one separator. */
export function removeElement(text: string, span: ArraySpan, index: number): TextSplice[] {
  const el = span.elements[index];
  const trailer = trailerOf(text, el);

  if (ownLineIndent(text, el) !== null && trailer.atLineEnd) {
    const start = lineStart(text, el.start);
    const end = text.startsWith('\r\n', trailer.end) ? trailer.end + 2 : trailer.end + 1;
    return [{ start, end, insert: '' }];
  }

  const isLast = index === span.elements.length - 1;
  if (isLast && index > 0) {
    return [{ start: span.elements[index - 1].end, end: el.end, insert: '' }];
  }
  let end = el.end;
  if (trailer.comma >= 0) {
    end = trailer.comma + 1;
    while (text[end] === ' ' || text[end] === '\t') end++;
  }
  return [{ start: el.start, end, insert: '' }];
}
