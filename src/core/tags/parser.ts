/**
 * Struct tag parsing.
 *
 * Grammar follows Go's reflect.StructTag: space-separated `key:"value"`
 * entries, where key is a run of non-control, non-space characters other
 * than `:` and `"`, and value is a Go double-quoted string literal.
 * Scanning stops at the first syntax error; anything after it is unreadable.
 */

export interface StructTagEntry {
  key: string;
  /** Unquoted value, options included (`name,omitempty`) */
  value: string;
}

const SIMPLE_ESCAPES: Record<string, string> = {
  a: '\x07',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
  '\\': '\\',
  '"': '"',
};

const HEX_ESCAPE_LENGTHS: Record<string, number> = { x: 2, u: 4, U: 8 };

/**
 * Unquote a Go interpreted string literal, quotes included.
 * Returns undefined when the literal is invalid.
 */
export function unquoteGoString(quoted: string): string | undefined {
  if (quoted.length < 2 || !quoted.startsWith('"') || !quoted.endsWith('"')) {
    return undefined;
  }

  const body = quoted.slice(1, -1);
  let out = '';
  let i = 0;

  while (i < body.length) {
    const ch = body[i];
    if (ch === '"' || ch === '\n') return undefined;
    if (ch !== '\\') {
      out += ch;
      i++;
      continue;
    }

    const esc = body[i + 1];
    if (esc === undefined) return undefined;

    const simple = SIMPLE_ESCAPES[esc];
    if (simple !== undefined) {
      out += simple;
      i += 2;
      continue;
    }

    const hexLength = HEX_ESCAPE_LENGTHS[esc];
    if (hexLength !== undefined) {
      const digits = body.slice(i + 2, i + 2 + hexLength);
      if (digits.length !== hexLength || !/^[0-9a-fA-F]+$/.test(digits)) return undefined;
      const code = parseInt(digits, 16);
      if (code > 0x10ffff || (code >= 0xd800 && code <= 0xdfff && esc !== 'x')) return undefined;
      out += String.fromCodePoint(code);
      i += 2 + hexLength;
      continue;
    }

    if (esc >= '0' && esc <= '7') {
      const digits = body.slice(i + 1, i + 4);
      if (!/^[0-7]{3}$/.test(digits)) return undefined;
      const code = parseInt(digits, 8);
      if (code > 0xff) return undefined;
      out += String.fromCharCode(code);
      i += 4;
      continue;
    }

    return undefined;
  }

  return out;
}

function isKeyChar(ch: string): boolean {
  return ch > ' ' && ch !== ':' && ch !== '"' && ch !== '\x7f';
}

/**
 * Strip the backtick delimiters of a raw tag literal.
 */
export function stripTagQuotes(rawTag: string): string {
  return rawTag.replace(/^`+|`+$/g, '');
}

interface RawTagEntry {
  key: string;
  /** Value literal with its double quotes, still escaped */
  quoted: string;
}

/**
 * Yield `key:"value"` entries until the tag ends or a syntax error is hit.
 * Values are not unquoted here; an invalid escape only matters for the
 * entry that is actually read.
 */
function* scanStructTag(rawTag: string): Generator<RawTagEntry> {
  let tag = stripTagQuotes(rawTag);

  while (tag !== '') {
    let i = 0;
    while (i < tag.length && tag[i] === ' ') i++;
    tag = tag.slice(i);
    if (tag === '') return;

    i = 0;
    while (i < tag.length && isKeyChar(tag[i])) i++;
    if (i === 0 || i + 1 >= tag.length || tag[i] !== ':' || tag[i + 1] !== '"') return;
    const key = tag.slice(0, i);
    tag = tag.slice(i + 1);

    // Scan to the closing quote, skipping escaped characters
    i = 1;
    while (i < tag.length && tag[i] !== '"') {
      if (tag[i] === '\\') i++;
      i++;
    }
    if (i >= tag.length) return;
    yield { key, quoted: tag.slice(0, i + 1) };
    tag = tag.slice(i + 1);
  }
}

/**
 * Parse every well-formed entry of a raw tag literal, in order.
 */
export function parseStructTag(rawTag: string): StructTagEntry[] {
  const entries: StructTagEntry[] = [];
  for (const { key, quoted } of scanStructTag(rawTag)) {
    const value = unquoteGoString(quoted);
    if (value === undefined) break;
    entries.push({ key, value });
  }
  return entries;
}

/**
 * Look up `key` and return the first comma-separated segment of its value.
 * Returns undefined when the key is absent, when the tag is malformed before
 * it, or when its value is not a valid string literal.
 */
export function lookupTagValue(rawTag: string, key: string): string | undefined {
  for (const entry of scanStructTag(rawTag)) {
    if (entry.key !== key) continue;
    const value = unquoteGoString(entry.quoted);
    return value === undefined ? undefined : value.split(',')[0];
  }
  return undefined;
}
