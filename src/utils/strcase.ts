/**
 * String case conversion primitives.
 *
 * Input is split into words on delimiters (anything that is not a letter or
 * number) and on case boundaries:
 * - before an upper-case letter that follows a lower-case letter or a number
 *   (`userName` → `user`, `Name`; `Version2Name` → `Version2`, `Name`)
 * - before the last letter of an upper-case run that is followed by a
 *   lower-case letter (`HTTPServer` → `HTTP`, `Server`)
 * Numbers never start a word.
 *
 * The `go*` variants know Go's common initialisms: they keep a plural
 * initialism together (`UserIDs` → `User`, `IDs`) and write initialisms in
 * full upper case in camel and pascal output (`userID`, `HTTPServer`).
 */

const GO_INITIALISMS: ReadonlySet<string> = new Set([
  'ACL', 'API', 'ASCII', 'CPU', 'CSS', 'DNS', 'EOF', 'GUID', 'HTML', 'HTTP',
  'HTTPS', 'ID', 'IP', 'JSON', 'LHS', 'QPS', 'RAM', 'RHS', 'RPC', 'SLA',
  'SMTP', 'SQL', 'SSH', 'TCP', 'TLS', 'TTL', 'UDP', 'UI', 'UID', 'UUID',
  'URI', 'URL', 'UTF8', 'VM', 'XML', 'XMPP', 'XSRF', 'XSS',
]);

const WORD_CHAR = /[\p{L}\p{N}]/u;
const UPPER = /\p{Lu}/u;
const LOWER = /\p{Ll}/u;
const NUMBER = /\p{N}/u;

function isUpper(ch: string | undefined): boolean {
  return ch !== undefined && UPPER.test(ch);
}

function isLower(ch: string | undefined): boolean {
  return ch !== undefined && LOWER.test(ch);
}

function isNumber(ch: string | undefined): boolean {
  return ch !== undefined && NUMBER.test(ch);
}

export function isInitialism(word: string): boolean {
  return GO_INITIALISMS.has(word.toUpperCase());
}

/**
 * `IDs`, `URLs`: an initialism followed by a plural `s`.
 */
function isPluralInitialism(word: string): boolean {
  return word.length > 2 && word.slice(-1).toLowerCase() === 's' && isInitialism(word.slice(0, -1));
}

/**
 * Split an upper-case run made only of initialisms (`HTTPID` → `HTTP`, `ID`).
 * Returns undefined when the run cannot be covered exactly.
 */
export function segmentInitialisms(run: string): string[] | undefined {
  if (run === '') return [];
  for (let len = Math.min(5, run.length); len >= 2; len--) {
    const head = run.slice(0, len);
    if (head !== head.toUpperCase() || !isInitialism(head)) continue;
    const rest = segmentInitialisms(run.slice(len));
    if (rest) return [head, ...rest];
  }
  return undefined;
}

/**
 * Break an all-upper-case word (optionally with a plural `s`) into the
 * initialisms it is made of. Other words are returned unchanged.
 */
function splitInitialismRun(word: string): string[] {
  if (isInitialism(word) || isPluralInitialism(word)) {
    return [word];
  }
  const plural = word.length > 2 && word.endsWith('s');
  const stem = plural ? word.slice(0, -1) : word;
  const parts = segmentInitialisms(stem);
  if (!parts || parts.length < 2) {
    return [word];
  }
  if (plural) {
    parts[parts.length - 1] += 's';
  }
  return parts;
}

/**
 * Split a string into words.
 * @param goInitialisms keep plural initialisms together
 */
export function splitWords(input: string, goInitialisms = false): string[] {
  const chars = Array.from(input);
  const words: string[] = [];
  let current = '';

  const flush = (): void => {
    if (current !== '') {
      words.push(current);
      current = '';
    }
  };

  for (let i = 0; i < chars.length; i++) {
    const ch = chars[i];
    if (!WORD_CHAR.test(ch)) {
      flush();
      continue;
    }

    if (current !== '' && isUpper(ch)) {
      const prev = chars[i - 1];
      const next = chars[i + 1];
      if (isLower(prev) || isNumber(prev)) {
        flush();
      } else if (isUpper(prev) && isLower(next)) {
        const keepsPlural =
          goInitialisms &&
          next === 's' &&
          !isLower(chars[i + 2]) &&
          segmentInitialisms(current + ch) !== undefined;
        if (!keepsPlural) {
          flush();
        }
      }
    }

    current += ch;
  }

  flush();
  return goInitialisms ? words.flatMap(splitInitialismRun) : words;
}

function capitalize(word: string): string {
  const [first = '', ...rest] = Array.from(word);
  return first.toUpperCase() + rest.join('').toLowerCase();
}

/**
 * Title-case a word, writing initialisms in full upper case.
 */
function goCapitalize(word: string): string {
  if (isInitialism(word)) {
    return word.toUpperCase();
  }
  if (isPluralInitialism(word)) {
    return `${word.slice(0, -1).toUpperCase()}s`;
  }
  return capitalize(word);
}

/**
 * Camel and pascal output writes single letters (and, for Go, initialisms)
 * in upper case, so adjacent ones run together and split back differently.
 * Merge such a run into one word unless it reads back as the same
 * initialisms. A word that starts with a number is joined to the word
 * before it: numbers never start a word when the output is split again.
 */
function joinableWords(words: string[], goInitialisms: boolean): string[] {
  const joined: string[] = [];
  for (const word of words) {
    if (joined.length > 0 && isNumber(Array.from(word)[0])) {
      joined[joined.length - 1] += word;
    } else {
      joined.push(word);
    }
  }

  const merged: string[] = [];
  let run: string[] = [];
  const flushRun = (): void => {
    if (run.length > 1 && !readsBackAsInitialisms(run, goInitialisms)) {
      merged.push(run.join(''));
    } else {
      merged.push(...run);
    }
    run = [];
  };

  for (const word of joined) {
    if (!writesUpper(word, goInitialisms)) {
      flushRun();
      merged.push(word);
      continue;
    }
    run.push(word);
    // the plural `s` is lower case and ends the run
    if (goInitialisms && isPluralInitialism(word)) {
      flushRun();
    }
  }
  flushRun();
  return merged;
}

function writesUpper(word: string, goInitialisms: boolean): boolean {
  const chars = Array.from(word);
  if (chars.length === 1) {
    return isUpper(chars[0].toUpperCase());
  }
  return goInitialisms && (isInitialism(word) || isPluralInitialism(word));
}

function readsBackAsInitialisms(run: string[], goInitialisms: boolean): boolean {
  if (!goInitialisms) return false;
  const text = run.join('').toUpperCase();
  const stem = isPluralInitialism(run[run.length - 1]) ? text.slice(0, -1) : text;
  return segmentInitialisms(stem) !== undefined;
}

export function toCamel(input: string): string {
  return joinableWords(splitWords(input), false)
    .map((w, i) => (i === 0 ? w.toLowerCase() : capitalize(w)))
    .join('');
}

export function toPascal(input: string): string {
  return joinableWords(splitWords(input), false).map(capitalize).join('');
}

export function toSnake(input: string): string {
  return splitWords(input).map((w) => w.toLowerCase()).join('_');
}

export function toKebab(input: string): string {
  return splitWords(input).map((w) => w.toLowerCase()).join('-');
}

export function toGoCamel(input: string): string {
  return joinableWords(splitWords(input, true), true)
    .map((w, i) => (i === 0 ? w.toLowerCase() : goCapitalize(w)))
    .join('');
}

export function toGoPascal(input: string): string {
  return joinableWords(splitWords(input, true), true).map(goCapitalize).join('');
}

export function toGoSnake(input: string): string {
  return splitWords(input, true).map((w) => w.toLowerCase()).join('_');
}

export function toGoKebab(input: string): string {
  return splitWords(input, true).map((w) => w.toLowerCase()).join('-');
}
