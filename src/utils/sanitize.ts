/**
 * Text sanitization and matching helpers shared by every interpreter.
 *
 * Interpreters match against a folded form of the message (lowercase, no
 * diacritics, single spaces) that keeps the same length as the display form,
 * so a match index in one is a valid index in the other.
 */

/**
 * Control and invisible characters, except tab and newline
 */
const INVISIBLE_CHARS_PATTERN = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F\u00AD\u200B-\u200F\u2028-\u202F\u2060-\u206F\uFEFF]/g;

const COMBINING_MARKS_PATTERN = /[\u0300-\u036f]/g;

const DEFAULT_MAX_STRING_LENGTH = 10000;

export interface SanitizeStringOptions {
  /** Maximum length (default: 10000) */
  maxLength?: number;
  /** Collapse runs of whitespace, newlines included, into one space (default: false) */
  collapseWhitespace?: boolean;
}

/**
 * Clean raw user input: bounded length, NFC form, no invisible characters, trimmed.
 */
export function sanitizeString(input: string, options: SanitizeStringOptions = {}): string {
  const { maxLength = DEFAULT_MAX_STRING_LENGTH, collapseWhitespace = false } = options;

  let result = input.length > maxLength ? input.slice(0, maxLength) : input;
  result = result.normalize('NFC').replace(INVISIBLE_CHARS_PATTERN, '');

  if (collapseWhitespace) {
    result = result.replace(/\s+/g, ' ');
  }

  return result.trim();
}

/**
 * Lowercase and strip diacritics one UTF-16 unit at a time, keeping the length.
 */
function foldAligned(text: string): string {
  let out = '';
  for (const unit of text.split('')) {
    const folded = unit.toLowerCase().normalize('NFD').replace(COMBINING_MARKS_PATTERN, '');
    out += folded.length === 1 ? folded : unit;
  }
  return out;
}

/**
 * Case and diacritic insensitive form used for all matching
 */
export function normalizeText(input: string): string {
  return foldAligned(sanitizeString(input, { collapseWhitespace: true }));
}

export interface AlignedText {
  /** Sanitized text with collapsed whitespace, original casing and accents */
  display: string;
  /** Folded copy of `display`, same length */
  folded: string;
}

export function alignText(input: string): AlignedText {
  const display = sanitizeString(input, { collapseWhitespace: true });
  return { display, folded: foldAligned(display) };
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compile a phrase into a whole-word pattern over folded text.
 * Word boundaries are only enforced on sides that end in a word character,
 * so abbreviations such as "art." still match.
 */
export function phrasePattern(phrase: string): RegExp {
  const folded = normalizeText(phrase);
  const start = /^\w/.test(folded) ? '\\b' : '';
  const end = /\w$/.test(folded) ? '\\b' : '';
  return new RegExp(`${start}${escapeRegExp(folded).replace(/ /g, '\\s+')}${end}`);
}

export function compilePhrases(phrases: readonly string[]): RegExp[] {
  return phrases.map(phrasePattern);
}

export function matchesAny(folded: string, patterns: readonly RegExp[]): boolean {
  return patterns.some((pattern) => pattern.test(folded));
}

/**
 * Earliest match among the patterns, or null
 */
export function firstMatch(folded: string, patterns: readonly RegExp[]): RegExpExecArray | null {
  let best: RegExpExecArray | null = null;
  for (const pattern of patterns) {
    const match = pattern.exec(folded);
    if (match && (best === null || match.index < best.index)) {
      best = match;
    }
  }
  return best;
}

/**
 * Truncate on a character budget without cutting a word in half when avoidable
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  const cut = text.slice(0, maxLength);
  const lastSpace = cut.lastIndexOf(' ');
  return (lastSpace > maxLength * 0.6 ? cut.slice(0, lastSpace) : cut).trim();
}
