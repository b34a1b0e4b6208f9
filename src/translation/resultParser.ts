import { ParsedTranslation, TranslationMap } from './types';

type Separator = '.' | ':';

export interface IndexedLine {
  index: number;
  separator: Separator;
  payload: string;
}

// Period style is tried first
const INDEXED_LINE_PATTERNS: Array<[Separator, RegExp]> = [
  ['.', /^(\d+)\. (.*)$/],
  [':', /^(\d+): (.*)$/],
];

const COMMENTARY_PATTERN = /^(#|以下是|翻译(结果|如下)|here (is|are)\b|translations?:)/i;

/**
 * Recognizes "<n>. text" and "<n>: text" lines
 */
export function parseIndexedLine(line: string): IndexedLine | null {
  for (const [separator, pattern] of INDEXED_LINE_PATTERNS) {
    const match = pattern.exec(line);
    if (match?.[1] !== undefined) {
      return {
        index: parseInt(match[1], 10),
        separator,
        payload: (match[2] ?? '').trim(),
      };
    }
  }
  return null;
}

function isCommentary(line: string): boolean {
  return COMMENTARY_PATTERN.test(line);
}

/**
 * Parses a free-form translator response into per-index bilingual units.
 *
 * Each indexed line is paired with the line after it when that line is either the same
 * index in the same separator style, or plain text. An indexed line without a partner is
 * still recorded on its own but makes the result format-invalid.
 *
 * @example
 * parseBilingualResult('1: Hello\n你好\n2: World\n世界')
 * // { translations: Map { 1 => 'Hello\n你好', 2 => 'World\n世界' }, formatValid: true }
 */
export function parseBilingualResult(text: string): ParsedTranslation {
  const lines = text
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line && !isCommentary(line));

  const translations: TranslationMap = new Map();
  let allPaired = true;

  let i = 0;
  while (i < lines.length) {
    const current = parseIndexedLine(lines[i] ?? '');
    if (!current) {
      // Stray text not attached to any index
      i += 1;
      continue;
    }

    const nextLine = lines[i + 1];
    const next = nextLine === undefined ? null : parseIndexedLine(nextLine);

    if (next && next.index === current.index && next.separator === current.separator) {
      translations.set(current.index, `${current.payload}\n${next.payload}`);
      i += 2;
    } else if (nextLine !== undefined && !next) {
      translations.set(current.index, `${current.payload}\n${nextLine}`);
      i += 2;
    } else {
      translations.set(current.index, current.payload);
      allPaired = false;
      i += 1;
    }
  }

  return {
    translations,
    formatValid: allPaired && translations.size > 0,
  };
}
