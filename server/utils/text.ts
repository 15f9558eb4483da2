const namedEntities: Record<string, string> = {
  nbsp: ' ',
  amp: '&',
  quot: '"',
  apos: "'",
  lt: '<',
  gt: '>',
  laquo: '«',
  raquo: '»',
  ldquo: '“',
  rdquo: '”',
  lsquo: '‘',
  rsquo: '’',
  ndash: '–',
  mdash: '—',
  hellip: '…',
  iexcl: '¡',
  iquest: '¿',
  aacute: 'á',
  eacute: 'é',
  iacute: 'í',
  oacute: 'ó',
  uacute: 'ú',
  ntilde: 'ñ',
  uuml: 'ü',
  Aacute: 'Á',
  Eacute: 'É',
  Iacute: 'Í',
  Oacute: 'Ó',
  Uacute: 'Ú',
  Ntilde: 'Ñ',
  Uuml: 'Ü',
};

const fromCodePoint = (code: number): string =>
  Number.isInteger(code) && code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : '';

export const decodeEntities = (text: string): string =>
  text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity[0] === '#') {
      const hex = entity[1] === 'x' || entity[1] === 'X';
      return fromCodePoint(Number.parseInt(entity.slice(hex ? 2 : 1), hex ? 16 : 10));
    }
    return namedEntities[entity] ?? match;
  });

export const normalizeWhitespace = (text: string): string => text.replace(/\s+/g, ' ').trim();

/** Any run of lines that are empty or whitespace-only becomes a single blank line. */
export const collapseBlankLines = (text: string): string => text.replace(/\n\s*\n+/g, '\n\n');

/** Break markers placed in DOM text before source whitespace is folded. */
export const LINE_BREAK = '\uE000';
export const PARAGRAPH_BREAK = '\uE001';

/**
 * Turns DOM text carrying break markers into plain text: source whitespace
 * folds to single spaces, markers become newlines, blank-line runs collapse.
 */
export const textFromMarkedBreaks = (text: string): string => {
  const lines = text
    .replace(/\s+/g, ' ')
    .replaceAll(LINE_BREAK, '\n')
    .replaceAll(PARAGRAPH_BREAK, '\n\n')
    .split('\n')
    .map((line) => normalizeWhitespace(line));
  return collapseBlankLines(lines.join('\n')).trim();
};

/** `H:MM:SS`, hours unbounded. */
export const formatDuration = (seconds: number): string => {
  const total = Math.max(0, Math.floor(Number.isFinite(seconds) ? seconds : 0));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  return `${hours}:${String(minutes).padStart(2, '0')}:${String(secs).padStart(2, '0')}`;
};

export const perSecond = (count: number, seconds: number): number =>
  seconds > 0 ? Number((count / seconds).toFixed(2)) : 0;
