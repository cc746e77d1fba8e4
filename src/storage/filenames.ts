// Filenames - timestamped, filesystem-safe names for generated documents

const MAX_DERIVED_LENGTH = 30;
const FALLBACK_NAME = 'dokument';
const MARKDOWN_SYMBOLS = ['#', '*', '_', '`', '>', '-', '|', '[', ']', '(', ')'];

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/** yyMMdd in local time */
export function formatDateStamp(date: Date): string {
  return `${pad(date.getFullYear() % 100)}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}

/** yyMMdd_HHmm in local time */
export function formatTimestamp(date: Date): string {
  return `${formatDateStamp(date)}_${pad(date.getHours())}${pad(date.getMinutes())}`;
}

/**
 * Keep letters, digits, spaces, hyphens and underscores; spaces become underscores.
 */
function keepSafeCharacters(value: string): string {
  return Array.from(value)
    .filter((char) => /[\p{L}\p{N} _-]/u.test(char))
    .join('')
    .replace(/ /g, '_');
}

export function sanitizeCustomName(name: string): string {
  const stem = name.replaceAll('.docx', '').replaceAll('.doc', '');
  return keepSafeCharacters(stem).replace(/^_+|_+$/g, '');
}

/**
 * Name derived from the first non-blank line with markdown symbols removed,
 * cut to 30 characters.
 */
export function deriveNameFromText(text: string): string {
  const firstLine = text.split('\n').map((line) => line.trim()).find((line) => line.length > 0);
  if (!firstLine) {
    return FALLBACK_NAME;
  }

  let cleaned = firstLine;
  for (const symbol of MARKDOWN_SYMBOLS) {
    cleaned = cleaned.replaceAll(symbol, '');
  }

  const safe = Array.from(keepSafeCharacters(cleaned.trim())).slice(0, MAX_DERIVED_LENGTH).join('');
  return safe || FALLBACK_NAME;
}

export interface DocumentFilenames {
  docx: string;
  txt: string;
}

export function buildFilenames(text: string, customName: string | undefined, now: Date): DocumentFilenames {
  const custom = customName ? sanitizeCustomName(customName) : '';
  const stem = `${formatTimestamp(now)}_${custom || deriveNameFromText(text)}`;
  return { docx: `${stem}.docx`, txt: `${stem}.txt` };
}

/**
 * Plain file names only: no directory separators and no parent references.
 */
export function isSafeFilename(filename: string): boolean {
  return filename.length > 0 && !/[\\/]/.test(filename) && filename !== '.' && !filename.includes('..');
}
