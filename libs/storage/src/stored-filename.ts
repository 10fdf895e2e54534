import { randomBytes } from 'crypto';
import { extname } from 'path';

export const UPLOADS_PREFIX = 'uploads/';
export const OUTPUTS_PREFIX = 'outputs/';

const FALLBACK_BASE = 'upload';

/**
 * Reduces a client-supplied name to [A-Za-z0-9._-], collapsing whitespace to
 * underscores and stripping leading dots and underscores so the result can
 * never address a parent directory or a hidden file.
 */
export function sanitizeBaseName(name: string): string {
  return name
    .normalize('NFKD')
    .replace(/[^\x00-\x7f]/g, '')
    .trim()
    .replace(/\s+/g, '_')
    .replace(/[^A-Za-z0-9._-]/g, '')
    .replace(/^[._]+/, '');
}

/** Lower-cased extension without the dot; "" when there is none. */
export function extensionOf(filename: string): string {
  return extname(filename).slice(1).toLowerCase();
}

/** "<base>_<unix seconds>_<8 hex><ext>", unique per upload. */
export function buildStoredFilename(originalName: string, now: Date = new Date()): string {
  const ext = extname(originalName);
  const base = sanitizeBaseName(originalName.slice(0, originalName.length - ext.length)) || FALLBACK_BASE;
  const seconds = Math.floor(now.getTime() / 1000);
  const suffix = randomBytes(4).toString('hex');
  return `${base}_${seconds}_${suffix}${ext}`;
}

/** Stored filename without its extension; prefix of every derived artifact. */
export function artifactBase(storedFilename: string): string {
  return storedFilename.slice(0, storedFilename.length - extname(storedFilename).length);
}

/**
 * Name of the image stored for page `pageNumber` (1-based). Paginated
 * sources (PDF) get one file per page, single images a single file.
 */
export function pageImageName(storedFilename: string, pageNumber: number, paginated: boolean): string {
  const base = artifactBase(storedFilename);
  return paginated ? `${base}_page_${pageNumber}.png` : `${base}.png`;
}

export function textArtifactName(storedFilename: string): string {
  return `${artifactBase(storedFilename)}.txt`;
}

export function jsonArtifactName(storedFilename: string): string {
  return `${artifactBase(storedFilename)}.json`;
}

/** True when `name` is one of the derived artifacts of `storedFilename`. */
export function isDerivedArtifact(storedFilename: string, name: string): boolean {
  const base = artifactBase(storedFilename);
  if (!name.startsWith(base)) return false;

  const rest = name.slice(base.length);
  return rest === '.txt' || rest === '.json' || rest === '.png' || /^_page_[1-9]\d*\.png$/.test(rest);
}
