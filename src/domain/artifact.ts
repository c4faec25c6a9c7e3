/**
 * Artifact domain model.
 *
 * An artifact is one generated document plus its metadata. The store owns
 * the bytes from creation until the artifact is evicted or expires; callers
 * only ever receive copies.
 */

import { DocumentType, FILE_EXTENSIONS } from './document';

/** Artifact metadata, without the document bytes. */
export interface ArtifactSummary {
  id: string;
  filename: string;
  documentType: DocumentType;
  contentType: string;
  sizeBytes: number;
  createdAt: string;
  /** Absent when the store does not expire artifacts. */
  expiresAt?: string;
}

/** A stored document. */
export interface Artifact extends ArtifactSummary {
  content: Buffer;
}

/** Input to ArtifactStore.put(). */
export interface NewArtifact {
  content: Buffer;
  documentType: DocumentType;
  /** Base name without extension; sanitized by the store. */
  suggestedFilename: string;
}

const MAX_FILENAME_STEM_LENGTH = 50;
const FALLBACK_FILENAME_STEM = 'document';

/**
 * Reduce a document title to a filename stem.
 *
 * Keeps letters, digits, spaces, hyphens and underscores, joins whitespace
 * runs with a hyphen and truncates to 50 characters.
 *
 * @example
 * ```ts
 * toFilenameStem('Q3 Report: Final!'); // 'Q3-Report-Final'
 * ```
 */
export function toFilenameStem(title: string): string {
  const stem = title
    .replace(/[^A-Za-z0-9 _-]/g, '')
    .trim()
    .split(/\s+/)
    .filter(Boolean)
    .join('-')
    .slice(0, MAX_FILENAME_STEM_LENGTH)
    .replace(/^[-_]+|[-_]+$/g, '');
  return stem || FALLBACK_FILENAME_STEM;
}

/**
 * Pick the first free filename for a stem: `stem.ext`, then `stem-2.ext`,
 * `stem-3.ext` and so on. Suffixes below `firstSuffix` are skipped; the
 * returned `nextSuffix` is where the following search for this stem can
 * start.
 */
export function resolveFilename(
  stem: string,
  documentType: DocumentType,
  isTaken: (filename: string) => boolean,
  firstSuffix = 2,
): { filename: string; nextSuffix: number } {
  const ext = FILE_EXTENSIONS[documentType];
  const bare = `${stem}${ext}`;
  if (!isTaken(bare)) return { filename: bare, nextSuffix: firstSuffix };

  let n = Math.max(firstSuffix, 2);
  while (isTaken(`${stem}-${n}${ext}`)) n++;
  return { filename: `${stem}-${n}${ext}`, nextSuffix: n + 1 };
}
