import { randomUUID } from 'node:crypto';
import { basename, extname } from 'node:path';
import { NotFoundError } from '../errors';
import type { FileRecordRepository } from './repository';
import type { FileRecord } from './types';

const MAX_KEY_ATTEMPTS = 5;
const MAX_KB_SEGMENT_LENGTH = 32;
const MAX_EXTENSION_LENGTH = 10;

export type TokenGenerator = () => string;

export type FileLookup = {
  /** Safe key, original name (with knowledgeBase), or "<kb>_<original name>". */
  key: string;
  knowledgeBase?: string;
};

export type FileMatchKind = 'safe_key' | 'original_name' | 'composite_key';

export type ResolvedFile = {
  record: FileRecord;
  matchedBy: FileMatchKind;
  ambiguous: boolean;
};

const defaultTokenGenerator: TokenGenerator = () => randomUUID().replace(/-/g, '').slice(0, 12);

function sanitizeKnowledgeBaseSegment(knowledgeBase: string): string {
  const sanitized = knowledgeBase
    .replace(/[^a-zA-Z0-9._-]/g, '_')
    .replace(/^\.+/, '')
    .slice(0, MAX_KB_SEGMENT_LENGTH);
  return sanitized || 'kb';
}

function sanitizeExtension(originalName: string): string {
  const extension = extname(basename(originalName))
    .slice(1)
    .replace(/[^a-zA-Z0-9]/g, '')
    .slice(0, MAX_EXTENSION_LENGTH);
  return extension ? `.${extension}` : '';
}

/**
 * Builds "<kb>_<token><ext>". `claim` returns true once it has reserved the
 * candidate; otherwise a new token is drawn.
 */
export async function generateSafeKey(
  knowledgeBase: string,
  originalName: string,
  claim: (candidate: string) => boolean | Promise<boolean>,
  createToken: TokenGenerator = defaultTokenGenerator
): Promise<string> {
  const prefix = sanitizeKnowledgeBaseSegment(knowledgeBase);
  const extension = sanitizeExtension(originalName);

  for (let attempt = 0; attempt < MAX_KEY_ATTEMPTS; attempt += 1) {
    const candidate = `${prefix}_${createToken()}${extension}`;
    if (await claim(candidate)) {
      return candidate;
    }
  }

  throw new Error(`Unable to allocate a unique file key after ${MAX_KEY_ATTEMPTS} attempts`);
}

export function compositeKeyOf(record: Pick<FileRecord, 'knowledgeBase' | 'originalName'>): string {
  return `${record.knowledgeBase}_${record.originalName}`;
}

/**
 * Exact safe-key match first. The name-based fallbacks exist for clients that
 * have not learned the generated key yet; when they match several records the
 * oldest one wins and the ambiguity is logged.
 */
export async function resolveFileRecord(
  repository: FileRecordRepository,
  lookup: FileLookup
): Promise<ResolvedFile> {
  const exact = await repository.findBySafeKey(lookup.key);
  if (exact) {
    return { record: exact, matchedBy: 'safe_key', ambiguous: false };
  }

  let matchedBy: FileMatchKind;
  let matches: FileRecord[];
  if (lookup.knowledgeBase !== undefined) {
    matchedBy = 'original_name';
    matches = await repository.findByOriginalName(lookup.key, lookup.knowledgeBase);
  } else {
    matchedBy = 'composite_key';
    matches = (await repository.list()).filter((record) => compositeKeyOf(record) === lookup.key);
  }

  const [first] = matches;
  if (!first) {
    throw new NotFoundError(`File not found: ${lookup.key}`, { key: lookup.key });
  }

  const ambiguous = matches.length > 1;
  if (ambiguous) {
    console.warn(
      `[files] ambiguous lookup key="${lookup.key}" kb="${lookup.knowledgeBase ?? ''}" matchedBy=${matchedBy} candidates=${matches
        .map((record) => record.safeKey)
        .join(',')} chosen=${first.safeKey}`
    );
  } else {
    console.log(`[files] resolved key="${lookup.key}" via ${matchedBy} fallback to ${first.safeKey}`);
  }

  return { record: first, matchedBy, ambiguous };
}
