import type { FileInfo, FileStatus } from './types';

type FileIdentity = Pick<FileInfo, 'filename' | 'safe_filename' | 'knowledge_base'>;

/**
 * The key the server resolves: the generated safe filename, or the
 * "<kb>_<filename>" fallback for entries that have not learned it yet.
 */
export function fileKeyOf(file: FileIdentity): string {
  return file.safe_filename || `${file.knowledge_base}_${file.filename}`;
}

function isSameFile(a: FileIdentity, b: FileIdentity): boolean {
  if (a.safe_filename && a.safe_filename === b.safe_filename) {
    return true;
  }
  return a.filename === b.filename && a.knowledge_base === b.knowledge_base;
}

/**
 * Returns a new list with `file` replacing its match, or appended.
 */
export function upsertFile(files: readonly FileInfo[], file: FileInfo): FileInfo[] {
  const index = files.findIndex((existing) => isSameFile(existing, file));
  if (index === -1) {
    return [...files, file];
  }
  return files.map((existing, current) => (current === index ? file : existing));
}

export interface ResetAllResult {
  resetCount: number;
  errorCount: number;
}

/**
 * Resets every file not already `uploaded`, one request at a time. Failures
 * are counted and the remaining files are still attempted; nothing is rolled back.
 */
export async function resetAllFiles(
  files: readonly FileInfo[],
  resetFile: (fileKey: string) => Promise<unknown>
): Promise<ResetAllResult> {
  let resetCount = 0;
  let errorCount = 0;

  for (const file of files) {
    if (file.status === 'uploaded') {
      continue;
    }

    try {
      await resetFile(fileKeyOf(file));
      resetCount += 1;
    } catch (error) {
      errorCount += 1;
      console.warn(`[files] reset of ${fileKeyOf(file)} failed:`, error);
    }
  }

  return { resetCount, errorCount };
}

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB'];

export function formatFileSize(bytes: number): string {
  if (bytes <= 0) {
    return '0 B';
  }

  const exponent = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), SIZE_UNITS.length - 1);
  const value = parseFloat((bytes / Math.pow(1024, exponent)).toFixed(2));
  return `${value} ${SIZE_UNITS[exponent]}`;
}

export function formatProgressDisplay(file: Pick<FileInfo, 'status' | 'progress' | 'message'>): string {
  if (file.status === 'processing' && file.message) {
    return `${file.progress}% - ${file.message}`;
  }
  return `${file.progress}%`;
}

const STATUS_LABELS: Record<FileStatus, string> = {
  uploaded: 'Uploaded',
  processing: 'Parsing',
  completed: 'Completed',
  error: 'Parse failed',
};

export function statusLabel(status: FileStatus): string {
  return STATUS_LABELS[status];
}
