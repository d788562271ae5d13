import { describe, expect, it, vi } from 'vitest';
import {
  fileKeyOf,
  formatFileSize,
  formatProgressDisplay,
  resetAllFiles,
  statusLabel,
  upsertFile,
} from '../file-list';
import { buildFileInfo } from './fixtures';

describe('file list helpers', () => {
  it('keys files by safe filename with a composite fallback', () => {
    expect(fileKeyOf(buildFileInfo())).toBe('kb1_abc123abc123.pdf');
    expect(fileKeyOf(buildFileInfo({ safe_filename: '' }))).toBe('kb1_report.pdf');
  });

  it('replaces a matching file or appends a new one', () => {
    const existing = buildFileInfo();
    const other = buildFileInfo({ safe_filename: 'kb1_other.pdf', filename: 'other.pdf' });
    const files = [existing, other];

    const updated = upsertFile(files, { ...existing, status: 'processing', progress: 20 });
    expect(updated).toHaveLength(2);
    expect(updated[0]?.status).toBe('processing');
    expect(files[0]?.status).toBe('uploaded');

    const byName = upsertFile(files, buildFileInfo({ safe_filename: 'kb1_new.pdf', filename: 'other.pdf' }));
    expect(byName).toHaveLength(2);
    expect(byName[1]?.safe_filename).toBe('kb1_new.pdf');

    const appended = upsertFile(files, buildFileInfo({ safe_filename: 'kb2_x.pdf', knowledge_base: 'kb2' }));
    expect(appended).toHaveLength(3);
  });

  it('resets every file that is not uploaded and counts failures', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const files = [
      buildFileInfo({ safe_filename: 'a', status: 'uploaded' }),
      buildFileInfo({ safe_filename: 'b', status: 'completed' }),
      buildFileInfo({ safe_filename: 'c', status: 'error' }),
      buildFileInfo({ safe_filename: 'd', status: 'processing' }),
    ];
    const resetFile = vi.fn(async (fileKey: string) => {
      if (fileKey === 'c') {
        throw new Error('File not found: c');
      }
      return { status: 'success' };
    });

    const result = await resetAllFiles(files, resetFile);

    expect(result).toEqual({ resetCount: 2, errorCount: 1 });
    expect(resetFile.mock.calls.map(([fileKey]) => fileKey)).toEqual(['b', 'c', 'd']);
    warn.mockRestore();
  });

  it('formats sizes and progress', () => {
    expect(formatFileSize(0)).toBe('0 B');
    expect(formatFileSize(500)).toBe('500 B');
    expect(formatFileSize(1536)).toBe('1.5 KB');
    expect(formatFileSize(1048576)).toBe('1 MB');

    expect(formatProgressDisplay({ status: 'processing', progress: 45, message: 'Parsing pages' })).toBe(
      '45% - Parsing pages'
    );
    expect(formatProgressDisplay({ status: 'completed', progress: 100, message: null })).toBe('100%');
    expect(statusLabel('error')).toBe('Parse failed');
  });
});
