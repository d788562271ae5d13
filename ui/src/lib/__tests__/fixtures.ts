import type { FileInfo } from '../types';

export function buildFileInfo(overrides: Partial<FileInfo> = {}): FileInfo {
  return {
    filename: 'report.pdf',
    safe_filename: 'kb1_abc123abc123.pdf',
    size: 2048,
    mime_type: 'application/pdf',
    upload_time: '2024-01-01T00:00:00.000Z',
    updated_at: '2024-01-01T00:00:00.000Z',
    status: 'uploaded',
    progress: 0,
    knowledge_base: 'kb1',
    message: null,
    error: null,
    ...overrides,
  };
}
