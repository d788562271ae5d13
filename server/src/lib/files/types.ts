export const FILE_STATUSES = ['uploaded', 'processing', 'completed', 'error'] as const;

export type FileStatus = (typeof FILE_STATUSES)[number];

export type FileRecord = {
  safeKey: string;
  originalName: string;
  knowledgeBase: string;
  storedPath: string;
  mimeType: string;
  sizeBytes: number;
  status: FileStatus;
  progress: number;
  message: string | null;
  error: string | null;
  uploadTime: string;
  updatedAt: string;
};

/**
 * Fields the ingestion tracker is allowed to change after upload.
 */
export type FileStatePatch = Pick<FileRecord, 'status' | 'progress' | 'message' | 'error'>;

/**
 * Shape returned to HTTP clients.
 */
export type FileRecordResponse = {
  filename: string;
  safe_filename: string;
  size: number;
  mime_type: string;
  upload_time: string;
  updated_at: string;
  status: FileStatus;
  progress: number;
  knowledge_base: string;
  message: string | null;
  error: string | null;
};

export function toFileRecordResponse(record: FileRecord): FileRecordResponse {
  return {
    filename: record.originalName,
    safe_filename: record.safeKey,
    size: record.sizeBytes,
    mime_type: record.mimeType,
    upload_time: record.uploadTime,
    updated_at: record.updatedAt,
    status: record.status,
    progress: record.progress,
    knowledge_base: record.knowledgeBase,
    message: record.message,
    error: record.error,
  };
}
