export const QUERY_MODES = ['naive', 'local', 'global', 'hybrid'] as const;

export type QueryMode = (typeof QUERY_MODES)[number];

export type FileStatus = 'uploaded' | 'processing' | 'completed' | 'error';

export interface FileInfo {
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
}

export interface KnowledgeBaseInfo {
  name: string;
  description: string;
  created_time: string;
  file_count: number;
  path: string;
}

export interface QueryHistoryEntry {
  query: string;
  mode: QueryMode;
  result: string;
  timestamp: string;
}
