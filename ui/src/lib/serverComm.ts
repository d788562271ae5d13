import type { FileInfo, KnowledgeBaseInfo, QueryMode } from './types';

let apiBaseUrl = 'http://localhost:4000';

export function setApiBaseUrl(url: string) {
  apiBaseUrl = url.replace(/\/+$/, '');
}

export function getApiBaseUrl(): string {
  return apiBaseUrl;
}

// Functional error type instead of class
export interface APIError extends Error {
  status: number;
  code?: string;
}

function createAPIError(status: number, message: string, code?: string): APIError {
  return Object.assign(new Error(message), { name: 'APIError', status, code });
}

export function isAPIError(error: unknown): error is APIError {
  return error instanceof Error && error.name === 'APIError' && 'status' in error;
}

async function readErrorBody(response: Response): Promise<{ detail?: string; code?: string }> {
  const body: unknown = await response.json().catch(() => null);
  if (!body || typeof body !== 'object') {
    return {};
  }

  return {
    detail: 'detail' in body && typeof body.detail === 'string' ? body.detail : undefined,
    code: 'code' in body && typeof body.code === 'string' ? body.code : undefined,
  };
}

async function fetchFromApi(endpoint: string, options: RequestInit = {}): Promise<Response> {
  const response = await fetch(`${apiBaseUrl}${endpoint}`, options);

  if (!response.ok) {
    const errorData = await readErrorBody(response);
    throw createAPIError(
      response.status,
      errorData.detail || `API request failed: ${response.status} ${response.statusText}`,
      errorData.code
    );
  }

  return response;
}

function postJson(body: unknown): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}

function fileKeyPath(fileKey: string): string {
  return `/api/files/${encodeURIComponent(fileKey)}`;
}

export interface HealthResponse {
  status: 'healthy' | 'error';
  service: string;
  rag_service?: { healthy: boolean; info: unknown; url: string };
  knowledge_bases?: number;
  total_files?: number;
  error?: string;
}

export interface RagProbeResponse {
  url: string;
  success: boolean;
  status?: number;
  response?: string;
  error?: string;
}

export interface RagServiceStatusResponse {
  rag_service_url: string;
  test_results: Record<string, RagProbeResponse>;
  summary: { total_tests: number; successful_tests: number; all_tests_passed: boolean };
}

export interface RejectedFileResult {
  filename: string;
  reason: string;
}

export interface UploadFilesResponse {
  status: 'success' | 'partial' | 'failed';
  uploaded_files: number;
  files: FileInfo[];
  rejected_files: RejectedFileResult[];
  allowed_extensions: string[];
}

export interface ParseStartResponse {
  status: 'success';
  message: string;
  started: boolean;
  file: FileInfo;
}

export interface ResetFileResponse {
  status: 'success';
  message: string;
  file: FileInfo;
}

export interface DeleteFileResponse {
  status: 'success';
  message: string;
  deleted_file: string;
}

export interface QueryResponse {
  status: 'success';
  result: string;
  mode: QueryMode;
  timestamp: string;
}

// API endpoints
export async function getHealth(): Promise<HealthResponse> {
  const response = await fetchFromApi('/health');
  return response.json();
}

export async function getRagServiceStatus(): Promise<RagServiceStatusResponse> {
  const response = await fetchFromApi('/api/rag-service-status');
  return response.json();
}

export async function listKnowledgeBases(): Promise<KnowledgeBaseInfo[]> {
  const response = await fetchFromApi('/api/knowledge-bases');
  const data: { knowledge_bases: KnowledgeBaseInfo[] } = await response.json();
  return data.knowledge_bases;
}

export async function createKnowledgeBase(name: string, description = ''): Promise<{ status: string; message: string }> {
  const response = await fetchFromApi('/api/knowledge-bases', postJson({ name, description }));
  return response.json();
}

export async function listFiles(knowledgeBase?: string): Promise<FileInfo[]> {
  const query = knowledgeBase ? `?knowledge_base=${encodeURIComponent(knowledgeBase)}` : '';
  const response = await fetchFromApi(`/api/files${query}`);
  const data: { files: FileInfo[] } = await response.json();
  return data.files;
}

export async function uploadFiles(knowledgeBase: string, files: File[]): Promise<UploadFilesResponse> {
  const formData = new FormData();
  formData.append('knowledge_base', knowledgeBase);
  for (const file of files) {
    formData.append('files', file);
  }

  const response = await fetchFromApi('/api/upload', {
    method: 'POST',
    body: formData,
  });
  return response.json();
}

export async function startParsing(filename: string, knowledgeBase: string): Promise<ParseStartResponse> {
  const formData = new FormData();
  formData.append('filename', filename);
  formData.append('knowledge_base', knowledgeBase);

  const response = await fetchFromApi('/api/parse', {
    method: 'POST',
    body: formData,
  });
  return response.json();
}

export async function getFileStatus(fileKey: string, signal?: AbortSignal): Promise<FileInfo> {
  const response = await fetchFromApi(`${fileKeyPath(fileKey)}/status`, { signal });
  return response.json();
}

export async function resetFile(fileKey: string): Promise<ResetFileResponse> {
  const response = await fetchFromApi(`${fileKeyPath(fileKey)}/reset`, { method: 'POST' });
  return response.json();
}

export async function deleteFile(fileKey: string): Promise<DeleteFileResponse> {
  const response = await fetchFromApi(fileKeyPath(fileKey), { method: 'DELETE' });
  return response.json();
}

export async function queryKnowledgeBase(query: string, mode: QueryMode): Promise<QueryResponse> {
  const response = await fetchFromApi('/api/query', postJson({ query, mode }));
  return response.json();
}

export const api = {
  getHealth,
  getRagServiceStatus,
  listKnowledgeBases,
  createKnowledgeBase,
  listFiles,
  uploadFiles,
  startParsing,
  getFileStatus,
  resetFile,
  deleteFile,
  queryKnowledgeBase,
};
