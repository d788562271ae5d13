/**
 * Environment variable utilities
 * Reads from process.env unless a context has been set (tests inject one).
 */
import { fileURLToPath } from 'node:url';
import { join } from 'node:path';

type EnvLike = Record<string, string | undefined>;

let contextEnv: EnvLike | null = null;

const serverRootDir = fileURLToPath(new URL('../..', import.meta.url));

export function setEnvContext(env: EnvLike) {
  contextEnv = env;
}

export function clearEnvContext() {
  contextEnv = null;
}

function getEnvSource(): EnvLike {
  return contextEnv || process.env;
}

/**
 * Get environment variable with fallback support
 */
export function getEnv(key: string): string | undefined;
export function getEnv(key: string, defaultValue: string): string;
export function getEnv(key: string, defaultValue?: string): string | undefined {
  const value = getEnvSource()[key];
  return value !== undefined ? value : defaultValue;
}

function getPositiveInteger(key: string, fallback: number): number {
  const raw = getEnv(key);
  if (!raw) {
    return fallback;
  }

  const parsed = Number(raw);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function getPort(): number {
  return getPositiveInteger('PORT', 4000);
}

/**
 * Database URL is optional; without it the server keeps records in memory.
 */
export function getDatabaseUrl(): string | undefined {
  return getEnv('DATABASE_URL') || undefined;
}

export function getRagServiceUrl(): string {
  return getEnv('RAG_SERVICE_URL', 'http://localhost:8001').replace(/\/+$/, '');
}

export function getRagHealthTimeoutMs(): number {
  return getPositiveInteger('RAG_HEALTH_TIMEOUT_MS', 5_000);
}

export function getRagQueryTimeoutMs(): number {
  return getPositiveInteger('RAG_QUERY_TIMEOUT_MS', 60_000);
}

// Document parsing upstream can take hours for large PDFs.
export function getRagParseTimeoutMs(): number {
  return getPositiveInteger('RAG_PARSE_TIMEOUT_MS', 4 * 60 * 60 * 1000);
}

export function getIngestionProgressPollMs(): number {
  return getPositiveInteger('INGESTION_PROGRESS_POLL_MS', 2_000);
}

export function getUploadsDir(): string {
  return getEnv('UPLOADS_DIR') || join(serverRootDir, 'tmp', 'uploads');
}

export function getKnowledgeBasesDir(): string {
  return getEnv('KNOWLEDGE_BASES_DIR') || join(serverRootDir, 'tmp', 'knowledge_bases');
}

/**
 * Comma separated list, e.g. ".pdf,.docx". Returns undefined to use the built-in list.
 */
export function getUploadAllowedExtensions(): string[] | undefined {
  const raw = getEnv('UPLOAD_ALLOWED_EXTENSIONS');
  if (!raw) {
    return undefined;
  }

  const extensions = raw
    .split(',')
    .map((entry) => entry.trim().toLowerCase())
    .filter(Boolean)
    .map((entry) => (entry.startsWith('.') ? entry : `.${entry}`));

  return extensions.length > 0 ? extensions : undefined;
}
