import type { FileRecord } from '../files/types';
import type { RagService } from '../rag-client';

export function createFakeRag(overrides: Partial<RagService> = {}): RagService {
  return {
    baseUrl: 'http://rag.test',
    health: async () => ({ healthy: true, info: { status: 'ok' } }),
    assertHealthy: async () => undefined,
    query: async () => 'answer',
    parseDocument: async () => undefined,
    getProgress: async () => null,
    diagnose: async () => ({ url: 'http://rag.test', results: [] }),
    ...overrides,
  };
}

export function buildFileRecord(overrides: Partial<FileRecord> = {}): FileRecord {
  return {
    safeKey: 'kb1_000000000001.pdf',
    originalName: 'report.pdf',
    knowledgeBase: 'kb1',
    storedPath: '/tmp/uploads/kb1_000000000001.pdf',
    mimeType: 'application/pdf',
    sizeBytes: 5,
    status: 'uploaded',
    progress: 0,
    message: null,
    error: null,
    uploadTime: '2024-01-01T00:00:00.000Z',
    updatedAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
};

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function sequenceTokens(...tokens: string[]): () => string {
  let index = 0;
  return () => {
    const token = tokens[Math.min(index, tokens.length - 1)] ?? 'token';
    index += 1;
    return token;
  };
}
