import { afterEach, describe, expect, it } from 'vitest';
import {
  clearEnvContext,
  getIngestionProgressPollMs,
  getPort,
  getRagServiceUrl,
  getUploadAllowedExtensions,
  setEnvContext,
} from '../env';

describe('env getters', () => {
  afterEach(() => {
    clearEnvContext();
  });

  it('falls back to defaults', () => {
    setEnvContext({});

    expect(getPort()).toBe(4000);
    expect(getRagServiceUrl()).toBe('http://localhost:8001');
    expect(getIngestionProgressPollMs()).toBe(2000);
    expect(getUploadAllowedExtensions()).toBeUndefined();
  });

  it('reads and normalizes configured values', () => {
    setEnvContext({
      PORT: '8080',
      RAG_SERVICE_URL: 'http://rag.internal:9000/',
      INGESTION_PROGRESS_POLL_MS: 'soon',
      UPLOAD_ALLOWED_EXTENSIONS: 'PDF, .md ,,txt',
    });

    expect(getPort()).toBe(8080);
    expect(getRagServiceUrl()).toBe('http://rag.internal:9000');
    expect(getIngestionProgressPollMs()).toBe(2000);
    expect(getUploadAllowedExtensions()).toEqual(['.pdf', '.md', '.txt']);
  });
});
