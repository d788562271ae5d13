import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createApp } from '../api';
import { createDependencies, type AppDependencies } from '../lib/dependencies';
import { UpstreamUnavailableError } from '../lib/errors';
import type { IngestionTask } from '../lib/ingestion/types';
import type { RagService } from '../lib/rag-client';
import { createFakeRag, deferred } from '../lib/__tests__/helpers';

type FileBody = {
  filename: string;
  safe_filename: string;
  status: string;
  progress: number;
  knowledge_base: string;
  message: string | null;
  error: string | null;
};

describe('HTTP API', () => {
  let dir: string;
  let deps: AppDependencies;
  let app: ReturnType<typeof createApp>;

  async function setup(options: { rag?: RagService; runIngestion?: IngestionTask } = {}) {
    deps = createDependencies({
      rag: options.rag ?? createFakeRag(),
      uploadsDir: join(dir, 'uploads'),
      knowledgeBasesDir: join(dir, 'knowledge_bases'),
      progressPollMs: 60_000,
      runIngestion: options.runIngestion,
    });
    app = createApp(deps, { requestLogging: false });
    await deps.knowledgeBases.create({ name: 'kb1' });
  }

  async function upload(names: string[], knowledgeBase = 'kb1') {
    const form = new FormData();
    form.append('knowledge_base', knowledgeBase);
    for (const name of names) {
      form.append('files', new File(['file body'], name, { type: 'text/plain' }));
    }
    return app.request('/api/upload', { method: 'POST', body: form });
  }

  async function parse(filename: string, knowledgeBase = 'kb1') {
    const form = new FormData();
    form.append('filename', filename);
    form.append('knowledge_base', knowledgeBase);
    return app.request('/api/parse', { method: 'POST', body: form });
  }

  async function statusOf(key: string): Promise<FileBody> {
    const response = await app.request(`/api/files/${encodeURIComponent(key)}/status`);
    expect(response.status).toBe(200);
    return response.json();
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'api-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await deps.tracker.shutdown();
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('creates and lists knowledge bases', async () => {
    await setup();

    const created = await app.request('/api/knowledge-bases', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ name: 'kb2', description: 'Second' }),
    });
    expect(created.status).toBe(201);
    expect(await created.json()).toEqual({ status: 'success', message: "Knowledge base 'kb2' created" });

    const duplicate = await app.request('/api/knowledge-bases', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ name: 'kb2' }),
    });
    expect(duplicate.status).toBe(409);
    expect(await duplicate.json()).toEqual({ detail: 'Knowledge base already exists: kb2', code: 'CONFLICT' });

    const listed = await app.request('/api/knowledge-bases');
    const body: { knowledge_bases: Array<{ name: string; description: string; file_count: number }> } =
      await listed.json();
    expect(body.knowledge_bases.map(({ name, description, file_count }) => ({ name, description, file_count }))).toEqual([
      { name: 'kb1', description: '', file_count: 0 },
      { name: 'kb2', description: 'Second', file_count: 0 },
    ]);
  });

  it('uploads a file under a generated key and lists it as uploaded', async () => {
    await setup();

    const response = await upload(['report.pdf']);
    expect(response.status).toBe(200);
    const body: { status: string; uploaded_files: number; files: FileBody[]; rejected_files: unknown[] } =
      await response.json();

    expect(body.status).toBe('success');
    expect(body.uploaded_files).toBe(1);
    expect(body.rejected_files).toEqual([]);
    const [file] = body.files;
    expect(file?.filename).toBe('report.pdf');
    expect(file?.safe_filename).toMatch(/^kb1_[0-9a-f]{12}\.pdf$/);

    const listed = await app.request('/api/files?knowledge_base=kb1');
    const listBody: { files: FileBody[] } = await listed.json();
    expect(listBody.files).toHaveLength(1);
    expect(listBody.files[0]).toMatchObject({
      filename: 'report.pdf',
      safe_filename: file?.safe_filename,
      status: 'uploaded',
      progress: 0,
      knowledge_base: 'kb1',
    });
  });

  it('reports a partial upload per file', async () => {
    await setup();

    const response = await upload(['notes.txt', 'setup.exe']);
    const body: { status: string; uploaded_files: number; rejected_files: unknown[] } = await response.json();

    expect(body.status).toBe('partial');
    expect(body.uploaded_files).toBe(1);
    expect(body.rejected_files).toEqual([{ filename: 'setup.exe', reason: 'Unsupported file type' }]);
  });

  it('rejects uploads to an unknown knowledge base or without files', async () => {
    await setup();

    const unknown = await upload(['report.pdf'], 'missing');
    expect(unknown.status).toBe(400);
    expect(await unknown.json()).toEqual({
      detail: "Knowledge base 'missing' does not exist; create it first",
      code: 'INVALID_ARGUMENT',
    });

    const empty = await upload([]);
    expect(empty.status).toBe(400);
    expect(await empty.json()).toEqual({
      detail: 'No files were provided. Use "files" multipart fields.',
      code: 'INVALID_ARGUMENT',
    });
  });

  it('gives concurrent uploads of the same name distinct keys', async () => {
    await setup();

    const responses = await Promise.all([upload(['report.pdf']), upload(['report.pdf'])]);
    const bodies: Array<{ files: FileBody[] }> = await Promise.all(responses.map((response) => response.json()));

    const keys = bodies.flatMap((body) => body.files.map((file) => file.safe_filename));
    expect(keys).toHaveLength(2);
    expect(new Set(keys).size).toBe(2);
  });

  it('tracks a parse from processing to completed', async () => {
    const gate = deferred();
    await setup({
      runIngestion: async ({ report }) => {
        await report(50, 'Parsing pages');
        await gate.promise;
      },
    });
    const uploaded: { files: FileBody[] } = await (await upload(['report.pdf'])).json();
    const key = uploaded.files[0]?.safe_filename ?? '';

    const started = await parse('report.pdf');
    expect(started.status).toBe(200);
    const startedBody: { status: string; started: boolean; file: FileBody } = await started.json();
    expect(startedBody.started).toBe(true);
    expect(startedBody.file.status).toBe('processing');

    await vi.waitFor(async () => {
      expect(await statusOf(key)).toMatchObject({ status: 'processing', progress: 50, message: 'Parsing pages' });
    });

    const again: { started: boolean } = await (await parse('report.pdf')).json();
    expect(again.started).toBe(false);

    gate.resolve();
    await deps.tracker.whenIdle();

    expect(await statusOf(key)).toMatchObject({ status: 'completed', progress: 100, message: null, error: null });
  });

  it('records an upstream parse failure and resets the file', async () => {
    const parseDocument = vi
      .fn<RagService['parseDocument']>()
      .mockRejectedValue(
        new UpstreamUnavailableError('Retrieval service error: HTTP 500 - parse failed', { statusCode: 502 })
      );
    await setup({ rag: createFakeRag({ parseDocument }) });
    await upload(['notes.txt']);

    const started = await parse('notes.txt');
    expect(started.status).toBe(200);
    await deps.tracker.whenIdle();

    const failed = await statusOf('kb1_notes.txt');
    expect(failed).toMatchObject({
      status: 'error',
      progress: 30,
      message: null,
      error: 'Retrieval service error: HTTP 500 - parse failed',
    });

    const reset = await app.request(`/api/files/${encodeURIComponent(failed.safe_filename)}/reset`, { method: 'POST' });
    expect(reset.status).toBe(200);
    expect(await reset.json()).toMatchObject({
      status: 'success',
      message: 'File notes.txt status reset',
      file: { status: 'uploaded', progress: 0, error: null, message: null },
    });
  });

  it('refuses to parse while the retrieval service is down', async () => {
    await setup({
      rag: createFakeRag({
        assertHealthy: async () => {
          throw new UpstreamUnavailableError('Retrieval service unavailable: HTTP 500');
        },
      }),
    });
    await upload(['report.pdf']);

    const response = await parse('report.pdf');

    expect(response.status).toBe(503);
    expect(await response.json()).toEqual({
      detail: 'Retrieval service unavailable: HTTP 500',
      code: 'UPSTREAM_UNAVAILABLE',
    });
  });

  it('answers 404 for unknown file keys', async () => {
    await setup();

    const status = await app.request('/api/files/missing.pdf/status');
    expect(status.status).toBe(404);
    expect(await status.json()).toEqual({ detail: 'File not found: missing.pdf', code: 'NOT_FOUND' });

    const reset = await app.request('/api/files/missing.pdf/reset', { method: 'POST' });
    expect(reset.status).toBe(404);

    const removed = await app.request('/api/files/missing.pdf', { method: 'DELETE' });
    expect(removed.status).toBe(404);

    const parsed = await parse('missing.pdf');
    expect(parsed.status).toBe(404);
  });

  it('deletes a file by key', async () => {
    await setup();
    const uploaded: { files: FileBody[] } = await (await upload(['report.pdf'])).json();
    const key = uploaded.files[0]?.safe_filename ?? '';

    const removed = await app.request(`/api/files/${encodeURIComponent(key)}`, { method: 'DELETE' });

    expect(removed.status).toBe(200);
    expect(await removed.json()).toEqual({
      status: 'success',
      message: 'File report.pdf deleted',
      deleted_file: 'report.pdf',
    });
    expect((await app.request(`/api/files/${encodeURIComponent(key)}/status`)).status).toBe(404);
    const listed: { files: FileBody[] } = await (await app.request('/api/files')).json();
    expect(listed.files).toEqual([]);
  });

  it('aborts a running ingestion when its file is deleted and drops the late outcome', async () => {
    const gate = deferred();
    const seen: { signal: AbortSignal | null } = { signal: null };
    await setup({
      runIngestion: async ({ report, signal }) => {
        seen.signal = signal;
        await report(40, 'Parsing pages');
        await gate.promise;
        await report(80, 'Still parsing');
        throw new Error('late failure');
      },
    });
    const uploaded: { files: FileBody[] } = await (await upload(['report.pdf', 'notes.txt'])).json();
    const key = uploaded.files[0]?.safe_filename ?? '';
    await parse('report.pdf');
    await vi.waitFor(async () => {
      expect(await statusOf(key)).toMatchObject({ status: 'processing', progress: 40 });
    });

    const removed = await app.request(`/api/files/${encodeURIComponent(key)}`, { method: 'DELETE' });
    expect(removed.status).toBe(200);
    expect(seen.signal?.aborted).toBe(true);
    expect(deps.tracker.isActive(key)).toBe(false);

    gate.resolve();
    await vi.waitFor(() => {
      expect(console.log).toHaveBeenCalledWith(
        `[ingestion] dropped outcome of cancelled task safeKey=${key}: late failure`
      );
    });

    expect((await app.request(`/api/files/${encodeURIComponent(key)}/status`)).status).toBe(404);
    const listed: { files: FileBody[] } = await (await app.request('/api/files')).json();
    expect(listed.files.map((file) => file.filename)).toEqual(['notes.txt']);
  });

  it('proxies queries with hybrid as the default mode', async () => {
    const query = vi.fn<RagService['query']>(async () => 'Retrieved answer');
    await setup({ rag: createFakeRag({ query }) });

    const response = await app.request('/api/query', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ query: 'What is in kb1?' }),
    });

    expect(response.status).toBe(200);
    const body: { status: string; result: string; mode: string; timestamp: string } = await response.json();
    expect(body).toMatchObject({ status: 'success', result: 'Retrieved answer', mode: 'hybrid' });
    expect(Number.isNaN(Date.parse(body.timestamp))).toBe(false);
    expect(query).toHaveBeenCalledWith('What is in kb1?', 'hybrid');
  });

  it('maps query validation and upstream failures to error responses', async () => {
    const query = vi
      .fn<RagService['query']>()
      .mockRejectedValue(new UpstreamUnavailableError('Cannot reach retrieval service: fetch failed'));
    await setup({ rag: createFakeRag({ query }) });

    const post = (payload: unknown) =>
      app.request('/api/query', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
      });

    const badMode = await post({ query: 'question', mode: 'fuzzy' });
    expect(badMode.status).toBe(400);
    expect(await badMode.json()).toEqual({
      detail: 'Mode must be one of: naive, local, global, hybrid',
      code: 'INVALID_ARGUMENT',
    });

    const empty = await post({ query: '  ' });
    expect(empty.status).toBe(400);

    const unreachable = await post({ query: 'question', mode: 'naive' });
    expect(unreachable.status).toBe(503);
    expect(await unreachable.json()).toEqual({
      detail: 'Cannot reach retrieval service: fetch failed',
      code: 'UPSTREAM_UNAVAILABLE',
    });
  });

  it('reports health with counts', async () => {
    await setup();
    await upload(['report.pdf']);

    const response = await app.request('/health');
    expect(await response.json()).toEqual({
      status: 'healthy',
      service: 'ragdesk-server',
      rag_service: { healthy: true, info: { status: 'ok' }, url: 'http://rag.test' },
      knowledge_bases: 1,
      total_files: 1,
    });
  });

  it('summarizes retrieval service diagnostics', async () => {
    await setup({
      rag: createFakeRag({
        diagnose: async () => ({
          url: 'http://rag.test',
          results: [
            { name: 'health_check', url: 'http://rag.test/health', success: true, status: 200, response: 'ok' },
            { name: 'query_test', url: 'http://rag.test/api/query', success: false, error: 'timed out' },
          ],
        }),
      }),
    });

    const response = await app.request('/api/rag-service-status');

    expect(await response.json()).toEqual({
      rag_service_url: 'http://rag.test',
      test_results: {
        health_check: { url: 'http://rag.test/health', success: true, status: 200, response: 'ok' },
        query_test: { url: 'http://rag.test/api/query', success: false, error: 'timed out' },
      },
      summary: { total_tests: 2, successful_tests: 1, all_tests_passed: false },
    });
  });
});
