import { UpstreamUnavailableError, toErrorMessage } from './errors';

export const QUERY_MODES = ['naive', 'local', 'global', 'hybrid'] as const;

export type QueryMode = (typeof QUERY_MODES)[number];

export type RagHealth = {
  healthy: boolean;
  info: unknown;
};

export type RagProgress = {
  progress: number;
  message: string;
};

export type ParseDocumentRequest = {
  filePath: string;
  knowledgeBase: string;
  parseMethod?: string;
  displayStats?: boolean;
};

export type RagProbeResult = {
  name: 'health_check' | 'query_test';
  url: string;
  success: boolean;
  status?: number;
  /** First 300 characters of the response body. */
  response?: string;
  error?: string;
};

export type RagDiagnostics = {
  url: string;
  results: RagProbeResult[];
};

/**
 * HTTP surface of the external retrieval service.
 */
export interface RagService {
  readonly baseUrl: string;
  health(): Promise<RagHealth>;
  assertHealthy(): Promise<void>;
  query(query: string, mode: QueryMode): Promise<string>;
  parseDocument(request: ParseDocumentRequest, signal?: AbortSignal): Promise<void>;
  getProgress(key: string, signal?: AbortSignal): Promise<RagProgress | null>;
  /** Calls the health and query endpoints once each and reports the raw outcome. */
  diagnose(): Promise<RagDiagnostics>;
}

export type RagServiceClientOptions = {
  baseUrl: string;
  healthTimeoutMs: number;
  queryTimeoutMs: number;
  parseTimeoutMs: number;
  progressTimeoutMs?: number;
};

type TimedSignal = {
  signal: AbortSignal;
  dispose: () => void;
};

function withTimeout(timeoutMs: number, parent?: AbortSignal): TimedSignal {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new Error(`timed out after ${timeoutMs}ms`)), timeoutMs);
  const onParentAbort = () => controller.abort(parent?.reason);

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

function readDetail(body: string): string {
  try {
    const payload: unknown = JSON.parse(body);
    if (payload && typeof payload === 'object' && 'detail' in payload && typeof payload.detail === 'string') {
      return payload.detail;
    }
  } catch {
    // Non-JSON error bodies are reported as text.
  }
  return body;
}

/**
 * The service wraps answers as { data }, but older builds answer with plain text.
 */
export function extractAnswer(body: string): string {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch {
    return body;
  }

  if (payload && typeof payload === 'object' && 'data' in payload) {
    const data = payload.data;
    return typeof data === 'string' ? data : JSON.stringify(data);
  }

  return body;
}

export function createRagServiceClient(options: RagServiceClientOptions): RagService {
  const baseUrl = options.baseUrl.replace(/\/+$/, '');
  const progressTimeoutMs = options.progressTimeoutMs ?? 2_000;

  function buildUrl(path: string): string {
    return `${baseUrl}${path}`;
  }

  async function request(
    operation: string,
    path: string,
    init: RequestInit,
    timeoutMs: number,
    parent?: AbortSignal
  ): Promise<Response> {
    const timed = withTimeout(timeoutMs, parent);
    let response: Response;
    try {
      response = await fetch(buildUrl(path), { ...init, signal: timed.signal });
    } catch (error) {
      const reason = toErrorMessage(timed.signal.reason ?? error, 'request failed');
      console.error(`[rag-client] operation=${operation} url=${buildUrl(path)} unreachable: ${reason}`);
      throw new UpstreamUnavailableError(`Cannot reach retrieval service: ${reason}`);
    } finally {
      timed.dispose();
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      const detail = readDetail(body) || response.statusText;
      console.error(`[rag-client] operation=${operation} status=${response.status} detail="${detail}"`);
      throw new UpstreamUnavailableError(`Retrieval service error: HTTP ${response.status} - ${detail}`, {
        statusCode: 502,
        details: { status: response.status },
      });
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

  async function health(): Promise<RagHealth> {
    const timed = withTimeout(options.healthTimeoutMs);
    try {
      const response = await fetch(buildUrl('/health'), { signal: timed.signal });
      if (!response.ok) {
        return { healthy: false, info: `HTTP ${response.status}` };
      }
      const info: unknown = await response.json().catch(() => ({}));
      return { healthy: true, info };
    } catch (error) {
      return { healthy: false, info: toErrorMessage(timed.signal.reason ?? error, 'health check failed') };
    } finally {
      timed.dispose();
    }
  }

  async function probe(name: RagProbeResult['name'], path: string, init: RequestInit): Promise<RagProbeResult> {
    const url = buildUrl(path);
    const timed = withTimeout(options.healthTimeoutMs);
    try {
      const response = await fetch(url, { ...init, signal: timed.signal });
      const body = await response.text();
      return { name, url, success: response.ok, status: response.status, response: body.slice(0, 300) };
    } catch (error) {
      return { name, url, success: false, error: toErrorMessage(timed.signal.reason ?? error, 'request failed') };
    } finally {
      timed.dispose();
    }
  }

  return {
    baseUrl,
    health,

    async assertHealthy(): Promise<void> {
      const result = await health();
      if (!result.healthy) {
        const info = typeof result.info === 'string' ? result.info : JSON.stringify(result.info);
        throw new UpstreamUnavailableError(`Retrieval service unavailable: ${info}`);
      }
    },

    async query(query: string, mode: QueryMode): Promise<string> {
      const response = await request('query', '/api/query', postJson({ query, mode }), options.queryTimeoutMs);
      return extractAnswer(await response.text());
    },

    async parseDocument(parseRequest: ParseDocumentRequest, signal?: AbortSignal): Promise<void> {
      await request(
        'parse-document',
        '/api/parse-document',
        postJson({
          file_path: parseRequest.filePath,
          knowledge_base: parseRequest.knowledgeBase,
          parse_method: parseRequest.parseMethod ?? 'auto',
          display_stats: parseRequest.displayStats ?? true,
        }),
        options.parseTimeoutMs,
        signal
      );
    },

    async getProgress(key: string, signal?: AbortSignal): Promise<RagProgress | null> {
      const timed = withTimeout(progressTimeoutMs, signal);
      try {
        const response = await fetch(buildUrl(`/api/progress/${encodeURIComponent(key)}`), {
          signal: timed.signal,
        });
        if (!response.ok) {
          return null;
        }

        const payload: unknown = await response.json();
        if (
          payload &&
          typeof payload === 'object' &&
          'progress' in payload &&
          typeof payload.progress === 'number'
        ) {
          const message = 'message' in payload && typeof payload.message === 'string' ? payload.message : '';
          return { progress: payload.progress, message };
        }
        return null;
      } finally {
        timed.dispose();
      }
    },

    async diagnose(): Promise<RagDiagnostics> {
      const results = [
        await probe('health_check', '/health', { method: 'GET' }),
        await probe('query_test', '/api/query', postJson({ query: 'test', mode: 'naive' })),
      ];
      return { url: baseUrl, results };
    },
  };
}
