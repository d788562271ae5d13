import { basename, extname } from 'node:path';
import { pathExists } from 'fs-extra';
import { toErrorMessage } from '../errors';
import type { FileRecord } from '../files/types';
import type { QueryMode, RagService } from '../rag-client';
import type { IngestionContext, IngestionTask, ProgressReporter } from './types';

const UPSTREAM_PROGRESS_FLOOR = 30;

const VERIFICATION_MODES: QueryMode[] = ['naive', 'hybrid'];
const SUBSTANTIAL_ANSWER_LENGTH = 50;

export type IngestionTaskOptions = {
  rag: RagService;
  progressPollMs: number;
};

function asIsoTimestamp(value: number): string {
  return new Date(value).toISOString();
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }

    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Keys the retrieval service may have filed progress under, most specific first.
 */
export function progressKeysFor(record: Pick<FileRecord, 'safeKey' | 'originalName'>): string[] {
  const withoutExtension = basename(record.originalName, extname(record.originalName));
  return Array.from(new Set([record.safeKey, record.originalName, withoutExtension].filter(Boolean)));
}

/**
 * Test queries built from the file name: its first 20 characters and, for longer
 * names, its first three words. At most two are used.
 */
export function verificationQueriesFor(originalName: string): string[] {
  const base = (originalName.split('.')[0] ?? '').trim();
  const queries: string[] = [];

  if (base.length > 3) {
    queries.push(base.slice(0, 20).trim());
  }
  if (base.length > 10) {
    const words = base.split(/\s+/).filter(Boolean);
    if (words.length >= 3) {
      queries.push(words.slice(0, 3).join(' '));
    }
    queries.push(base.slice(0, 30).trim());
  }

  const unique = Array.from(new Set(queries)).slice(0, 2);
  return unique.length > 0 ? unique : ['test query'];
}

function answersQuery(answer: string, query: string): boolean {
  return (
    answer.toLowerCase().includes(query.toLowerCase()) || answer.trim().length > SUBSTANTIAL_ANSWER_LENGTH
  );
}

/**
 * Asks the retrieval service about the document it just ingested. The outcome
 * is logged only; a file whose upstream call succeeded still completes.
 */
export async function verifyIngestion(rag: RagService, record: FileRecord, signal: AbortSignal): Promise<boolean> {
  const queries = verificationQueriesFor(record.originalName);

  for (const query of queries) {
    for (const mode of VERIFICATION_MODES) {
      if (signal.aborted) {
        return false;
      }

      try {
        const answer = await rag.query(query, mode);
        if (answersQuery(answer, query)) {
          console.log(`[ingestion] verification passed safeKey=${record.safeKey} query="${query}" mode=${mode}`);
          return true;
        }
      } catch (error) {
        console.warn(
          `[ingestion] verification query safeKey=${record.safeKey} mode=${mode} failed: ${toErrorMessage(error)}`
        );
      }
    }
  }

  console.warn(
    `[ingestion] verification found no matching answer safeKey=${record.safeKey} queries="${queries.join('|')}"`
  );
  return false;
}

async function followUpstreamProgress(
  rag: RagService,
  keys: string[],
  report: ProgressReporter,
  pollMs: number,
  stop: AbortSignal
): Promise<void> {
  let lastProgress = UPSTREAM_PROGRESS_FLOOR;

  while (!stop.aborted) {
    await sleep(pollMs, stop);
    if (stop.aborted) {
      return;
    }

    for (const key of keys) {
      try {
        const upstream = await rag.getProgress(key, stop);
        if (upstream && upstream.progress > lastProgress) {
          lastProgress = upstream.progress;
          await report(upstream.progress, upstream.message || 'Retrieval service is processing the document');
          break;
        }
      } catch (error) {
        if (stop.aborted) {
          return;
        }
        console.warn(`[ingestion] progress lookup key="${key}" failed: ${toErrorMessage(error)}`);
      }
    }
  }
}

export function createIngestionTask(options: IngestionTaskOptions): IngestionTask {
  const { rag, progressPollMs } = options;

  async function sendToRetrievalService({ record, signal }: IngestionContext): Promise<void> {
    await rag.parseDocument(
      {
        filePath: record.storedPath,
        knowledgeBase: record.knowledgeBase,
        parseMethod: 'auto',
        displayStats: true,
      },
      signal
    );
  }

  return async (context) => {
    const { record, report, signal } = context;
    const startedMs = Date.now();

    await report(5, 'Initializing ingestion task');
    await report(10, 'Checking stored file');
    if (!(await pathExists(record.storedPath))) {
      throw new Error(`Stored file is missing: ${record.storedPath}`);
    }

    await report(20, 'Stored file verified');
    await report(UPSTREAM_PROGRESS_FLOOR, 'Sending document to the retrieval service');

    const stopPolling = new AbortController();
    const onAbort = () => stopPolling.abort();
    signal.addEventListener('abort', onAbort, { once: true });
    const polling = followUpstreamProgress(rag, progressKeysFor(record), report, progressPollMs, stopPolling.signal);

    try {
      await sendToRetrievalService(context);
    } catch (error) {
      const endedMs = Date.now();
      console.error(
        `[ingestion][timing] phase=upstream safeKey=${record.safeKey} originalName="${record.originalName}" status=threw startedAt=${asIsoTimestamp(startedMs)} endedAt=${asIsoTimestamp(endedMs)} durationMs=${endedMs - startedMs} error="${toErrorMessage(error)}"`
      );
      throw error;
    } finally {
      stopPolling.abort();
      signal.removeEventListener('abort', onAbort);
      await polling;
    }

    await report(90, 'Retrieval service finished processing');

    const endedMs = Date.now();
    console.log(
      `[ingestion][timing] phase=upstream safeKey=${record.safeKey} originalName="${record.originalName}" status=ok startedAt=${asIsoTimestamp(startedMs)} endedAt=${asIsoTimestamp(endedMs)} durationMs=${endedMs - startedMs} durationSec=${((endedMs - startedMs) / 1000).toFixed(3)}`
    );

    await verifyIngestion(rag, record, signal);
  };
}
