import { getFileStatus } from './serverComm';
import type { FileInfo } from './types';

export type PollOutcome = 'completed' | 'error' | 'timeout' | 'cancelled';

export interface PollHandlers {
  /** Every successful status read, terminal ones included. */
  onUpdate?: (file: FileInfo) => void;
  onCompleted?: (file: FileInfo) => void;
  onError?: (file: FileInfo, message: string) => void;
  onTimeout?: (stalls: number) => void;
}

export interface PollTimers {
  /** Runs `callback` after `ms`; the returned function cancels it. */
  schedule(callback: () => void, ms: number): () => void;
}

export interface PollOptions {
  fastIntervalMs?: number;
  slowIntervalMs?: number;
  retryIntervalMs?: number;
  maxStalls?: number;
  signal?: AbortSignal;
  fetchStatus?: (fileKey: string, signal: AbortSignal) => Promise<FileInfo>;
  timers?: PollTimers;
}

export interface PollHandle {
  stop(): void;
  done: Promise<PollOutcome>;
}

const FAST_PHASE_LIMIT = 50;

const defaultTimers: PollTimers = {
  schedule: (callback, ms) => {
    const timer = setTimeout(callback, ms);
    return () => clearTimeout(timer);
  },
};

/**
 * Polls a file's status until it completes, fails, stalls or is stopped.
 *
 * A stall is a status check that failed. Any successful read clears the count,
 * so a long parse that holds at one progress value keeps polling; reaching
 * `maxStalls` consecutive failures ends polling with a timeout. A file found
 * back in `uploaded` (reset elsewhere) ends polling as cancelled.
 */
export function pollFileProgress(fileKey: string, handlers: PollHandlers = {}, options: PollOptions = {}): PollHandle {
  const fastIntervalMs = options.fastIntervalMs ?? 1_500;
  const slowIntervalMs = options.slowIntervalMs ?? 2_000;
  const retryIntervalMs = options.retryIntervalMs ?? 3_000;
  const maxStalls = options.maxStalls ?? 30;
  const fetchStatus = options.fetchStatus ?? getFileStatus;
  const timers = options.timers ?? defaultTimers;

  const controller = new AbortController();
  let cancelPending: (() => void) | null = null;
  let settled = false;
  let stalls = 0;
  let resolveDone: (outcome: PollOutcome) => void = () => undefined;
  const done = new Promise<PollOutcome>((resolve) => {
    resolveDone = resolve;
  });

  function finish(outcome: PollOutcome) {
    if (settled) {
      return;
    }
    settled = true;
    cancelPending?.();
    cancelPending = null;
    options.signal?.removeEventListener('abort', stop);
    resolveDone(outcome);
  }

  function stop() {
    if (settled) {
      return;
    }
    controller.abort();
    finish('cancelled');
  }

  function schedule(ms: number) {
    cancelPending = timers.schedule(() => {
      cancelPending = null;
      void check();
    }, ms);
  }

  function recordStall(): boolean {
    stalls += 1;
    if (stalls >= maxStalls) {
      finish('timeout');
      handlers.onTimeout?.(stalls);
      return true;
    }
    return false;
  }

  function handleStatus(file: FileInfo) {
    handlers.onUpdate?.(file);

    switch (file.status) {
      case 'completed':
        finish('completed');
        handlers.onCompleted?.(file);
        return;
      case 'error':
        finish('error');
        handlers.onError?.(file, file.error || 'Unknown error');
        return;
      case 'uploaded':
        finish('cancelled');
        return;
      case 'processing':
        schedule(file.progress < FAST_PHASE_LIMIT ? fastIntervalMs : slowIntervalMs);
        return;
    }
  }

  async function check() {
    if (settled) {
      return;
    }

    let file: FileInfo;
    try {
      file = await fetchStatus(fileKey, controller.signal);
    } catch (error) {
      if (settled) {
        return;
      }
      console.warn(`[poller] status check for ${fileKey} failed:`, error);
      if (!recordStall()) {
        schedule(retryIntervalMs);
      }
      return;
    }

    if (!settled) {
      stalls = 0;
      handleStatus(file);
    }
  }

  if (options.signal?.aborted) {
    finish('cancelled');
  } else {
    options.signal?.addEventListener('abort', stop, { once: true });
    void check();
  }

  return { stop, done };
}
