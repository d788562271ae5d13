import { ConflictError, NotFoundError, toErrorMessage } from '../errors';
import { resolveFileRecord, type FileLookup } from '../files/identity';
import type { FileRecordRepository } from '../files/repository';
import type { FileRecord } from '../files/types';
import type { IngestionTask, StartParseResult } from './types';

const MAX_PROCESSING_PROGRESS = 99;

type ActiveTask = {
  controller: AbortController;
  lastProgress: number;
  promise: Promise<void> | null;
};

export interface ParseJobTrackerOptions {
  files: FileRecordRepository;
  runIngestion: IngestionTask;
  /** Runs before a file moves to processing, e.g. an upstream health check. */
  preflight?: () => Promise<void>;
}

/**
 * Per-file ingestion state machine:
 * uploaded -> processing -> completed | error, plus reset back to uploaded.
 *
 * The active map is the admission gate: a key is registered synchronously
 * after the check, so concurrent starts for one file launch a single task.
 */
export class ParseJobTracker {
  private readonly files: FileRecordRepository;
  private readonly runIngestion: IngestionTask;
  private readonly preflight?: () => Promise<void>;
  private readonly active = new Map<string, ActiveTask>();

  constructor(options: ParseJobTrackerOptions) {
    this.files = options.files;
    this.runIngestion = options.runIngestion;
    this.preflight = options.preflight;
  }

  isActive(safeKey: string): boolean {
    return this.active.has(safeKey);
  }

  async start(lookup: FileLookup): Promise<StartParseResult> {
    const { record } = await resolveFileRecord(this.files, lookup);
    const key = record.safeKey;

    if (this.active.has(key) || record.status === 'processing') {
      console.log(`[ingestion] start ignored safeKey=${key}: already processing`);
      return { started: false, record: (await this.files.findBySafeKey(key)) ?? record };
    }

    if (record.status !== 'uploaded') {
      throw new ConflictError(
        `File ${record.originalName} is already ${record.status}; reset it before parsing again`,
        { status: record.status }
      );
    }

    const task: ActiveTask = { controller: new AbortController(), lastProgress: 0, promise: null };
    this.active.set(key, task);

    try {
      if (this.preflight) {
        await this.preflight();
      }

      if (!this.isCurrent(key, task)) {
        return { started: false, record: (await this.files.findBySafeKey(key)) ?? record };
      }

      const processing = await this.files.updateState(key, {
        status: 'processing',
        progress: 0,
        message: 'Waiting for ingestion to start',
        error: null,
      });
      if (!processing) {
        throw new NotFoundError(`File not found: ${key}`, { key });
      }

      console.log(`[ingestion] started safeKey=${key} originalName="${processing.originalName}"`);
      task.promise = this.run(processing, task).catch((error) => {
        console.error(`[ingestion] failed to record outcome for safeKey=${key}: ${toErrorMessage(error)}`);
      });
      return { started: true, record: processing };
    } catch (error) {
      if (this.active.get(key) === task) {
        this.active.delete(key);
      }
      throw error;
    }
  }

  async status(lookup: FileLookup): Promise<FileRecord> {
    const { record } = await resolveFileRecord(this.files, lookup);
    return record;
  }

  /**
   * Allowed from every state. A running task is aborted and its later reports are dropped.
   */
  async reset(lookup: FileLookup): Promise<FileRecord> {
    const { record } = await resolveFileRecord(this.files, lookup);
    this.cancel(record.safeKey, 'reset');

    const updated = await this.files.updateState(record.safeKey, {
      status: 'uploaded',
      progress: 0,
      message: null,
      error: null,
    });
    if (!updated) {
      throw new NotFoundError(`File not found: ${lookup.key}`, { key: lookup.key });
    }

    console.log(`[ingestion] reset safeKey=${record.safeKey} from status=${record.status}`);
    return updated;
  }

  cancel(safeKey: string, reason: string): boolean {
    const task = this.active.get(safeKey);
    if (!task) {
      return false;
    }

    this.active.delete(safeKey);
    task.controller.abort(new Error(`Ingestion cancelled: ${reason}`));
    console.log(`[ingestion] cancelled safeKey=${safeKey} reason=${reason}`);
    return true;
  }

  /**
   * Records left in processing without a live task (e.g. after a restart) cannot
   * finish; they move to error so they can be reset and retried.
   */
  async recoverInterrupted(): Promise<number> {
    const records = await this.files.list();
    let recovered = 0;

    for (const record of records) {
      if (record.status !== 'processing' || this.active.has(record.safeKey)) {
        continue;
      }

      await this.files.updateState(record.safeKey, {
        status: 'error',
        progress: record.progress,
        message: null,
        error: 'Ingestion interrupted by a service restart',
      });
      recovered += 1;
    }

    if (recovered > 0) {
      console.warn(`[ingestion] marked ${recovered} interrupted file(s) as error`);
    }
    return recovered;
  }

  async whenIdle(): Promise<void> {
    const pending = Array.from(this.active.values(), (task) => task.promise).filter(
      (promise): promise is Promise<void> => promise !== null
    );
    await Promise.allSettled(pending);
  }

  async shutdown(): Promise<void> {
    const pending = Array.from(this.active.entries());
    for (const [key] of pending) {
      this.cancel(key, 'shutdown');
    }
    await Promise.allSettled(pending.map(([, task]) => task.promise ?? Promise.resolve()));
  }

  private isCurrent(key: string, task: ActiveTask): boolean {
    return this.active.get(key) === task && !task.controller.signal.aborted;
  }

  private async applyProgress(key: string, task: ActiveTask, progress: number, message: string): Promise<void> {
    if (!this.isCurrent(key, task) || !Number.isFinite(progress)) {
      return;
    }

    const clamped = Math.max(0, Math.min(MAX_PROCESSING_PROGRESS, Math.round(progress)));
    if (clamped < task.lastProgress) {
      return;
    }

    task.lastProgress = clamped;
    await this.files.updateState(key, { status: 'processing', progress: clamped, message, error: null });
    console.log(`[ingestion] progress safeKey=${key} progress=${clamped} message="${message}"`);
  }

  private async run(record: FileRecord, task: ActiveTask): Promise<void> {
    const key = record.safeKey;

    try {
      await this.runIngestion({
        record,
        report: (progress, message) => this.applyProgress(key, task, progress, message),
        signal: task.controller.signal,
      });

      if (this.isCurrent(key, task)) {
        await this.files.updateState(key, { status: 'completed', progress: 100, message: null, error: null });
        console.log(`[ingestion] completed safeKey=${key}`);
      }
    } catch (error) {
      const message = toErrorMessage(error, 'Unknown ingestion failure');
      if (this.isCurrent(key, task)) {
        await this.files.updateState(key, {
          status: 'error',
          progress: task.lastProgress,
          message: null,
          error: message,
        });
        console.error(`[ingestion] error safeKey=${key}: ${message}`);
      } else {
        console.log(`[ingestion] dropped outcome of cancelled task safeKey=${key}: ${message}`);
      }
    } finally {
      if (this.active.get(key) === task) {
        this.active.delete(key);
      }
    }
  }
}
