import type { FileRecord } from '../files/types';

/**
 * Reports a stage of an ingestion task. Progress values outside [0, 99] are
 * clamped and values lower than the last report are ignored by the tracker.
 */
export type ProgressReporter = (progress: number, message: string) => Promise<void>;

export type IngestionContext = {
  record: FileRecord;
  report: ProgressReporter;
  /** Aborted when the file is reset, deleted, or the server shuts down. */
  signal: AbortSignal;
};

/**
 * One ingestion attempt for one file. Resolving means the retrieval service
 * accepted the document; throwing moves the file to the error state.
 */
export type IngestionTask = (context: IngestionContext) => Promise<void>;

export type StartParseResult = {
  started: boolean;
  record: FileRecord;
};
