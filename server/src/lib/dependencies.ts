import type { TokenGenerator } from './files/identity';
import { InMemoryFileRecordRepository, type FileRecordRepository } from './files/repository';
import { createIngestionTask } from './ingestion/processor';
import { ParseJobTracker } from './ingestion/tracker';
import type { IngestionTask } from './ingestion/types';
import { InMemoryKnowledgeBaseRepository, type KnowledgeBaseRepository } from './knowledge-bases/repository';
import { KnowledgeBaseService } from './knowledge-bases/service';
import { QueryProxy } from './query/query-proxy';
import type { RagService } from './rag-client';
import { UploadStore } from './upload-storage';

export interface AppDependencies {
  rag: RagService;
  files: FileRecordRepository;
  uploads: UploadStore;
  tracker: ParseJobTracker;
  knowledgeBases: KnowledgeBaseService;
  queryProxy: QueryProxy;
}

export interface DependencyOptions {
  rag: RagService;
  uploadsDir: string;
  knowledgeBasesDir: string;
  progressPollMs: number;
  allowedExtensions?: string[];
  /** Defaults to in-memory storage. */
  files?: FileRecordRepository;
  knowledgeBaseRepository?: KnowledgeBaseRepository;
  createToken?: TokenGenerator;
  /** Replaces the retrieval-service ingestion task. */
  runIngestion?: IngestionTask;
}

export function createDependencies(options: DependencyOptions): AppDependencies {
  const { rag } = options;
  const files = options.files ?? new InMemoryFileRecordRepository();

  const uploads = new UploadStore({
    uploadsDir: options.uploadsDir,
    files,
    allowedExtensions: options.allowedExtensions,
    createToken: options.createToken,
  });

  const tracker = new ParseJobTracker({
    files,
    runIngestion: options.runIngestion ?? createIngestionTask({ rag, progressPollMs: options.progressPollMs }),
    preflight: () => rag.assertHealthy(),
  });

  const knowledgeBases = new KnowledgeBaseService({
    repository: options.knowledgeBaseRepository ?? new InMemoryKnowledgeBaseRepository(),
    files,
    rootDir: options.knowledgeBasesDir,
  });

  return {
    rag,
    files,
    uploads,
    tracker,
    knowledgeBases,
    queryProxy: new QueryProxy(rag),
  };
}
