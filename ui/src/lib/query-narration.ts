import type { QueryMode } from './types';

export const QUERY_STAGES: Record<QueryMode, readonly string[]> = {
  naive: [
    'Preprocessing the query',
    'Computing text embeddings',
    'Searching related documents',
    'Collecting query results',
  ],
  local: [
    'Preprocessing the query',
    'Computing text embeddings',
    'Analysing the local knowledge graph',
    'Sending the request to the LLM',
    'Waiting for in-depth LLM analysis',
    'Traversing related knowledge nodes',
    'Generating the final answer',
  ],
  global: [
    'Preprocessing the query',
    'Computing text embeddings',
    'Searching the global knowledge graph',
    'Sending the request to the LLM',
    'Waiting for global LLM analysis',
    'Combining perspectives into an answer',
  ],
  hybrid: [
    'Preprocessing the query',
    'Computing text embeddings',
    'Running similarity search',
    'Analysing knowledge graph structure',
    'Sending the request to the LLM',
    'Waiting for LLM reasoning',
    'Merging retrieval and reasoning results',
  ],
};

export const STAGE_DELAY_MS: Record<QueryMode, number> = {
  naive: 200,
  global: 800,
  hybrid: 1000,
  local: 1500,
};

export type StageListener = (stage: string, index: number) => void;

export interface NarrationOptions {
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Shows the mode's stage texts while the real request runs. The stages are
 * cosmetic: the result is the request's, and a failed request stops the
 * narration at its next stage.
 */
export async function runQueryWithNarration<T>(
  mode: QueryMode,
  request: () => Promise<T>,
  onStage: StageListener,
  options: NarrationOptions = {}
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const delay = STAGE_DELAY_MS[mode];
  let requestFailed = false;

  const narration = (async () => {
    for (const [index, stage] of QUERY_STAGES[mode].entries()) {
      if (requestFailed) {
        return;
      }
      onStage(stage, index);
      await sleep(delay);
    }
  })();

  try {
    const result = await request();
    await narration;
    return result;
  } catch (error) {
    requestFailed = true;
    await narration;
    throw error;
  }
}
