import { z } from 'zod';
import { ValidationError } from '../errors';
import { QUERY_MODES, type QueryMode, type RagService } from '../rag-client';

export const queryRequestSchema = z.object({
  query: z
    .string({ required_error: 'Query text is required', invalid_type_error: 'Query text must be a string' })
    .refine((value) => value.trim().length > 0, 'Query text is required'),
  mode: z.enum(QUERY_MODES, {
    errorMap: () => ({ message: `Mode must be one of: ${QUERY_MODES.join(', ')}` }),
  }),
});

export type QueryResult = {
  result: string;
  mode: QueryMode;
  timestamp: string;
};

/**
 * Forwards queries to the retrieval service without retrying or rewriting the answer.
 */
export class QueryProxy {
  constructor(
    private readonly rag: RagService,
    private readonly now: () => Date = () => new Date()
  ) {}

  async query(text: unknown, mode: unknown): Promise<QueryResult> {
    const parsed = queryRequestSchema.safeParse({ query: text, mode });
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(issue?.message ?? 'Invalid query request', {
        field: issue?.path.join('.') ?? null,
      });
    }

    const { query, mode: queryMode } = parsed.data;
    console.log(`[query] mode=${queryMode} query="${query.slice(0, 50)}"`);
    const result = await this.rag.query(query, queryMode);
    console.log(`[query] mode=${queryMode} resultLength=${result.length}`);

    return { result, mode: queryMode, timestamp: this.now().toISOString() };
  }
}
