import { asc, eq } from 'drizzle-orm';
import type { Database } from '../db';
import { knowledgeBases, type KnowledgeBaseRow } from '../../schema/knowledge-bases';
import type { KnowledgeBase, KnowledgeBaseRepository } from './repository';

function toKnowledgeBase(row: KnowledgeBaseRow): KnowledgeBase {
  return {
    name: row.name,
    description: row.description,
    path: row.path,
    createdAt: row.created_at.toISOString(),
  };
}

export class DrizzleKnowledgeBaseRepository implements KnowledgeBaseRepository {
  constructor(private readonly db: Database) {}

  async create(knowledgeBase: KnowledgeBase): Promise<KnowledgeBase> {
    const [row] = await this.db
      .insert(knowledgeBases)
      .values({
        name: knowledgeBase.name,
        description: knowledgeBase.description,
        path: knowledgeBase.path,
        created_at: new Date(knowledgeBase.createdAt),
      })
      .returning();

    if (!row) {
      throw new Error(`Insert returned no row for knowledge base ${knowledgeBase.name}`);
    }
    return toKnowledgeBase(row);
  }

  async get(name: string): Promise<KnowledgeBase | null> {
    const [row] = await this.db.select().from(knowledgeBases).where(eq(knowledgeBases.name, name)).limit(1);
    return row ? toKnowledgeBase(row) : null;
  }

  async list(): Promise<KnowledgeBase[]> {
    const rows = await this.db.select().from(knowledgeBases).orderBy(asc(knowledgeBases.created_at));
    return rows.map(toKnowledgeBase);
  }
}
