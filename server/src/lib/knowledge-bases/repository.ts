import { ConflictError } from '../errors';

export type KnowledgeBase = {
  name: string;
  description: string;
  /** Directory reserved for the knowledge base on disk. */
  path: string;
  createdAt: string;
};

export interface KnowledgeBaseRepository {
  create(knowledgeBase: KnowledgeBase): Promise<KnowledgeBase>;
  get(name: string): Promise<KnowledgeBase | null>;
  list(): Promise<KnowledgeBase[]>;
}

export class InMemoryKnowledgeBaseRepository implements KnowledgeBaseRepository {
  private readonly knowledgeBases = new Map<string, KnowledgeBase>();

  async create(knowledgeBase: KnowledgeBase): Promise<KnowledgeBase> {
    if (this.knowledgeBases.has(knowledgeBase.name)) {
      throw new ConflictError(`Knowledge base already exists: ${knowledgeBase.name}`);
    }

    const stored = Object.freeze({ ...knowledgeBase });
    this.knowledgeBases.set(stored.name, stored);
    return stored;
  }

  async get(name: string): Promise<KnowledgeBase | null> {
    return this.knowledgeBases.get(name) ?? null;
  }

  async list(): Promise<KnowledgeBase[]> {
    return Array.from(this.knowledgeBases.values());
  }
}
