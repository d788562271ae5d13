import { join } from 'node:path';
import { ensureDir, pathExists, readdir, stat } from 'fs-extra';
import { z } from 'zod';
import { ConflictError, ValidationError } from '../errors';
import type { FileRecordRepository } from '../files/repository';
import type { KnowledgeBase, KnowledgeBaseRepository } from './repository';

export const createKnowledgeBaseSchema = z.object({
  name: z
    .string({ required_error: 'Knowledge base name is required' })
    .trim()
    .min(1, 'Knowledge base name is required')
    .max(64, 'Knowledge base name must be at most 64 characters')
    .refine((value) => !/[\\/]/.test(value) && value !== '.' && value !== '..', {
      message: 'Knowledge base name must not contain path separators',
    }),
  description: z.string().default(''),
});

export type KnowledgeBaseSummary = KnowledgeBase & { fileCount: number };

export interface KnowledgeBaseServiceOptions {
  repository: KnowledgeBaseRepository;
  files: FileRecordRepository;
  rootDir: string;
}

export class KnowledgeBaseService {
  private readonly repository: KnowledgeBaseRepository;
  private readonly files: FileRecordRepository;
  private readonly rootDir: string;

  constructor(options: KnowledgeBaseServiceOptions) {
    this.repository = options.repository;
    this.files = options.files;
    this.rootDir = options.rootDir;
  }

  async create(input: unknown): Promise<KnowledgeBase> {
    const parsed = createKnowledgeBaseSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(parsed.error.issues[0]?.message ?? 'Invalid knowledge base');
    }

    const { name, description } = parsed.data;
    if (await this.repository.get(name)) {
      throw new ConflictError(`Knowledge base already exists: ${name}`);
    }

    const path = join(this.rootDir, name);
    await ensureDir(path);
    const created = await this.repository.create({
      name,
      description,
      path,
      createdAt: new Date().toISOString(),
    });

    console.log(`[knowledge-bases] created name="${name}" path=${path}`);
    return created;
  }

  async exists(name: string): Promise<boolean> {
    return (await this.repository.get(name)) !== null;
  }

  async list(): Promise<KnowledgeBaseSummary[]> {
    const [knowledgeBases, counts] = await Promise.all([
      this.repository.list(),
      this.files.countByKnowledgeBase(),
    ]);

    return knowledgeBases.map((knowledgeBase) => ({
      ...knowledgeBase,
      fileCount: counts.get(knowledgeBase.name) ?? 0,
    }));
  }

  /**
   * Registers knowledge-base directories that exist on disk but not in the repository.
   */
  async syncFromDisk(): Promise<string[]> {
    if (!(await pathExists(this.rootDir))) {
      return [];
    }

    const names = await readdir(this.rootDir);
    const registered: string[] = [];

    for (const name of names) {
      const path = join(this.rootDir, name);
      if (!(await stat(path)).isDirectory() || (await this.repository.get(name))) {
        continue;
      }

      await this.repository.create({
        name,
        description: '',
        path,
        createdAt: new Date().toISOString(),
      });
      registered.push(name);
    }

    if (registered.length > 0) {
      console.log(`[knowledge-bases] synced from disk: ${registered.join(', ')}`);
    }
    return registered;
  }
}
