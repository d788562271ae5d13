import { ConflictError } from '../errors';
import type { FileRecord, FileStatePatch } from './types';

/**
 * Storage of file records. Implementations must apply each update as a single
 * replacement so that readers never observe a mix of old and new fields.
 */
export interface FileRecordRepository {
  insert(record: FileRecord): Promise<FileRecord>;
  findBySafeKey(safeKey: string): Promise<FileRecord | null>;
  /** All records with this original name, oldest first. */
  findByOriginalName(originalName: string, knowledgeBase?: string): Promise<FileRecord[]>;
  /** Insertion order, optionally filtered by knowledge base. */
  list(knowledgeBase?: string): Promise<FileRecord[]>;
  updateState(safeKey: string, patch: FileStatePatch): Promise<FileRecord | null>;
  remove(safeKey: string): Promise<FileRecord | null>;
  countByKnowledgeBase(): Promise<Map<string, number>>;
}

export class InMemoryFileRecordRepository implements FileRecordRepository {
  // Map iteration order is insertion order.
  private readonly records = new Map<string, FileRecord>();

  async insert(record: FileRecord): Promise<FileRecord> {
    if (this.records.has(record.safeKey)) {
      throw new ConflictError(`File key already exists: ${record.safeKey}`);
    }

    const stored = Object.freeze({ ...record });
    this.records.set(stored.safeKey, stored);
    return stored;
  }

  async findBySafeKey(safeKey: string): Promise<FileRecord | null> {
    return this.records.get(safeKey) ?? null;
  }

  async findByOriginalName(originalName: string, knowledgeBase?: string): Promise<FileRecord[]> {
    return Array.from(this.records.values()).filter(
      (record) =>
        record.originalName === originalName &&
        (knowledgeBase === undefined || record.knowledgeBase === knowledgeBase)
    );
  }

  async list(knowledgeBase?: string): Promise<FileRecord[]> {
    const all = Array.from(this.records.values());
    return knowledgeBase ? all.filter((record) => record.knowledgeBase === knowledgeBase) : all;
  }

  async updateState(safeKey: string, patch: FileStatePatch): Promise<FileRecord | null> {
    const current = this.records.get(safeKey);
    if (!current) {
      return null;
    }

    const next = Object.freeze({
      ...current,
      status: patch.status,
      progress: patch.progress,
      message: patch.message,
      error: patch.error,
      updatedAt: new Date().toISOString(),
    });
    this.records.set(safeKey, next);
    return next;
  }

  async remove(safeKey: string): Promise<FileRecord | null> {
    const current = this.records.get(safeKey);
    if (!current) {
      return null;
    }

    this.records.delete(safeKey);
    return current;
  }

  async countByKnowledgeBase(): Promise<Map<string, number>> {
    const counts = new Map<string, number>();
    for (const record of this.records.values()) {
      counts.set(record.knowledgeBase, (counts.get(record.knowledgeBase) ?? 0) + 1);
    }
    return counts;
  }
}
