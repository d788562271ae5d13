import { and, asc, count, eq } from 'drizzle-orm';
import type { Database } from '../db';
import { fileRecords, type FileRecordRow } from '../../schema/file-records';
import type { FileRecordRepository } from './repository';
import type { FileRecord, FileStatePatch } from './types';

function toFileRecord(row: FileRecordRow): FileRecord {
  return {
    safeKey: row.safe_key,
    originalName: row.original_name,
    knowledgeBase: row.knowledge_base,
    storedPath: row.stored_path,
    mimeType: row.mime_type,
    sizeBytes: row.size_bytes,
    status: row.status,
    progress: row.progress,
    message: row.message,
    error: row.error,
    uploadTime: row.upload_time.toISOString(),
    updatedAt: row.updated_at.toISOString(),
  };
}

export class DrizzleFileRecordRepository implements FileRecordRepository {
  constructor(private readonly db: Database) {}

  async insert(record: FileRecord): Promise<FileRecord> {
    const [row] = await this.db
      .insert(fileRecords)
      .values({
        safe_key: record.safeKey,
        original_name: record.originalName,
        knowledge_base: record.knowledgeBase,
        stored_path: record.storedPath,
        mime_type: record.mimeType,
        size_bytes: record.sizeBytes,
        status: record.status,
        progress: record.progress,
        message: record.message,
        error: record.error,
        upload_time: new Date(record.uploadTime),
        updated_at: new Date(record.updatedAt),
      })
      .returning();

    if (!row) {
      throw new Error(`Insert returned no row for ${record.safeKey}`);
    }
    return toFileRecord(row);
  }

  async findBySafeKey(safeKey: string): Promise<FileRecord | null> {
    const [row] = await this.db.select().from(fileRecords).where(eq(fileRecords.safe_key, safeKey)).limit(1);
    return row ? toFileRecord(row) : null;
  }

  async findByOriginalName(originalName: string, knowledgeBase?: string): Promise<FileRecord[]> {
    const condition =
      knowledgeBase === undefined
        ? eq(fileRecords.original_name, originalName)
        : and(eq(fileRecords.original_name, originalName), eq(fileRecords.knowledge_base, knowledgeBase));

    const rows = await this.db.select().from(fileRecords).where(condition).orderBy(asc(fileRecords.seq));
    return rows.map(toFileRecord);
  }

  async list(knowledgeBase?: string): Promise<FileRecord[]> {
    const query = this.db.select().from(fileRecords);
    const rows = knowledgeBase
      ? await query.where(eq(fileRecords.knowledge_base, knowledgeBase)).orderBy(asc(fileRecords.seq))
      : await query.orderBy(asc(fileRecords.seq));
    return rows.map(toFileRecord);
  }

  async updateState(safeKey: string, patch: FileStatePatch): Promise<FileRecord | null> {
    const [row] = await this.db
      .update(fileRecords)
      .set({
        status: patch.status,
        progress: patch.progress,
        message: patch.message,
        error: patch.error,
        updated_at: new Date(),
      })
      .where(eq(fileRecords.safe_key, safeKey))
      .returning();

    return row ? toFileRecord(row) : null;
  }

  async remove(safeKey: string): Promise<FileRecord | null> {
    const [row] = await this.db.delete(fileRecords).where(eq(fileRecords.safe_key, safeKey)).returning();
    return row ? toFileRecord(row) : null;
  }

  async countByKnowledgeBase(): Promise<Map<string, number>> {
    const rows = await this.db
      .select({ knowledgeBase: fileRecords.knowledge_base, total: count() })
      .from(fileRecords)
      .groupBy(fileRecords.knowledge_base);

    return new Map(rows.map((row) => [row.knowledgeBase, row.total]));
  }
}
