import { bigint, index, integer, serial, text, timestamp } from 'drizzle-orm/pg-core';
import { FILE_STATUSES } from '../lib/files/types';
import { appSchema } from './app-schema';

export const fileRecords = appSchema.table(
  'file_records',
  {
    safe_key: text('safe_key').primaryKey(),
    // Preserves upload order for listings and name-based lookups.
    seq: serial('seq').notNull(),
    original_name: text('original_name').notNull(),
    knowledge_base: text('knowledge_base').notNull(),
    stored_path: text('stored_path').notNull(),
    mime_type: text('mime_type').notNull(),
    size_bytes: bigint('size_bytes', { mode: 'number' }).notNull(),
    status: text('status', { enum: FILE_STATUSES }).notNull().default('uploaded'),
    progress: integer('progress').notNull().default(0),
    message: text('message'),
    error: text('error'),
    upload_time: timestamp('upload_time', { withTimezone: true }).notNull().defaultNow(),
    updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    knowledgeBaseIdx: index('file_records_knowledge_base_idx').on(table.knowledge_base),
    originalNameIdx: index('file_records_original_name_idx').on(table.original_name),
  })
);

export type FileRecordRow = typeof fileRecords.$inferSelect;
