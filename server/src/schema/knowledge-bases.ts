import { text, timestamp } from 'drizzle-orm/pg-core';
import { appSchema } from './app-schema';

export const knowledgeBases = appSchema.table('knowledge_bases', {
  name: text('name').primaryKey(),
  description: text('description').notNull().default(''),
  path: text('path').notNull(),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

export type KnowledgeBaseRow = typeof knowledgeBases.$inferSelect;
