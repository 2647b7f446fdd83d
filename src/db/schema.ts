import { pgTable, serial, text, varchar, timestamp, bigint, index } from 'drizzle-orm/pg-core';
import type { ContentType } from '../types/scrape';

// One row per scraped result; url is unique per content type across all runs
export const scrapedItems = pgTable('scraped_items', {
  id: serial('id').primaryKey(),
  keyword: varchar('keyword', { length: 500 }).notNull(),
  url: text('url').notNull(),
  contentType: varchar('content_type', { length: 20 }).$type<ContentType>().notNull(),
  title: varchar('title', { length: 1000 }),
  description: text('description'),
  // Video sizes can exceed 2 GiB
  fileSize: bigint('file_size', { mode: 'number' }),
  contentHash: varchar('content_hash', { length: 64 }),
  storageKey: varchar('storage_key', { length: 500 }),
  storageUrl: text('storage_url'),
  taskId: varchar('task_id', { length: 100 }),
  sourceFile: varchar('source_file', { length: 255 }),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => ({
  keywordTypeIdx: index('idx_scraped_items_keyword_type').on(table.keyword, table.contentType),
  typeUrlIdx: index('idx_scraped_items_type_url').on(table.contentType, table.url),
  taskIdx: index('idx_scraped_items_task_id').on(table.taskId),
  sourceFileIdx: index('idx_scraped_items_source_file').on(table.sourceFile, table.keyword),
}));

export type ScrapedItemRow = typeof scrapedItems.$inferSelect;
export type NewScrapedItemRow = typeof scrapedItems.$inferInsert;
