import { and, count, desc, asc, eq, inArray, isNotNull, SQL } from 'drizzle-orm';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import type { NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import * as schema from '../db/schema';
import { scrapedItems } from '../db/schema';
import type { Database } from '../db/client';
import type { ContentType, ItemRecord, NewItem } from '../types/scrape';
import { mapItemToRow, mapRowToItem } from './mappers/item.mapper';

export interface ItemFilter {
  taskId?: string;
  contentType?: ContentType;
  sourceFile?: string;
  keywords?: string[];
}

export interface ItemPageRequest {
  limit: number;
  offset: number;
}

export interface ItemListResult {
  items: ItemRecord[];
  total: number;
}

/** Writes that belong to one unit of work. */
export interface ItemWriter {
  insert(item: NewItem): Promise<ItemRecord>;
  attachStorage(itemId: number, storageKey: string, storageUrl: string | null): Promise<void>;
}

export interface ItemRepository extends ItemWriter {
  /** Runs `work` in a transaction. A rejection rolls back every write made through the writer. */
  transaction<T>(work: (writer: ItemWriter) => Promise<T>): Promise<T>;
  findUrlsByContentType(contentType: ContentType): Promise<Set<string>>;
  existsForKeywordInFile(keyword: string, sourceFile: string): Promise<boolean>;
  findById(itemId: number): Promise<ItemRecord | undefined>;
  list(filter: ItemFilter, page?: ItemPageRequest, order?: 'asc' | 'desc'): Promise<ItemListResult>;
  findSourceFiles(taskId: string): Promise<string[]>;
  findLatestTaskForSourceFile(sourceFile: string): Promise<string | undefined>;
  findKeywordsForSourceFile(sourceFile: string, taskId?: string): Promise<string[]>;
  findStorageKeys(): Promise<string[]>;
  deleteAll(): Promise<number>;
}

type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

class DrizzleItemWriter implements ItemWriter {
  constructor(private readonly executor: Executor) {}

  async insert(item: NewItem): Promise<ItemRecord> {
    const [row] = await this.executor.insert(scrapedItems).values(mapItemToRow(item)).returning();
    if (!row) {
      throw new Error(`Insert of ${item.contentType} item returned no row`);
    }
    return mapRowToItem(row);
  }

  async attachStorage(itemId: number, storageKey: string, storageUrl: string | null): Promise<void> {
    await this.executor
      .update(scrapedItems)
      .set({ storageKey, storageUrl })
      .where(eq(scrapedItems.id, itemId));
  }
}

function buildWhere(filter: ItemFilter): SQL | undefined {
  const conditions: SQL[] = [];
  if (filter.taskId) conditions.push(eq(scrapedItems.taskId, filter.taskId));
  if (filter.contentType) conditions.push(eq(scrapedItems.contentType, filter.contentType));
  if (filter.sourceFile) conditions.push(eq(scrapedItems.sourceFile, filter.sourceFile));
  if (filter.keywords && filter.keywords.length > 0) {
    conditions.push(inArray(scrapedItems.keyword, filter.keywords));
  }
  return conditions.length > 0 ? and(...conditions) : undefined;
}

export class DrizzleItemRepository implements ItemRepository {
  private readonly writer: DrizzleItemWriter;

  constructor(private readonly db: Database) {
    this.writer = new DrizzleItemWriter(db);
  }

  insert(item: NewItem): Promise<ItemRecord> {
    return this.writer.insert(item);
  }

  attachStorage(itemId: number, storageKey: string, storageUrl: string | null): Promise<void> {
    return this.writer.attachStorage(itemId, storageKey, storageUrl);
  }

  transaction<T>(work: (writer: ItemWriter) => Promise<T>): Promise<T> {
    return this.db.transaction(async (tx) => work(new DrizzleItemWriter(tx)));
  }

  async findUrlsByContentType(contentType: ContentType): Promise<Set<string>> {
    const rows = await this.db
      .select({ url: scrapedItems.url })
      .from(scrapedItems)
      .where(eq(scrapedItems.contentType, contentType));
    return new Set(rows.map((row) => row.url));
  }

  async existsForKeywordInFile(keyword: string, sourceFile: string): Promise<boolean> {
    const rows = await this.db
      .select({ id: scrapedItems.id })
      .from(scrapedItems)
      .where(and(eq(scrapedItems.keyword, keyword), eq(scrapedItems.sourceFile, sourceFile)))
      .limit(1);
    return rows.length > 0;
  }

  async findById(itemId: number): Promise<ItemRecord | undefined> {
    const [row] = await this.db
      .select()
      .from(scrapedItems)
      .where(eq(scrapedItems.id, itemId))
      .limit(1);
    return row ? mapRowToItem(row) : undefined;
  }

  async list(
    filter: ItemFilter,
    page?: ItemPageRequest,
    order: 'asc' | 'desc' = 'desc',
  ): Promise<ItemListResult> {
    const where = buildWhere(filter);
    const direction = order === 'asc' ? asc : desc;

    let query = this.db
      .select()
      .from(scrapedItems)
      .where(where)
      .orderBy(direction(scrapedItems.createdAt), direction(scrapedItems.id))
      .$dynamic();
    if (page && page.limit > 0) {
      query = query.limit(page.limit).offset(page.offset);
    }

    const [rows, totals] = await Promise.all([
      query,
      this.db.select({ total: count() }).from(scrapedItems).where(where),
    ]);

    return { items: rows.map(mapRowToItem), total: totals[0]?.total ?? 0 };
  }

  async findSourceFiles(taskId: string): Promise<string[]> {
    const rows = await this.db
      .selectDistinct({ sourceFile: scrapedItems.sourceFile })
      .from(scrapedItems)
      .where(and(eq(scrapedItems.taskId, taskId), isNotNull(scrapedItems.sourceFile)));
    return rows.flatMap((row) => (row.sourceFile ? [row.sourceFile] : []));
  }

  async findLatestTaskForSourceFile(sourceFile: string): Promise<string | undefined> {
    const [row] = await this.db
      .select({ taskId: scrapedItems.taskId })
      .from(scrapedItems)
      .where(and(eq(scrapedItems.sourceFile, sourceFile), isNotNull(scrapedItems.taskId)))
      .orderBy(desc(scrapedItems.createdAt))
      .limit(1);
    return row?.taskId ?? undefined;
  }

  async findKeywordsForSourceFile(sourceFile: string, taskId?: string): Promise<string[]> {
    const conditions = [eq(scrapedItems.sourceFile, sourceFile)];
    if (taskId) conditions.push(eq(scrapedItems.taskId, taskId));
    const rows = await this.db
      .selectDistinct({ keyword: scrapedItems.keyword })
      .from(scrapedItems)
      .where(and(...conditions));
    return rows.map((row) => row.keyword);
  }

  async findStorageKeys(): Promise<string[]> {
    const rows = await this.db
      .select({ storageKey: scrapedItems.storageKey })
      .from(scrapedItems)
      .where(isNotNull(scrapedItems.storageKey));
    return rows.flatMap((row) => (row.storageKey ? [row.storageKey] : []));
  }

  async deleteAll(): Promise<number> {
    const deleted = await this.db.delete(scrapedItems).returning({ id: scrapedItems.id });
    return deleted.length;
  }
}
