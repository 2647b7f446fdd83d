import type { ItemRepository } from '../repositories/item.repository';
import type { ObjectStore } from './objectStore.service';
import type { TaskRegistry } from './taskRegistry.service';
import type { ContentType, ItemRecord } from '../types/scrape';
import { describeError, logger } from '../utils/logger';

export interface ItemView {
  id: number;
  keyword: string;
  url: string;
  contentType: ContentType;
  title: string | null;
  description: string | null;
  fileSize: number | null;
  contentHash: string | null;
  storageKey: string | null;
  storageUrl: string | null;
  downloadUrl: string | null;
  taskId: string | null;
  sourceFile: string | null;
  createdAt: string;
}

export interface ItemListQuery {
  taskId?: string;
  all: boolean;
  limit: number;
  offset: number;
}

export interface ItemPage {
  items: ItemView[];
  total: number;
  limit: number;
  offset: number;
}

export interface ClearResult {
  message: string;
  deletedCount: number;
  cancelledTasks: string[];
  deletedObjects: number;
}

export class ItemQueryService {
  constructor(
    private readonly repository: ItemRepository,
    private readonly store: ObjectStore,
    private readonly registry: TaskRegistry,
  ) {}

  async listItems(query: ItemListQuery): Promise<ItemPage> {
    if (!query.taskId && !query.all) {
      return { items: [], total: 0, limit: query.limit, offset: query.offset };
    }

    const page = query.limit > 0 ? { limit: query.limit, offset: query.offset } : undefined;
    const result = await this.repository.list(query.taskId ? { taskId: query.taskId } : {}, page);

    return {
      items: await Promise.all(result.items.map((item) => this.toView(item))),
      total: result.total,
      limit: query.limit,
      offset: query.offset,
    };
  }

  /** Cancels running tasks, deletes every item and then removes mirrored objects. */
  async clearAll(): Promise<ClearResult> {
    const cancelledTasks = this.registry.cancelAll('Data cleared');
    const storageKeys = await this.repository.findStorageKeys();
    const deletedCount = await this.repository.deleteAll();

    let deletedObjects = 0;
    for (const key of storageKeys) {
      try {
        await this.store.deleteObject(key);
        deletedObjects += 1;
      } catch (error) {
        logger.warn('Failed to delete mirrored object', { key, error: describeError(error) });
      }
    }

    logger.info('Cleared scraped data', { deletedCount, deletedObjects, cancelledTasks });
    return {
      message: `Deleted ${deletedCount} items`,
      deletedCount,
      cancelledTasks,
      deletedObjects,
    };
  }

  async resolveDownloadUrl(item: ItemRecord): Promise<string | null> {
    if (!item.storageKey) return item.storageUrl;
    try {
      return await this.store.resolveDownloadUrl(item.storageKey);
    } catch (error) {
      logger.warn('Could not sign download URL', { itemId: item.id, error: describeError(error) });
      return item.storageUrl;
    }
  }

  private async toView(item: ItemRecord): Promise<ItemView> {
    return {
      ...item,
      downloadUrl: await this.resolveDownloadUrl(item),
      createdAt: item.createdAt.toISOString(),
    };
  }
}
