import type { ItemRepository } from '../repositories/item.repository';
import { mapCandidateToItem, type CandidateContext } from '../repositories/mappers/item.mapper';
import type { ItemRecord, MirrorOutcome, SearchCandidate } from '../types/scrape';
import type { MirrorService } from './mirror.service';
import { logger } from '../utils/logger';

export interface PersistRequest extends CandidateContext {
  candidate: SearchCandidate;
  allowedKeywords: ReadonlySet<string>;
}

export type PersistResult =
  | { status: 'stored'; item: ItemRecord; mirror: MirrorOutcome }
  | { status: 'rejected'; reason: string };

export class PersistenceService {
  constructor(
    private readonly repository: ItemRepository,
    private readonly mirrorService: MirrorService,
  ) {}

  /**
   * Stores one accepted candidate as its own unit of work: the row is
   * inserted to obtain its id, then mirrored, then the storage key is
   * attached. Mirror failures keep the row; database failures reject and
   * roll the unit back.
   */
  async persistCandidate(request: PersistRequest): Promise<PersistResult> {
    if (!request.allowedKeywords.has(request.keyword)) {
      logger.warn('Refusing to store item for keyword outside the allow-list', {
        keyword: request.keyword,
        taskId: request.taskId,
      });
      return { status: 'rejected', reason: 'keyword not allowed' };
    }

    const newItem = mapCandidateToItem(request.candidate, request);

    return this.repository.transaction<PersistResult>(async (writer) => {
      const inserted = await writer.insert(newItem);
      const mirror = await this.mirrorService.mirror(inserted);

      if (!mirror.ok) {
        if (this.mirrorService.isEnabled()) {
          logger.warn('Item stored without a mirrored copy', {
            itemId: inserted.id,
            contentType: inserted.contentType,
            reason: mirror.reason,
          });
        }
        return { status: 'stored', item: inserted, mirror };
      }

      await writer.attachStorage(inserted.id, mirror.storageKey, mirror.storageUrl);
      return {
        status: 'stored',
        item: { ...inserted, storageKey: mirror.storageKey, storageUrl: mirror.storageUrl },
        mirror,
      };
    });
  }
}
