import type { Tag } from '../schemas.js';
import { CollectionResolver } from './entity-resolver.js';
import type { CandidateSummary, EntityFetcher } from './types.js';

/** Tags belong to the organization; board scope never applies. */
export class TagResolver extends CollectionResolver<Tag> {
  constructor(fetcher: EntityFetcher, cacheSize?: number) {
    super(fetcher, 'tag', {
      id: (tag) => tag.tagId,
      name: (tag) => tag.name,
    }, cacheSize);
  }

  protected fetchAll(): Promise<Tag[]> {
    return this.fetcher.fetchTags();
  }

  protected fetchOne(id: string): Promise<Tag | null> {
    return this.fetcher.fetchTag(id);
  }

  summarize(tag: Tag): CandidateSummary {
    return { id: tag.tagId, name: tag.name, context: tag.color ?? undefined };
  }
}
