import { ResolverCache } from '../cache.js';
import { logger } from '../logging/index.js';
import { classify, looksLikeNativeId } from './classifier.js';
import { match, type MatchFields } from './matcher.js';
import {
  failed,
  resolved,
  type CandidateSummary,
  type EntityFetcher,
  type EntityKind,
  type Resolution,
  type ResolutionScope,
} from './types.js';

/**
 * Shared classify → fetch → match → decide pipeline. Subclasses say how to
 * fetch their kind and how to summarise a candidate; scoped kinds override
 * `resolve` to settle their parent first.
 */
export abstract class EntityResolver<T> {
  protected readonly cache: ResolverCache<T>;

  constructor(
    protected readonly fetcher: EntityFetcher,
    readonly kind: EntityKind,
    protected readonly fields: MatchFields<T>,
    cacheSize?: number
  ) {
    this.cache = new ResolverCache<T>(`${kind}s`, cacheSize);
  }

  abstract resolve(raw: string, scope?: ResolutionScope): Promise<Resolution<T>>;

  abstract summarize(entity: T): CandidateSummary;

  getCacheStats() {
    return this.cache.getStats();
  }

  protected isIdInput(input: string): boolean {
    return looksLikeNativeId(input);
  }

  /** Direct lookup by canonical ID, remembered including misses. */
  protected async fetchById(id: string, load: (id: string) => Promise<T | null>): Promise<T | undefined> {
    const [entity] = await this.cache.getOrLoad(`id:${id}`, async () => {
      const found = await load(id);
      return found === null ? [] : [found];
    });
    return entity;
  }

  protected candidates(scopeKey: string, load: () => Promise<T[]>): Promise<T[]> {
    return this.cache.getOrLoad(scopeKey, async () => {
      logger.debug(`Fetching ${this.kind} candidates`, { scope: scopeKey }, 'resolver');
      return load();
    });
  }

  /** Tries each strategy in order; the first non-empty match list decides. */
  protected decide(input: string, candidates: readonly T[]): Resolution<T> {
    for (const strategy of classify(this.kind, input)) {
      const matches = match(strategy, input, candidates, this.fields);
      if (matches.length === 0) continue;

      if (matches.length === 1) {
        return this.success(input, matches[0]);
      }

      logger.debug(`Ambiguous ${this.kind}`, { input, strategy, matches: matches.length }, 'resolver');
      return failed({
        type: 'ambiguous',
        entityKind: this.kind,
        input,
        candidates: matches.map((candidate) => this.summarize(candidate)),
      });
    }

    return this.notFound(input);
  }

  protected success(input: string, entity: T): Resolution<T> {
    logger.debug(`Resolved ${this.kind}`, { input, id: this.fields.id(entity) }, 'resolver');
    return resolved(entity);
  }

  protected notFound(input: string): Resolution<T> {
    logger.debug(`No ${this.kind} matches`, { input }, 'resolver');
    return failed({ type: 'not_found', entityKind: this.kind, input });
  }
}

/**
 * Resolver for kinds listed as one organization-wide collection
 * (organizations, tags, users, boards).
 */
export abstract class CollectionResolver<T> extends EntityResolver<T> {
  protected abstract fetchAll(): Promise<T[]>;

  protected abstract fetchOne(id: string): Promise<T | null>;

  protected listKey(): string {
    return 'all';
  }

  async list(): Promise<T[]> {
    return this.candidates(this.listKey(), () => this.fetchAll());
  }

  async resolve(raw: string): Promise<Resolution<T>> {
    const input = raw.trim();
    if (!input) return this.notFound(input);

    if (this.isIdInput(input)) {
      const entity = await this.fetchById(input, (id) => this.fetchOne(id));
      return entity === undefined ? this.notFound(input) : this.success(input, entity);
    }

    return this.decide(input, await this.list());
  }
}
