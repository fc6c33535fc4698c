import type { User } from '../schemas.js';
import { CollectionResolver } from './entity-resolver.js';
import type { CandidateSummary, EntityFetcher } from './types.js';

/** Accepts a user ID, an email (preferred over names when `@` is present) or a display name. */
export class UserResolver extends CollectionResolver<User> {
  constructor(fetcher: EntityFetcher, cacheSize?: number) {
    super(fetcher, 'user', {
      id: (user) => user.userId,
      name: (user) => user.name,
      email: (user) => user.email,
    }, cacheSize);
  }

  protected fetchAll(): Promise<User[]> {
    return this.fetcher.fetchUsers();
  }

  protected fetchOne(id: string): Promise<User | null> {
    return this.fetcher.fetchUser(id);
  }

  summarize(user: User): CandidateSummary {
    return { id: user.userId, name: user.name, context: user.email };
  }
}
