import type { Organization } from '../schemas.js';
import { CollectionResolver } from './entity-resolver.js';
import type { CandidateSummary, EntityFetcher } from './types.js';

export class OrganizationResolver extends CollectionResolver<Organization> {
  constructor(fetcher: EntityFetcher, cacheSize?: number) {
    super(fetcher, 'organization', {
      id: (org) => org.organizationId,
      name: (org) => org.name,
    }, cacheSize);
  }

  protected fetchAll(): Promise<Organization[]> {
    return this.fetcher.fetchOrganizations();
  }

  protected fetchOne(id: string): Promise<Organization | null> {
    return this.fetcher.fetchOrganization(id);
  }

  summarize(org: Organization): CandidateSummary {
    return { id: org.organizationId, name: org.name };
  }
}
