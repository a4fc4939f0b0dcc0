import type { TemplateRepository, VersionRepository } from '../repositories/types';
import { Logger } from '../utils/Logger';
import { addDays, systemClock, type Clock } from '../utils/time';

export interface ClaimRequest {
  templateIds?: string[];
  versionIds?: string[];
}

// Moves work done before sign-in (user_id null) to an account, and clears stale guest rows
export class GuestDataMigrator {
  constructor(
    private readonly templates: TemplateRepository,
    private readonly versions: VersionRepository,
    private readonly clock: Clock = systemClock
  ) {}

  async claim(userId: string, request: ClaimRequest): Promise<{ templates: number; versions: number }> {
    const templates = await this.templates.claimGuest(request.templateIds ?? [], userId);
    const versions = await this.versions.claimGuest(request.versionIds ?? [], userId);
    await Logger.logInfo('GuestData', `Claimed ${templates} templates and ${versions} versions`, {
      UserID: userId,
      Status: 'CLAIMED',
    });
    return { templates, versions };
  }

  async cleanupAnonymousData(days = 7): Promise<{ templates: number; versions: number }> {
    const cutoff = addDays(this.clock(), -days).toISOString();
    const templates = await this.templates.deleteGuestOlderThan(cutoff);
    const versions = await this.versions.deleteGuestOlderThan(cutoff);
    return { templates, versions };
  }
}
