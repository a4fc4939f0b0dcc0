import { Logger } from '../utils/Logger';
import type { GuestDataMigrator } from './guestDataMigrator';
import type { ResumeVersionManager } from './resumeVersionManager';
import type { TaskRunner } from './taskRunner';
import type { TemplateLibrary } from './templateLibrary';
import type { UserManager } from './userManager';

export interface MaintenanceDeps {
  userManager: UserManager;
  versions: ResumeVersionManager;
  templates: TemplateLibrary;
  guestData: GuestDataMigrator;
  tasks: TaskRunner;
  guestRetentionDays: number;
  taskRetentionDays: number;
}

export interface MaintenanceReport {
  expired_sessions: number;
  old_comparisons: number;
  expired_templates: number;
  guest_templates: number;
  guest_versions: number;
  finished_tasks: number;
}

export async function runMaintenance(deps: MaintenanceDeps): Promise<MaintenanceReport> {
  const expired_sessions = await deps.userManager.cleanupExpiredSessions();
  const old_comparisons = await deps.versions.cleanupOldComparisons();
  const expired_templates = await deps.templates.purgeExpired();
  const guest = await deps.guestData.cleanupAnonymousData(deps.guestRetentionDays);
  const finished_tasks = await deps.tasks.purgeFinished(deps.taskRetentionDays);

  const report: MaintenanceReport = {
    expired_sessions,
    old_comparisons,
    expired_templates,
    guest_templates: guest.templates,
    guest_versions: guest.versions,
    finished_tasks,
  };
  await Logger.logInfo('Maintenance', 'Maintenance run finished', { Status: 'CLEANUP', ResponsePayload: report });
  return report;
}
