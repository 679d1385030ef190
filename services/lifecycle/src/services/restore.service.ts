import { Inject, Injectable, Logger } from "@nestjs/common";

import type { AppConfig } from "../config.js";
import { NotArchivedError, RecordNotFoundError } from "../errors.js";
import type { AuditRepository } from "../repository/audit.repository.js";
import type { ColdStorageService, RestoreRequestOutcome } from "../storage/cold-storage.service.js";
import { APP_CONFIG, AUDIT_REPOSITORY, COLD_STORAGE } from "../tokens.js";
import type { FileAuditRecord } from "../types.js";

export interface RestoreResult {
  outcome: RestoreRequestOutcome;
  record: FileAuditRecord;
}

@Injectable()
export class RestoreService {
  private readonly logger = new Logger(RestoreService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(AUDIT_REPOSITORY) private readonly repository: AuditRepository,
    @Inject(COLD_STORAGE) private readonly storage: ColdStorageService,
  ) {}

  /**
   * Asks the cold tier to rehydrate an archived file. Safe to repeat: a restore
   * that is already running counts as success, and a `Restoring` record can be
   * re-requested once its rehydrated copy has expired.
   */
  async requestRestore(id: number): Promise<RestoreResult> {
    const record = await this.repository.findById(id);
    if (!record) {
      throw new RecordNotFoundError(`File ${id} not found`);
    }
    if (!record.archiveRef || (record.status !== "Archived" && record.status !== "Restoring")) {
      throw new NotArchivedError(record.id, record.status);
    }

    const { restoreDays, restoreTier } = this.config.lifecycle;
    const outcome = await this.storage.requestRestore(record.archiveRef, { days: restoreDays, tier: restoreTier });

    const restoring = await this.repository.markRestoring(record.id);
    if (!restoring) {
      // Superseded by a re-scan between the lookup and the update.
      const current = await this.repository.findById(record.id);
      throw new NotArchivedError(record.id, current?.status ?? record.status);
    }

    this.logger.log(
      outcome === "initiated"
        ? `Restore initiated for ${record.path} (${restoreDays} days, ${restoreTier} tier)`
        : `Restore already in progress for ${record.path}`,
    );
    return { outcome, record: restoring };
  }
}
