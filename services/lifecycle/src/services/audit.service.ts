import { Inject, Injectable } from "@nestjs/common";

import type { AuditRepository, ListRecordsOptions } from "../repository/audit.repository.js";
import { AUDIT_REPOSITORY } from "../tokens.js";
import type { FileAuditRecord, StatusCounts } from "../types.js";

export const DEFAULT_RECENT_LIMIT = 10;

export interface AuditOverview {
  records: FileAuditRecord[];
  counts: StatusCounts;
}

@Injectable()
export class AuditService {
  constructor(@Inject(AUDIT_REPOSITORY) private readonly repository: AuditRepository) {}

  async overview(options: Partial<ListRecordsOptions> = {}): Promise<AuditOverview> {
    const [records, counts] = await Promise.all([
      this.repository.listRecent({ limit: options.limit ?? DEFAULT_RECENT_LIMIT, status: options.status }),
      this.repository.countByStatus(),
    ]);
    return { records, counts };
  }

  async initialize(): Promise<void> {
    await this.repository.init();
  }
}
