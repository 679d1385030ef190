import { Controller, Get, Inject, Query, ValidationPipe } from "@nestjs/common";

import type { DashboardResponseDto } from "../dto/dashboard-response.dto.js";
import { toFileAuditRecordDto } from "../dto/file-record.dto.js";
import { ListRecordsQueryDto } from "../dto/list-records-query.dto.js";
import { AuditService } from "../services/audit.service.js";

@Controller()
export class DashboardController {
  constructor(
    @Inject(AuditService)
    private readonly auditService: AuditService,
  ) {}

  /** Most recently discovered files plus the number of records in each status. */
  @Get()
  async overview(
    @Query(new ValidationPipe({ expectedType: ListRecordsQueryDto, transform: true, whitelist: true }))
    query: ListRecordsQueryDto,
  ): Promise<DashboardResponseDto> {
    const overview = await this.auditService.overview({ limit: query.limit, status: query.status });
    return {
      records: overview.records.map(toFileAuditRecordDto),
      counts: overview.counts,
    };
  }
}
