import type { StatusCounts } from "../types.js";
import type { FileAuditRecordDto } from "./file-record.dto.js";

export class DashboardResponseDto {
  records!: FileAuditRecordDto[];
  counts!: StatusCounts;
}
