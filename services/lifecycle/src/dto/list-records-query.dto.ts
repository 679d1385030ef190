import { Type } from "class-transformer";
import { IsIn, IsInt, IsOptional, Max, Min } from "class-validator";

import { FILE_STATUSES } from "../types.js";
import type { FileStatus } from "../types.js";

export class ListRecordsQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  limit?: number;

  @IsOptional()
  @IsIn(FILE_STATUSES, {
    message: `status must be one of ${FILE_STATUSES.join(", ")}`,
  })
  status?: FileStatus;
}
