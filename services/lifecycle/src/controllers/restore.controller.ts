import { Controller, Get, HttpCode, HttpStatus, Inject, Param, ParseIntPipe } from "@nestjs/common";

import type { RestoreResponseDto } from "../dto/restore-response.dto.js";
import { RestoreService } from "../services/restore.service.js";

@Controller("restore")
export class RestoreController {
  constructor(
    @Inject(RestoreService)
    private readonly restoreService: RestoreService,
  ) {}

  @Get(":id")
  @HttpCode(HttpStatus.ACCEPTED)
  async restore(@Param("id", ParseIntPipe) id: number): Promise<RestoreResponseDto> {
    const { outcome, record } = await this.restoreService.requestRestore(id);
    return {
      id: record.id,
      status: record.status,
      outcome,
      message: outcome === "initiated"
        ? "Restore initiated. The file will be available for download in 12-48 hours."
        : "Restore already in progress. The file will be available for download in 12-48 hours.",
    };
  }
}
