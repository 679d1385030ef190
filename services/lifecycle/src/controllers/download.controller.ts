import { Controller, Get, Inject, Param, ParseIntPipe, StreamableFile } from "@nestjs/common";

import { RetrievalService } from "../services/retrieval.service.js";

@Controller("download")
export class DownloadController {
  constructor(
    @Inject(RetrievalService)
    private readonly retrievalService: RetrievalService,
  ) {}

  @Get(":id")
  async download(@Param("id", ParseIntPipe) id: number): Promise<StreamableFile> {
    const handle = await this.retrievalService.download(id);
    return new StreamableFile(handle.stream, {
      type: handle.contentType,
      disposition: contentDisposition(handle.fileName),
      length: handle.length,
    });
  }
}

export function contentDisposition(fileName: string): string {
  const fallback = fileName.replace(/[^\x20-\x7e]|["\\]/g, "_");
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(fileName)}`;
}
