import type { RestoreRequestOutcome } from "../storage/cold-storage.service.js";
import type { FileStatus } from "../types.js";

export class RestoreResponseDto {
  id!: number;
  status!: FileStatus;
  outcome!: RestoreRequestOutcome;
  message!: string;
}
