import { writeFile } from "node:fs/promises";

import { Injectable } from "@nestjs/common";

import { CollaboratorError } from "../errors.js";
import { readAll } from "../streams.js";
import {
  ColdObjectNotRestoredError,
  fromObjectMetadata,
  joinKey,
  requiresRestore,
  toObjectMetadata,
} from "./cold-storage.service.js";
import type {
  ColdObjectInfo,
  ColdStorageService,
  RehydrationState,
  RestoreOptions,
  RestoreRequestOutcome,
  UploadRequest,
} from "./cold-storage.service.js";

interface MemoryObject {
  data: Buffer;
  metadata: Record<string, string>;
  storageClass: string;
  rehydration: RehydrationState;
  restoreRequests: RestoreOptions[];
}

/**
 * Process-local cold tier. Rehydration never finishes on its own; callers
 * drive it with `completeRestore`.
 */
@Injectable()
export class InMemoryColdStorage implements ColdStorageService {
  private readonly objects = new Map<string, MemoryObject>();

  constructor(private readonly storageClass = "DEEP_ARCHIVE", private readonly prefix?: string) {}

  async upload(request: UploadRequest): Promise<string> {
    const data = await readAll(request.body);
    const ref = `memory://${joinKey(this.prefix, request.key)}`;
    this.objects.set(ref, {
      data,
      metadata: toObjectMetadata(request.metadata),
      storageClass: this.storageClass,
      rehydration: requiresRestore(this.storageClass) ? "cold" : "not-required",
      restoreRequests: [],
    });
    return ref;
  }

  async describe(ref: string): Promise<ColdObjectInfo> {
    const object = this.require(ref);
    return {
      ref,
      size: object.data.length,
      storageClass: object.storageClass,
      ...fromObjectMetadata(object.metadata),
      rehydration: object.rehydration,
    };
  }

  async requestRestore(ref: string, options: RestoreOptions): Promise<RestoreRequestOutcome> {
    const object = this.require(ref);
    if (object.rehydration === "in-progress") {
      return "already-in-progress";
    }
    if (object.rehydration === "not-required") {
      return "initiated";
    }
    object.restoreRequests.push(options);
    if (object.rehydration === "cold") {
      object.rehydration = "in-progress";
    }
    return "initiated";
  }

  async downloadTo(ref: string, destination: string): Promise<void> {
    const object = this.require(ref);
    if (object.rehydration === "cold" || object.rehydration === "in-progress") {
      throw new ColdObjectNotRestoredError(ref);
    }
    await writeFile(destination, object.data);
  }

  completeRestore(ref: string): void {
    this.require(ref).rehydration = "available";
  }

  /** Swaps the stored bytes while keeping the recorded metadata. */
  replaceContent(ref: string, data: Buffer): void {
    this.require(ref).data = Buffer.from(data);
  }

  setMetadata(ref: string, metadata: Record<string, string>): void {
    this.require(ref).metadata = { ...metadata };
  }

  get(ref: string): { data: Buffer; metadata: Record<string, string>; restoreRequests: RestoreOptions[] } | undefined {
    const object = this.objects.get(ref);
    return object
      ? { data: Buffer.from(object.data), metadata: { ...object.metadata }, restoreRequests: [...object.restoreRequests] }
      : undefined;
  }

  get size(): number {
    return this.objects.size;
  }

  private require(ref: string): MemoryObject {
    const object = this.objects.get(ref);
    if (!object) {
      throw new CollaboratorError("cold-storage", "not-found", `Cold object ${ref} does not exist`, 404);
    }
    return object;
  }
}
