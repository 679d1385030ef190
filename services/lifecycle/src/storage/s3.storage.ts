import { createWriteStream } from "node:fs";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";

import {
  GetObjectCommand,
  HeadObjectCommand,
  PutObjectCommand,
  RestoreObjectCommand,
  S3Client,
  S3ServiceException,
} from "@aws-sdk/client-s3";
import { Injectable, Logger } from "@nestjs/common";

import type { ColdStorageConfig } from "../config.js";
import { CollaboratorError, describeError } from "../errors.js";
import type { CollaboratorErrorKind } from "../errors.js";
import { withIdleTimeout } from "../streams.js";
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

export interface S3Location {
  bucket: string;
  key: string;
}

export function parseS3Ref(ref: string): S3Location {
  const match = /^s3:\/\/([^/]+)\/(.+)$/.exec(ref);
  if (!match) {
    throw new Error(`Invalid S3 archive reference: ${ref}`);
  }
  return { bucket: match[1], key: match[2] };
}

/** Reads the `Restore` header S3 returns for objects with a restore history. */
export function parseRehydration(restoreHeader: string | undefined, storageClass: string | undefined): RehydrationState {
  if (restoreHeader?.includes('ongoing-request="true"')) {
    return "in-progress";
  }
  if (restoreHeader?.includes('ongoing-request="false"')) {
    return "available";
  }
  return requiresRestore(storageClass) ? "cold" : "not-required";
}

@Injectable()
export class S3StorageService implements ColdStorageService {
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly logger = new Logger(S3StorageService.name);

  constructor(private readonly config: ColdStorageConfig, client?: S3Client) {
    if (!config.bucket) {
      throw new Error("S3 bucket must be configured");
    }
    this.bucket = config.bucket;

    this.client = client ?? new S3Client({
      region: config.region ?? "us-east-1",
      endpoint: config.endpoint,
      forcePathStyle: Boolean(config.endpoint),
      credentials: config.accessKeyId && config.secretAccessKey
        ? {
          accessKeyId: config.accessKeyId,
          secretAccessKey: config.secretAccessKey,
        }
        : undefined,
      requestHandler: {
        connectionTimeout: config.requestTimeoutMs,
        requestTimeout: config.requestTimeoutMs,
      },
    });
  }

  async upload(request: UploadRequest): Promise<string> {
    const key = joinKey(this.config.prefix, request.key);
    try {
      await this.client.send(new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: request.body,
        ContentLength: request.contentLength,
        StorageClass: this.config.storageClass,
        ServerSideEncryption: "AES256",
        Metadata: toObjectMetadata(request.metadata),
      }));
    } catch (error) {
      throw toCollaboratorError(error, `upload to s3://${this.bucket}/${key}`);
    }
    this.logger.log(`Uploaded ${request.metadata.originalPath} to s3://${this.bucket}/${key}`);
    return `s3://${this.bucket}/${key}`;
  }

  async describe(ref: string): Promise<ColdObjectInfo> {
    const { bucket, key } = parseS3Ref(ref);
    try {
      const head = await this.client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
      return {
        ref,
        size: head.ContentLength,
        storageClass: head.StorageClass,
        ...fromObjectMetadata(head.Metadata),
        rehydration: parseRehydration(head.Restore, head.StorageClass),
      };
    } catch (error) {
      throw toCollaboratorError(error, `describe ${ref}`);
    }
  }

  /** Objects in a class that serves reads directly get no restore request. */
  async requestRestore(ref: string, options: RestoreOptions): Promise<RestoreRequestOutcome> {
    const { bucket, key } = parseS3Ref(ref);
    const { rehydration } = await this.describe(ref);
    if (rehydration === "not-required") {
      this.logger.log(`${ref} is readable without a restore`);
      return "initiated";
    }
    if (rehydration === "in-progress") {
      this.logger.log(`Restore already in progress for ${ref}`);
      return "already-in-progress";
    }
    try {
      await this.client.send(new RestoreObjectCommand({
        Bucket: bucket,
        Key: key,
        RestoreRequest: {
          Days: options.days,
          GlacierJobParameters: { Tier: options.tier },
        },
      }));
    } catch (error) {
      if (error instanceof S3ServiceException && error.name === "RestoreAlreadyInProgress") {
        this.logger.log(`Restore already in progress for ${ref}`);
        return "already-in-progress";
      }
      throw toCollaboratorError(error, `restore ${ref}`);
    }
    this.logger.log(`Restore initiated for ${ref} (${options.days} days, ${options.tier} tier)`);
    return "initiated";
  }

  async downloadTo(ref: string, destination: string): Promise<void> {
    const { bucket, key } = parseS3Ref(ref);
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
      const body = response.Body;
      if (!(body instanceof Readable)) {
        throw new Error(`S3 returned no readable body for ${ref}`);
      }
      await pipeline(withIdleTimeout(body, this.config.requestTimeoutMs), createWriteStream(destination));
    } catch (error) {
      if (error instanceof S3ServiceException && error.name === "InvalidObjectState") {
        throw new ColdObjectNotRestoredError(ref);
      }
      throw toCollaboratorError(error, `download ${ref}`);
    }
    this.logger.log(`Downloaded ${ref} to ${destination}`);
  }
}

function toCollaboratorError(error: unknown, action: string): Error {
  if (error instanceof CollaboratorError || error instanceof ColdObjectNotRestoredError) {
    return error;
  }
  const status = error instanceof S3ServiceException ? error.$metadata.httpStatusCode : undefined;
  const name = error instanceof Error ? error.name : "";
  const kind = classify(name, status);
  return new CollaboratorError(
    "cold-storage",
    kind,
    `Cold storage failed to ${action}: ${describeError(error)}`,
    status,
    { cause: error },
  );
}

function classify(name: string, status: number | undefined): CollaboratorErrorKind {
  if (name === "TimeoutError" || name === "AbortError" || name === "RequestTimeout" || name === "TransferTimeoutError") {
    return "timeout";
  }
  if (name === "NoSuchKey" || name === "NotFound" || name === "NoSuchBucket" || status === 404) {
    return "not-found";
  }
  if (name === "AccessDenied" || status === 403) {
    return "forbidden";
  }
  if (status === 401) {
    return "unauthorized";
  }
  if (name === "SlowDown" || status === 429 || status === 503) {
    return "rate-limited";
  }
  return "unavailable";
}
