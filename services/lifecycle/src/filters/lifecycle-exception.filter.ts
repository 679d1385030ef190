import { STATUS_CODES } from "node:http";

import { Catch, HttpException, HttpStatus, Inject, Logger } from "@nestjs/common";
import type { ArgumentsHost, ExceptionFilter } from "@nestjs/common";
import { HttpAdapterHost } from "@nestjs/core";

import { CollaboratorError, LifecycleError } from "../errors.js";
import type { CollaboratorErrorKind } from "../errors.js";

export interface ErrorBody {
  statusCode: number;
  error: string;
  message: string | string[];
}

export function statusForCollaborator(kind: CollaboratorErrorKind): HttpStatus {
  switch (kind) {
    case "unauthorized":
      return HttpStatus.UNAUTHORIZED;
    case "forbidden":
      return HttpStatus.FORBIDDEN;
    case "not-found":
      return HttpStatus.NOT_FOUND;
    case "rate-limited":
      return HttpStatus.TOO_MANY_REQUESTS;
    case "timeout":
      return HttpStatus.GATEWAY_TIMEOUT;
    case "unavailable":
      return HttpStatus.INTERNAL_SERVER_ERROR;
  }
}

export function statusForError(error: LifecycleError): HttpStatus {
  if (error instanceof CollaboratorError) {
    return statusForCollaborator(error.kind);
  }
  switch (error.code) {
    case "NotArchived":
    case "InvalidState":
    case "RestoreInProgress":
      return HttpStatus.BAD_REQUEST;
    case "RecordNotFound":
      return HttpStatus.NOT_FOUND;
    case "PathEscape":
    case "NotReadable":
      return HttpStatus.FORBIDDEN;
    case "FingerprintMismatch":
      return HttpStatus.BAD_GATEWAY;
    case "TransferTimeout":
      return HttpStatus.GATEWAY_TIMEOUT;
    case "Collaborator":
      return HttpStatus.INTERNAL_SERVER_ERROR;
  }
}

/** Renders every failure as `{ statusCode, error, message }`. */
@Catch()
export class LifecycleExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(LifecycleExceptionFilter.name);

  constructor(@Inject(HttpAdapterHost) private readonly adapterHost: HttpAdapterHost) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const { httpAdapter } = this.adapterHost;
    const context = host.switchToHttp();
    const body = this.toBody(exception);
    httpAdapter.reply(context.getResponse(), body, body.statusCode);
  }

  private toBody(exception: unknown): ErrorBody {
    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const response = exception.getResponse();
      const message = typeof response === "string" ? response : messageOf(response) ?? exception.message;
      return { statusCode: status, error: reasonPhrase(status), message };
    }
    if (exception instanceof LifecycleError) {
      const status = statusForError(exception);
      if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
        this.logger.error(`${exception.name}: ${exception.message}`);
      } else {
        this.logger.warn(`${exception.name}: ${exception.message}`);
      }
      return { statusCode: status, error: reasonPhrase(status), message: exception.message };
    }
    this.logger.error("Unhandled error", exception instanceof Error ? exception.stack : String(exception));
    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      error: reasonPhrase(HttpStatus.INTERNAL_SERVER_ERROR),
      message: "Internal server error",
    };
  }
}

function reasonPhrase(status: number): string {
  return STATUS_CODES[status] ?? "Error";
}

function messageOf(response: object): string | string[] | undefined {
  if (!("message" in response)) {
    return undefined;
  }
  const { message } = response;
  if (typeof message === "string") {
    return message;
  }
  if (Array.isArray(message) && message.every((item): item is string => typeof item === "string")) {
    return message;
  }
  return undefined;
}
