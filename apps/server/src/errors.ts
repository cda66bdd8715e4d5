import type { FastifyReply } from "fastify";
import type { ErrorEnvelope } from "@segvault/shared";

export type { ErrorEnvelope };

export type Dependency = "blob_store" | "metadata_store" | "metadata_cache";

export function sendError(reply: FastifyReply, status: number, envelope: ErrorEnvelope): FastifyReply {
  return reply.status(status).send(envelope);
}

export class StorageError extends Error {
  constructor(
    readonly code: string,
    readonly statusCode: number,
    message: string,
    readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  toEnvelope(): ErrorEnvelope {
    return {
      code: this.code,
      message: this.message,
      ...(this.details ? { details: this.details } : {})
    };
  }
}

export class ValidationError extends StorageError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("VALIDATION_FAILED", 400, message, details);
  }
}

export class FileNotFoundError extends StorageError {
  constructor(readonly fileId: string) {
    super("FILE_NOT_FOUND", 404, `file not found: ${fileId}`, { fileId });
  }
}

export class IntegrityError extends StorageError {
  constructor(message: string, details: Record<string, unknown>) {
    super("INTEGRITY_FAILURE", 502, message, details);
  }
}

export class DependencyError extends StorageError {
  constructor(
    readonly dependency: Dependency,
    message: string,
    cause: unknown,
    details: Record<string, unknown> = {}
  ) {
    super("DEPENDENCY_FAILURE", 503, message, { dependency, ...details }, { cause });
  }
}

export class InputStreamError extends StorageError {
  constructor(cause: unknown) {
    super("INPUT_STREAM_FAILED", 400, `failed to read upload stream: ${describeError(cause)}`, undefined, {
      cause
    });
  }
}

/** Abort reason of a read whose client went away before the response was sent. */
export class RequestAbortedError extends StorageError {
  constructor() {
    super("REQUEST_ABORTED", 499, "client closed the connection");
  }
}

export class BlobNotFoundError extends Error {
  constructor(readonly key: string, options?: { cause?: unknown }) {
    super(`blob not found: ${key}`, options);
    this.name = "BlobNotFoundError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs a call against an external collaborator and reports any failure as a
 * `DependencyError` naming it. Errors that are already `StorageError`s pass through.
 */
export async function callDependency<T>(
  dependency: Dependency,
  description: string,
  call: () => Promise<T>,
  details?: Record<string, unknown>
): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof StorageError) {
      throw error;
    }
    throw new DependencyError(dependency, `${description}: ${describeError(error)}`, error, details);
  }
}
