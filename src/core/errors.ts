export type InputErrorCode = "unrecognized_location" | "unrecognized_input" | "instance_required" | "invalid_option";
export type RemoteErrorCode = "remote_status" | "remote_transport" | "remote_timeout" | "remote_exhausted" | "remote_payload";

export type ErrorContext = Partial<{
  instance: string;
  endpoint: string;
  postId: string;
  page: number;
  fetched: number;
}>;

/**
 * User-correctable input problems. Messages are shown to the user verbatim.
 */
export class InputError extends Error {
  readonly code: InputErrorCode;

  constructor(code: InputErrorCode, message: string) {
    super(message);
    this.name = "InputError";
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class RemoteError extends Error {
  readonly code: RemoteErrorCode;
  readonly status?: number;
  readonly body?: string;
  readonly context: ErrorContext;
  readonly cause?: unknown;

  constructor(args: {
    code: RemoteErrorCode;
    message: string;
    status?: number;
    body?: string;
    context?: ErrorContext;
    cause?: unknown;
  }) {
    super(args.message);
    this.name = "RemoteError";
    this.code = args.code;
    this.status = args.status;
    this.body = args.body;
    this.context = args.context ?? {};
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class StorageError extends Error {
  readonly code = "storage_failed";
  readonly context: ErrorContext;
  readonly cause?: unknown;

  constructor(message: string, context: ErrorContext, cause?: unknown) {
    super(message);
    this.name = "StorageError";
    this.context = context;
    this.cause = cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class RenderError extends Error {
  readonly code: "render_failed" | "renderer_unavailable" = "render_failed";
  readonly cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "RenderError";
    this.cause = cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class RendererUnavailableError extends RenderError {
  readonly code = "renderer_unavailable";

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "RendererUnavailableError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};
