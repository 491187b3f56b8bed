export type SyncErrorKind =
  | "SchemaParseError"
  | "DiagramUnavailable"
  | "RenderFailed"
  | "PublishFailed"
  | "ConfigurationError"
  | "Aborted";

export abstract class SyncError extends Error {
  abstract readonly kind: SyncErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class SchemaParseError extends SyncError {
  readonly kind = "SchemaParseError";

  constructor(
    readonly sourcePath: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class DiagramUnavailable extends SyncError {
  readonly kind = "DiagramUnavailable";
}

export class RenderFailed extends SyncError {
  readonly kind = "RenderFailed";
}

export class PublishFailed extends SyncError {
  readonly kind = "PublishFailed";
}

/** Fatal: raised before any object is processed. */
export class ConfigurationError extends SyncError {
  readonly kind = "ConfigurationError";
}

export class AbortedError extends SyncError {
  readonly kind = "Aborted";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
