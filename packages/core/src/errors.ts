export type WorksheetBotErrorCode =
  | 'PERSISTED_STATE_CORRUPT'
  | 'SESSION_NOT_LOADED'
  | 'UPSTREAM_SERVICE_ERROR'
  | 'RENDERING_FAILURE'
  | 'UNKNOWN_CHILD'
  | 'CONFIG_ERROR';

export abstract class WorksheetBotError extends Error {
  public abstract readonly code: WorksheetBotErrorCode;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A session file exists and is non-empty but does not hold a message list. */
export class PersistedStateCorruptError extends WorksheetBotError {
  public readonly code = 'PERSISTED_STATE_CORRUPT';

  public constructor(
    public readonly sessionId: string,
    public readonly path: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Persisted history for session "${sessionId}" at ${path} is corrupt: ${reason}`, options);
  }
}

export class SessionNotLoadedError extends WorksheetBotError {
  public readonly code = 'SESSION_NOT_LOADED';

  public constructor(public readonly sessionId: string) {
    super(`Session "${sessionId}" has not been loaded; call get() before save()`);
  }
}

export type UpstreamService = 'llm' | 'search' | 'mail';

export class UpstreamServiceError extends WorksheetBotError {
  public readonly code = 'UPSTREAM_SERVICE_ERROR';

  public constructor(
    public readonly service: UpstreamService,
    public readonly reason: string,
    options?: { cause?: unknown }
  ) {
    super(`${service} call failed: ${reason}`, options);
  }

  public static from(service: UpstreamService, error: unknown): UpstreamServiceError {
    if (error instanceof UpstreamServiceError) return error;
    return new UpstreamServiceError(service, describeError(error), { cause: error });
  }
}

export type RenderFormat = 'html' | 'pdf';

export class RenderingFailureError extends WorksheetBotError {
  public readonly code = 'RENDERING_FAILURE';

  public constructor(
    public readonly format: RenderFormat,
    public readonly reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to render ${format} worksheet: ${reason}`, options);
  }

  public static from(format: RenderFormat, error: unknown): RenderingFailureError {
    if (error instanceof RenderingFailureError) return error;
    return new RenderingFailureError(format, describeError(error), { cause: error });
  }
}

export class UnknownChildError extends WorksheetBotError {
  public readonly code = 'UNKNOWN_CHILD';

  public constructor(public readonly child: string, known: readonly string[]) {
    super(`Unknown child "${child}". Known children: ${known.join(', ')}.`);
  }
}

export class ConfigError extends WorksheetBotError {
  public readonly code = 'CONFIG_ERROR';

  public constructor(public readonly issues: string[]) {
    super(`Invalid config: ${issues.join('; ')}`);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
