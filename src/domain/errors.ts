/**
 * Error taxonomy for the pipeline.
 *
 * Each class carries a stable `code` so HTTP responses, logs and tests can
 * branch on it without matching message text.
 */

export type PipelineErrorCode =
  | 'CONFIG_INVALID'
  | 'TRANSPORT_UNAVAILABLE'
  | 'CHANNEL_UNAVAILABLE'
  | 'SERIALIZATION_FAILED'
  | 'PUBLISH_TIMEOUT'
  | 'PUBLISH_REJECTED'
  | 'DECODE_FAILED'
  | 'SEND_FAILED'
  | 'PROCESSING_FAILED';

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends PipelineError {
  readonly code = 'CONFIG_INVALID';

  constructor(readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

/** Dialing the broker or opening a channel on it failed. */
export class TransportError extends PipelineError {
  constructor(
    readonly code: 'TRANSPORT_UNAVAILABLE' | 'CHANNEL_UNAVAILABLE',
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type PublishErrorCode =
  | 'SERIALIZATION_FAILED'
  | 'CHANNEL_UNAVAILABLE'
  | 'PUBLISH_TIMEOUT'
  | 'PUBLISH_REJECTED';

export class PublishError extends PipelineError {
  constructor(
    readonly code: PublishErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class DecodeError extends PipelineError {
  readonly code = 'DECODE_FAILED';
}

export class SendError extends PipelineError {
  readonly code = 'SEND_FAILED';

  constructor(readonly clientId: string, options?: { cause?: unknown }) {
    super(`Failed to send to client "${clientId}"`, options);
  }
}

/** Raised by the processor when a delivery must be negatively acknowledged. */
export class ProcessingError extends PipelineError {
  readonly code = 'PROCESSING_FAILED';
}

/** Human-readable message for any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
