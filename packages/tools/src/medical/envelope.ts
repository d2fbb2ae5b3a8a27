import { describeError, isoNow, type Logger, type ToolErrorEnvelope } from '@lingshu/shared';

export function errorEnvelope(error: string): ToolErrorEnvelope {
  return { status: 'error', error, timestamp: isoNow() };
}

/** Logs a failed operation and turns it into an error envelope. */
export function failureEnvelope(logger: Logger | undefined, operation: string, err: unknown): ToolErrorEnvelope {
  logger?.error(`${operation} error: ${describeError(err)}`);
  return errorEnvelope(describeError(err));
}

/** Input that passed the schema but is unusable (blank, empty list). */
export function rejectedEnvelope(logger: Logger | undefined, reason: string): ToolErrorEnvelope {
  logger?.warn(reason);
  return errorEnvelope(reason);
}
