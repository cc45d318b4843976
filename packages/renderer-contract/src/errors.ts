import type { DrawClass } from './types.js';

export type RendererErrorCode = 'InvalidObject' | 'BufferOverflow' | 'DeviceDispatchFailure';

export class InvalidObjectError extends Error {
  override name = 'InvalidObjectError';

  readonly code = 'InvalidObject' satisfies RendererErrorCode;
  readonly drawClass: DrawClass;

  constructor(drawClass: DrawClass, message: string) {
    super(`Invalid ${drawClass} instance: ${message}`);
    this.drawClass = drawClass;
  }
}

export class BufferOverflowError extends Error {
  override name = 'BufferOverflowError';

  readonly code = 'BufferOverflow' satisfies RendererErrorCode;
  readonly drawClass: DrawClass;
  readonly capacity: number;

  constructor(drawClass: DrawClass, capacity: number) {
    super(`Instance batch for ${drawClass} exceeded its hard cap of ${capacity} records.`);
    this.drawClass = drawClass;
    this.capacity = capacity;
  }
}

export class DeviceDispatchFailureError extends Error {
  override name = 'DeviceDispatchFailureError';

  readonly code = 'DeviceDispatchFailure' satisfies RendererErrorCode;
  readonly drawClass: DrawClass | undefined;

  constructor(message: string, options?: { drawClass?: DrawClass; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.drawClass = options?.drawClass;
  }
}

export type RendererError = InvalidObjectError | BufferOverflowError | DeviceDispatchFailureError;

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
