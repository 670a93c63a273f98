export type CameraErrorKind = 'init' | 'capture' | 'stop' | 'timeout';

export class CameraError extends Error {
  readonly kind: CameraErrorKind;

  constructor(kind: CameraErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CameraError';
    this.kind = kind;
  }
}

export class EnhancementError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EnhancementError';
  }
}

export class EncodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EncodeError';
  }
}

export class ClientError extends Error {
  readonly clientId: number;

  constructor(clientId: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ClientError';
    this.clientId = clientId;
  }
}

export class ValidationError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
