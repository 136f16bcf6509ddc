export class NotConnectedError extends Error {
  constructor(message = 'Device is not connected') {
    super(message);
    this.name = 'NotConnectedError';
  }
}

export const isNotConnectedError = (error: unknown): error is NotConnectedError =>
  error instanceof NotConnectedError;

export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export const isTransportError = (error: unknown): error is TransportError => error instanceof TransportError;
