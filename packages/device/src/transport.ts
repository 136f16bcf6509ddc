import { deviceLogger as logger } from '@lasercal/logger';

/**
 * Byte sink for the laser driver. `write` resolves once the bytes have been
 * handed to the link and rejects with TransportError otherwise.
 */
export interface Transport {
  readonly connected: boolean;
  write(bytes: Uint8Array): Promise<void>;
}

export interface ClosableTransport extends Transport {
  close(): Promise<void>;
}

/**
 * Opens a transport for the duration of `fn` and closes it on every exit
 * path, including a rejected or cancelled `fn`.
 */
export async function withTransport<T extends ClosableTransport, R>(
  open: () => Promise<T>,
  fn: (transport: T) => Promise<R>
): Promise<R> {
  const transport = await open();
  try {
    return await fn(transport);
  } finally {
    try {
      await transport.close();
    } catch (error) {
      logger.warn({ err: error }, 'failed to close transport');
    }
  }
}
