import { SerialPort } from 'serialport';

import { deviceLogger as logger } from '@lasercal/logger';

import { NotConnectedError, TransportError } from './errors';
import { encodeRgbPacket } from './packet';
import { isLaserDevicePath } from './ports';
import type { ClosableTransport } from './transport';

export const DEFAULT_BAUD_RATE = 250000;

export interface SerialTransportOptions {
  path: string;
  baudRate?: number;
}

/**
 * USB serial adapters that can be a laser driver, sorted by path
 */
export async function listPorts(): Promise<string[]> {
  const ports = await SerialPort.list();
  return ports
    .map(port => port.path)
    .filter(isLaserDevicePath)
    .sort();
}

const toTransportError = (action: string, error: unknown): TransportError => {
  const reason = error instanceof Error ? error.message : String(error);
  return new TransportError(`${action} failed: ${reason}`, { cause: error });
};

/**
 * 8N1 serial link to the laser driver
 */
export class SerialTransport implements ClosableTransport {
  private constructor(private readonly port: SerialPort) {}

  static async open(options: SerialTransportOptions): Promise<SerialTransport> {
    const baudRate = options.baudRate ?? DEFAULT_BAUD_RATE;
    const port = new SerialPort({
      path: options.path,
      baudRate,
      dataBits: 8,
      parity: 'none',
      stopBits: 1,
      autoOpen: false
    });

    await new Promise<void>((resolve, reject) => {
      port.open(error => (error ? reject(toTransportError(`Opening ${options.path}`, error)) : resolve()));
    });
    logger.info({ path: options.path, baudRate }, 'serial port opened');
    return new SerialTransport(port);
  }

  get connected(): boolean {
    return this.port.isOpen;
  }

  get path(): string {
    return this.port.path;
  }

  async write(bytes: Uint8Array): Promise<void> {
    if (!this.port.isOpen) {
      throw new NotConnectedError();
    }
    await new Promise<void>((resolve, reject) => {
      this.port.write(Buffer.from(bytes), error => {
        if (error) {
          reject(toTransportError('Write', error));
          return;
        }
        this.port.drain(drainError => (drainError ? reject(toTransportError('Drain', drainError)) : resolve()));
      });
    });
  }

  /** Blacks out the laser, then releases the port */
  async close(): Promise<void> {
    if (!this.port.isOpen) {
      return;
    }
    try {
      await this.write(encodeRgbPacket(0, 0, 0));
    } catch (error) {
      logger.warn({ err: error, path: this.port.path }, 'blackout before close failed');
    }
    await new Promise<void>((resolve, reject) => {
      this.port.close(error => (error ? reject(toTransportError('Close', error)) : resolve()));
    });
    logger.info({ path: this.port.path }, 'serial port closed');
  }
}
