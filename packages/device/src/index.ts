/* c8 ignore file */
export { RGB_PACKET_SIZE, WIRE_MAX, decodeRgbPacket, encodeRgbPacket } from './packet';
export type { RgbValues } from './packet';
export { NotConnectedError, TransportError, isNotConnectedError, isTransportError } from './errors';
export { withTransport } from './transport';
export type { ClosableTransport, Transport } from './transport';
export { WriteLock } from './write-lock';
export { PreviewChannel } from './preview-channel';
export type {
  PreviewChannelOptions,
  Sweep,
  SweepRepeat,
  SweepRequest,
  SweepStep,
  WriteSweepOptions,
  WriteSweepResult
} from './preview-channel';
export { isLaserDevicePath } from './ports';
export { DEFAULT_BAUD_RATE, SerialTransport, listPorts } from './serial-transport';
export type { SerialTransportOptions } from './serial-transport';
