/** Bytes per RGB packet on the wire */
export const RGB_PACKET_SIZE = 6;

export const WIRE_MAX = 0xffff;

export interface RgbValues {
  red: number;
  green: number;
  blue: number;
}

const assertWireValue = (label: string, value: number): void => {
  if (!Number.isInteger(value) || value < 0 || value > WIRE_MAX) {
    throw new RangeError(`${label} must be an integer in [0, ${WIRE_MAX}], got ${value}`);
  }
};

/**
 * Three unsigned 16-bit values, little-endian: [Rlo, Rhi, Glo, Ghi, Blo, Bhi]
 */
export function encodeRgbPacket(red: number, green: number, blue: number): Uint8Array {
  assertWireValue('red', red);
  assertWireValue('green', green);
  assertWireValue('blue', blue);

  const packet = new Uint8Array(RGB_PACKET_SIZE);
  const view = new DataView(packet.buffer);
  view.setUint16(0, red, true);
  view.setUint16(2, green, true);
  view.setUint16(4, blue, true);
  return packet;
}

export function decodeRgbPacket(packet: Uint8Array): RgbValues {
  if (packet.length !== RGB_PACKET_SIZE) {
    throw new RangeError(`RGB packet must be ${RGB_PACKET_SIZE} bytes, got ${packet.length}`);
  }
  const view = new DataView(packet.buffer, packet.byteOffset, packet.byteLength);
  return {
    red: view.getUint16(0, true),
    green: view.getUint16(2, true),
    blue: view.getUint16(4, true)
  };
}
