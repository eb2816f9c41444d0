/**
 * Fixed-size binary packets for transmitters that take the compact radio
 * format instead of the START text line. Little-endian, packed.
 *
 *   StartPacketV1 (17 bytes): type 0xA1 | seq u16 | masterStart u32 |
 *                             volume u8 | steps u8 | t_ds u16 x 4
 *   ReadyAckV1    (3 bytes):  type 0xB1 | seq u16
 *
 * `t_ds` holds red/orange/green/off in deciseconds from `masterStart`.
 */

import type { DeviceSignalTimes } from '../types.js';
import { MAX_VOLUME } from '../types.js';
import { ProtocolError } from '../errors.js';

export const START_PACKET_TYPE = 0xa1;
export const READY_ACK_TYPE = 0xb1;
export const START_PACKET_SIZE = 17;
export const READY_ACK_SIZE = 3;

export interface StartPacket {
  seq: number;
  /** Transmitter clock (microseconds) the times are relative to. */
  masterStart: number;
  volume: number;
  /** 3 = red/orange/green only, 4 = also switch off. */
  steps: 3 | 4;
  /** red, orange, green, off in deciseconds. */
  times: [number, number, number, number];
}

export function encodeStartPacket(packet: StartPacket): Buffer {
  assertRange('seq', packet.seq, 0xffff);
  assertRange('masterStart', packet.masterStart, 0xffffffff);
  assertRange('volume', packet.volume, MAX_VOLUME);
  packet.times.forEach((t, i) => assertRange(`times[${i}]`, t, 0xffff));

  const buf = Buffer.alloc(START_PACKET_SIZE);
  buf.writeUInt8(START_PACKET_TYPE, 0);
  buf.writeUInt16LE(packet.seq, 1);
  buf.writeUInt32LE(packet.masterStart, 3);
  buf.writeUInt8(packet.volume, 7);
  buf.writeUInt8(packet.steps, 8);
  packet.times.forEach((t, i) => buf.writeUInt16LE(t, 9 + i * 2));
  return buf;
}

export function decodeStartPacket(buf: Buffer): StartPacket {
  if (buf.length !== START_PACKET_SIZE) {
    throw new ProtocolError(`Start packet must be ${START_PACKET_SIZE} bytes, got ${buf.length}`);
  }
  if (buf.readUInt8(0) !== START_PACKET_TYPE) {
    throw new ProtocolError(`Unexpected packet type 0x${buf.readUInt8(0).toString(16)}`);
  }
  const steps = buf.readUInt8(8);
  if (steps === 3 || steps === 4) {
    return {
      seq: buf.readUInt16LE(1),
      masterStart: buf.readUInt32LE(3),
      volume: buf.readUInt8(7),
      steps,
      times: [buf.readUInt16LE(9), buf.readUInt16LE(11), buf.readUInt16LE(13), buf.readUInt16LE(15)],
    };
  }
  throw new ProtocolError(`Start packet steps must be 3 or 4, got ${steps}`);
}

/**
 * Build a 4-step packet from one device's schedule.
 */
export function startPacketFromSignalTimes(
  times: DeviceSignalTimes,
  options: { seq: number; masterStart: number; volume: number },
): StartPacket {
  const ds = (seconds: number) => Math.round(seconds * 10);
  return {
    ...options,
    steps: 4,
    times: [ds(times.redOn), ds(times.orangeOn), ds(times.greenOn), ds(times.off)],
  };
}

export function encodeReadyAck(seq: number): Buffer {
  assertRange('seq', seq, 0xffff);
  const buf = Buffer.alloc(READY_ACK_SIZE);
  buf.writeUInt8(READY_ACK_TYPE, 0);
  buf.writeUInt16LE(seq, 1);
  return buf;
}

export function decodeReadyAck(buf: Buffer): { seq: number } {
  if (buf.length !== READY_ACK_SIZE || buf.readUInt8(0) !== READY_ACK_TYPE) {
    throw new ProtocolError('Not a ready acknowledgment packet');
  }
  return { seq: buf.readUInt16LE(1) };
}

function assertRange(field: string, value: number, max: number): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new ProtocolError(`${field} must be an integer in 0-${max}, got ${value}`);
  }
}
