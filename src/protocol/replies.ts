/**
 * Lines the transmitter prints back over the serial link.
 *
 *   CHECK <addr> ACKED     a device answered DISCOVER
 *   FLASH <addr> OK|FAIL   result of a FLASH test per device
 *   STARTTIMER             the countdown has begun
 *
 * `<addr>` ends in the two-digit device ID (e.g. `DEV07`).
 */

import type { DeviceId } from '../types.js';
import { START_ACK_TOKEN } from '../types.js';

export type ControllerReply =
  | { type: 'device-check'; device: DeviceId; acknowledged: boolean }
  | { type: 'flash'; device: DeviceId; ok: boolean }
  | { type: 'start-ack' }
  | { type: 'text'; line: string };

export function parseControllerLine(raw: string): ControllerReply {
  const line = raw.trim();
  if (line === START_ACK_TOKEN) return { type: 'start-ack' };

  const parts = line.split(/\s+/);
  if (parts.length >= 3) {
    const device = deviceFromAddress(parts[1]);
    const status = parts[2].toUpperCase();
    if (device !== null && parts[0] === 'CHECK') {
      return { type: 'device-check', device, acknowledged: status === 'ACKED' };
    }
    if (device !== null && parts[0] === 'FLASH') {
      return { type: 'flash', device, ok: status === 'OK' };
    }
  }
  return { type: 'text', line };
}

/** Devices that acknowledged DISCOVER, ascending and de-duplicated. */
export function collectDiscoveredDevices(lines: string[]): DeviceId[] {
  const found = new Set<DeviceId>();
  for (const line of lines) {
    const reply = parseControllerLine(line);
    if (reply.type === 'device-check' && reply.acknowledged) found.add(reply.device);
  }
  return [...found].sort();
}

/** Devices that reported a successful FLASH, ascending and de-duplicated. */
export function collectFlashedDevices(lines: string[]): DeviceId[] {
  const ok = new Set<DeviceId>();
  for (const line of lines) {
    const reply = parseControllerLine(line);
    if (reply.type === 'flash' && reply.ok) ok.add(reply.device);
  }
  return [...ok].sort();
}

function deviceFromAddress(address: string): DeviceId | null {
  const id = address.slice(-2);
  return /^\d{2}$/.test(id) ? id : null;
}
