/**
 * Transmitter housekeeping commands: device discovery, identify flash and
 * master volume.
 */

import type { DeviceId } from '../types.js';
import type { Diagnostic } from '../diagnostics.js';
import type { StartLink } from './types.js';
import {
  DISCOVER_COMMAND,
  FLASH_COMMAND,
  formatVolumeCommand,
} from '../protocol/command.js';
import { collectDiscoveredDevices, collectFlashedDevices } from '../protocol/replies.js';
import { logEvent } from '../utils/log.js';

/** How long the transmitter takes to poll every device. */
export const DEVICE_REPLY_WINDOW_MS = 2000;

/** Devices that answered a discovery poll. */
export async function discoverDevices(link: StartLink, windowMs = DEVICE_REPLY_WINDOW_MS): Promise<DeviceId[]> {
  const devices = collectDiscoveredDevices(await link.query(DISCOVER_COMMAND, windowMs));
  logEvent('devices.discovered', { devices });
  return devices;
}

/** Flash every device's lights; returns the devices that confirmed. */
export async function flashDevices(link: StartLink, windowMs = DEVICE_REPLY_WINDOW_MS): Promise<DeviceId[]> {
  const devices = collectFlashedDevices(await link.query(FLASH_COMMAND, windowMs));
  logEvent('devices.flashed', { devices });
  return devices;
}

/**
 * Set the transmitter's master volume. Out-of-range values are clamped and
 * reported.
 */
export async function sendVolume(
  link: StartLink,
  volume: number,
  windowMs = 500,
): Promise<{ replies: string[]; diagnostics: Diagnostic[] }> {
  const { text, diagnostics } = formatVolumeCommand(volume);
  const replies = await link.query(text, windowMs);
  return { replies, diagnostics };
}
