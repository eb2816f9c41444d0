/**
 * START command encoding.
 *
 * One line describes every device's firing schedule for a race:
 *
 *   START:<dev>{<red>,<orange>,<green>,<off>}[@<vol>];<dev>{...};...;\n
 *
 * Offsets are whole seconds from the earliest scheduled event. The remote
 * controller parses up to the trailing `;` and runs the countdown itself.
 */

import type { DeviceId, DeviceSchedule, VolumeTable, WireCommand, WireEntry } from '../types.js';
import { MAX_VOLUME, MIN_VOLUME, START_COMMAND_TAG } from '../types.js';
import type { Diagnostic, InvalidVolumeDiagnostic } from '../diagnostics.js';
import { ProtocolError } from '../errors.js';

export const EMPTY_VOLUMES: VolumeTable = { perDevice: {} };

export interface EncodeResult {
  command: WireCommand;
  diagnostics: Diagnostic[];
}

interface ClampedVolume {
  applied?: number;
  diagnostic?: InvalidVolumeDiagnostic;
}

/**
 * Clamp a requested volume to an integer in 0-30. Anything that needed
 * adjusting is reported; non-finite requests are dropped.
 */
export function clampVolume(requested: number, device?: DeviceId): ClampedVolume {
  if (!Number.isFinite(requested)) {
    return { diagnostic: { kind: 'invalid-volume', device, requested } };
  }
  const applied = Math.min(MAX_VOLUME, Math.max(MIN_VOLUME, Math.round(requested)));
  if (applied === requested) return { applied };
  return { applied, diagnostic: { kind: 'invalid-volume', device, requested, applied } };
}

/**
 * Serialize a schedule. Devices are written in ascending ID order and each
 * offset is rounded to the nearest second. A per-device volume override
 * wins over the default.
 */
export function encodeStartCommand(
  schedule: DeviceSchedule,
  volumes: VolumeTable = EMPTY_VOLUMES,
  revision = 0,
): EncodeResult {
  const diagnostics: Diagnostic[] = [];

  let defaultVolume: number | undefined;
  if (volumes.defaultVolume !== undefined) {
    const clamped = clampVolume(volumes.defaultVolume);
    if (clamped.diagnostic) diagnostics.push(clamped.diagnostic);
    defaultVolume = clamped.applied;
  }

  const entries: WireEntry[] = Object.keys(schedule).sort().map(device => {
    const times = schedule[device];
    let volume = defaultVolume;
    const override = volumes.perDevice[device];
    if (override !== undefined) {
      const clamped = clampVolume(override, device);
      if (clamped.diagnostic) diagnostics.push(clamped.diagnostic);
      if (clamped.applied !== undefined) volume = clamped.applied;
    }
    const entry: WireEntry = {
      device,
      red: roundSeconds(times.redOn),
      orange: roundSeconds(times.orangeOn),
      green: roundSeconds(times.greenOn),
      off: roundSeconds(times.off),
    };
    if (volume !== undefined) entry.volume = volume;
    return entry;
  });

  return {
    command: { entries, text: formatStartCommand(entries), revision },
    diagnostics,
  };
}

export function formatStartCommand(entries: WireEntry[]): string {
  const body = entries.map(formatEntry).join(';');
  return `${START_COMMAND_TAG}${body};\n`;
}

function formatEntry(entry: WireEntry): string {
  const base = `${entry.device}{${entry.red},${entry.orange},${entry.green},${entry.off}}`;
  return entry.volume === undefined ? base : `${base}@${entry.volume}`;
}

/** Nearest whole second, halves up: 1.5 → 2, 2.5 → 3. */
function roundSeconds(seconds: number): number {
  const rounded = Math.round(seconds);
  return rounded === 0 ? 0 : rounded;
}

const ENTRY_PATTERN = /^(\d{2})\{(\d+),(\d+),(\d+),(\d+)\}(?:@(\d+))?$/;

/**
 * Parse a START command back into its entries. Accepts the text with or
 * without the final newline.
 */
export function decodeStartCommand(text: string): WireEntry[] {
  const line = text.replace(/\r?\n$/, '');
  if (!line.startsWith(START_COMMAND_TAG)) {
    throw new ProtocolError(`Command must start with ${START_COMMAND_TAG}`);
  }
  const body = line.slice(START_COMMAND_TAG.length);
  if (!body.endsWith(';')) {
    throw new ProtocolError('Command must end with ";"');
  }
  const content = body.slice(0, -1);
  if (content === '') return [];

  const seen = new Set<DeviceId>();
  return content.split(';').map(part => {
    const match = ENTRY_PATTERN.exec(part);
    if (!match) {
      throw new ProtocolError(`Malformed device entry "${part}"`);
    }
    const [, device, red, orange, green, off, volume] = match;
    if (seen.has(device)) {
      throw new ProtocolError(`Device ${device} appears twice`);
    }
    seen.add(device);
    const entry: WireEntry = {
      device,
      red: Number(red),
      orange: Number(orange),
      green: Number(green),
      off: Number(off),
    };
    if (volume !== undefined) {
      const value = Number(volume);
      if (value > MAX_VOLUME) {
        throw new ProtocolError(`Volume ${value} for device ${device} exceeds ${MAX_VOLUME}`);
      }
      entry.volume = value;
    }
    return entry;
  });
}

// -- Line commands --

export const DISCOVER_COMMAND = 'DISCOVER\n';
export const FLASH_COMMAND = 'FLASH\n';

/** Immediate volume change for every device. */
export function formatVolumeCommand(volume: number): { text: string; diagnostics: Diagnostic[] } {
  const clamped = clampVolume(volume);
  const diagnostics: Diagnostic[] = clamped.diagnostic ? [clamped.diagnostic] : [];
  if (clamped.applied === undefined) {
    throw new ProtocolError(`Volume ${volume} is not a number`);
  }
  return { text: `VOLUME:${clamped.applied}\n`, diagnostics };
}
