/**
 * Device schedule builder.
 *
 * Converts per-athlete start offsets and device bindings into the absolute
 * times at which every bound device switches red → orange → green → off.
 * All start points share one zero point (the smallest start offset of the
 * whole race) so simultaneous events stay synchronized.
 */

import type {
  DeviceId,
  DeviceSchedule,
  DeviceSignalTimes,
  RaceEntry,
  SignalTiming,
} from './types.js';
import { OFFSET_PRECISION } from './types.js';
import type { Topology } from './track/types.js';
import type { Diagnostic } from './diagnostics.js';
import { RaceSetupError } from './errors.js';
import { roundTo } from './handicap.js';
import { compareDistances } from './track/topology.js';

export interface ScheduleOptions {
  /**
   * Bound devices without an athlete: 'schedule' fires them from the shared
   * zero point, 'omit' leaves them out. Defaults to 'schedule'.
   */
  idleDevices?: 'schedule' | 'omit';
}

export interface ScheduleResult {
  devices: DeviceSchedule;
  /** Shared zero point subtracted from every start offset. */
  minOffset: number;
  diagnostics: Diagnostic[];
}

export type SignalKind = 'marks' | 'set' | 'go' | 'off';

export interface SignalEvent {
  time: number;
  device: DeviceId;
  signal: SignalKind;
}

const SIGNAL_ORDER: Record<SignalKind, number> = { marks: 0, set: 1, go: 2, off: 3 };

/** Throws unless 0 < red < green < off. */
export function validateSignalTiming(timing: SignalTiming): void {
  const { redSeconds, greenSeconds, offSeconds } = timing;
  if (![redSeconds, greenSeconds, offSeconds].every(Number.isFinite)) {
    throw new RaceSetupError('Signal durations must be finite numbers');
  }
  if (!(redSeconds > 0 && redSeconds < greenSeconds && greenSeconds < offSeconds)) {
    throw new RaceSetupError(
      `Signal durations must satisfy 0 < red < green < off, got ${redSeconds}/${greenSeconds}/${offSeconds}`,
    );
  }
}

export function signalTimesFrom(redOn: number, timing: SignalTiming): DeviceSignalTimes {
  return {
    redOn,
    orangeOn: roundTo(redOn + timing.redSeconds, OFFSET_PRECISION),
    greenOn: roundTo(redOn + timing.greenSeconds, OFFSET_PRECISION),
    off: roundTo(redOn + timing.offSeconds, OFFSET_PRECISION),
  };
}

/**
 * Build the schedule from scratch. Safe to call repeatedly: nothing is
 * cached between calls.
 */
export function buildDeviceSchedule(
  topology: Topology,
  entries: RaceEntry[],
  timing: SignalTiming,
  options: ScheduleOptions = {},
): ScheduleResult {
  validateSignalTiming(timing);
  const idleDevices = options.idleDevices ?? 'schedule';

  const minOffset = entries.length > 0 ? Math.min(...entries.map(e => e.startOffset)) : 0;
  const idleRedOn = Math.max(0, roundTo(0 - minOffset, OFFSET_PRECISION));
  const devices: DeviceSchedule = {};
  const diagnostics: Diagnostic[] = [];

  const place = (device: DeviceId, redOn: number) => {
    devices[device] = signalTimesFrom(roundTo(redOn, OFFSET_PRECISION), timing);
  };

  const distances = Object.keys(topology).sort(compareDistances);
  for (const distance of distances) {
    const startPoint = topology[distance];
    const ofDistance = entries.filter(e => e.distance === distance);

    if (startPoint.hasLanes) {
      const byLane = new Map<number, RaceEntry>();
      for (const entry of ofDistance) {
        if (entry.lane === null || entry.lane.kind !== 'lane') {
          diagnostics.push({ kind: 'unassigned-entry', distance, athleteId: entry.athleteId });
          continue;
        }
        if (!byLane.has(entry.lane.index)) byLane.set(entry.lane.index, entry);
      }

      for (let lane = 1; lane <= startPoint.laneCount; lane++) {
        const device = startPoint.laneDevices[lane];
        const entry = byLane.get(lane);
        if (device === undefined) {
          if (entry) {
            diagnostics.push({
              kind: 'unbound-device',
              distance,
              lane: { kind: 'lane', index: lane },
              athleteIds: [entry.athleteId],
            });
          }
          continue;
        }
        if (entry) {
          place(device, entry.startOffset - minOffset);
        } else if (idleDevices === 'schedule') {
          place(device, idleRedOn);
        }
      }
    } else {
      if (startPoint.groupDevices.length === 0) {
        if (ofDistance.length > 0) {
          diagnostics.push({
            kind: 'unbound-device',
            distance,
            lane: { kind: 'scratch' },
            athleteIds: ofDistance.map(e => e.athleteId),
          });
        }
        continue;
      }
      if (ofDistance.length === 0 && idleDevices === 'omit') continue;

      const redOn = ofDistance.length > 0
        ? Math.min(...ofDistance.map(e => e.startOffset)) - minOffset
        : idleRedOn;
      for (const device of startPoint.groupDevices) place(device, redOn);
    }
  }

  return { devices: sortSchedule(devices), minOffset, diagnostics };
}

/**
 * Flatten a schedule into individual signal changes, earliest first.
 */
export function listSignalEvents(schedule: DeviceSchedule): SignalEvent[] {
  const events: SignalEvent[] = [];
  for (const [device, times] of Object.entries(schedule)) {
    events.push(
      { time: times.redOn, device, signal: 'marks' },
      { time: times.orangeOn, device, signal: 'set' },
      { time: times.greenOn, device, signal: 'go' },
      { time: times.off, device, signal: 'off' },
    );
  }
  return events.sort((a, b) => {
    if (a.time !== b.time) return a.time - b.time;
    if (a.device !== b.device) return a.device < b.device ? -1 : 1;
    return SIGNAL_ORDER[a.signal] - SIGNAL_ORDER[b.signal];
  });
}

function sortSchedule(devices: DeviceSchedule): DeviceSchedule {
  const sorted: DeviceSchedule = {};
  for (const device of Object.keys(devices).sort()) sorted[device] = devices[device];
  return sorted;
}
