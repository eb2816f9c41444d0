import { describe, it, expect } from 'vitest';
import {
  buildDeviceSchedule,
  listSignalEvents,
  signalTimesFrom,
  validateSignalTiming,
} from './schedule.js';
import { DEFAULT_SIGNAL_TIMING } from './types.js';
import type { LaneRef, RaceEntry } from './types.js';
import type { Topology } from './track/types.js';
import { bindGroupDevice, bindLaneDevice, defineStartPoint } from './track/topology.js';

function makeEntry(athleteId: string, distance: string, lane: LaneRef | null, startOffset: number): RaceEntry {
  return {
    athleteId,
    distance,
    lane,
    personalBest: 10,
    hasPersonalBest: true,
    startOffset,
    device: null,
  };
}

const lane = (index: number): LaneRef => ({ kind: 'lane', index });

function lanedTopology(laneCount: number, bound: Record<number, string>): Topology {
  let topology = defineStartPoint({}, { distance: '100m', laneCount });
  for (const [index, device] of Object.entries(bound)) {
    topology = bindLaneDevice(topology, '100m', Number(index), device);
  }
  return topology;
}

describe('validateSignalTiming', () => {
  it('accepts the default timing', () => {
    expect(() => validateSignalTiming(DEFAULT_SIGNAL_TIMING)).not.toThrow();
  });

  it('rejects durations out of order', () => {
    expect(() => validateSignalTiming({ redSeconds: 5, greenSeconds: 5, offSeconds: 11 }))
      .toThrow('Signal durations must satisfy 0 < red < green < off, got 5/5/11');
  });

  it('rejects non-finite durations', () => {
    expect(() => validateSignalTiming({ redSeconds: 5, greenSeconds: 9, offSeconds: Infinity }))
      .toThrow('Signal durations must be finite numbers');
  });
});

describe('signalTimesFrom', () => {
  it('derives every phase from the red time', () => {
    expect(signalTimesFrom(1.5, DEFAULT_SIGNAL_TIMING)).toEqual({
      redOn: 1.5,
      orangeOn: 6.5,
      greenOn: 10.5,
      off: 12.5,
    });
  });
});

describe('buildDeviceSchedule', () => {
  it('schedules only bound lanes and reports the unbound one', () => {
    const topology = lanedTopology(4, { 1: '01', 3: '03' });
    const entries = [
      makeEntry('X', '100m', lane(1), 0),
      makeEntry('Y', '100m', lane(2), 1),
      makeEntry('Z', '100m', lane(3), 2),
    ];

    const result = buildDeviceSchedule(topology, entries, DEFAULT_SIGNAL_TIMING, { idleDevices: 'omit' });

    expect(result.devices).toEqual({
      '01': { redOn: 0, orangeOn: 5, greenOn: 9, off: 11 },
      '03': { redOn: 2, orangeOn: 7, greenOn: 11, off: 13 },
    });
    expect(result.diagnostics).toEqual([
      { kind: 'unbound-device', distance: '100m', lane: lane(2), athleteIds: ['Y'] },
    ]);
  });

  it('keeps every device on strictly increasing times', () => {
    const topology = lanedTopology(3, { 1: '01', 2: '02', 3: '03' });
    const entries = [
      makeEntry('X', '100m', lane(1), 0.25),
      makeEntry('Y', '100m', lane(2), 3.125),
      makeEntry('Z', '100m', lane(3), 1.5),
    ];

    const { devices } = buildDeviceSchedule(topology, entries, DEFAULT_SIGNAL_TIMING);
    for (const times of Object.values(devices)) {
      expect(times.redOn).toBeGreaterThanOrEqual(0);
      expect(times.redOn).toBeLessThan(times.orangeOn);
      expect(times.orangeOn).toBeLessThan(times.greenOn);
      expect(times.greenOn).toBeLessThan(times.off);
    }
    expect(devices['01'].redOn).toBe(0);
  });

  it('fires idle bound lanes from the shared zero point unless omitted', () => {
    const topology = lanedTopology(2, { 1: '01', 2: '02' });
    const entries = [makeEntry('X', '100m', lane(1), 1)];

    const scheduled = buildDeviceSchedule(topology, entries, DEFAULT_SIGNAL_TIMING);
    expect(Object.keys(scheduled.devices)).toEqual(['01', '02']);
    expect(scheduled.devices['02'].redOn).toBe(0);
    expect(scheduled.minOffset).toBe(1);

    const omitted = buildDeviceSchedule(topology, entries, DEFAULT_SIGNAL_TIMING, { idleDevices: 'omit' });
    expect(Object.keys(omitted.devices)).toEqual(['01']);
  });

  it('fires every device of a scratch group together', () => {
    let topology = lanedTopology(1, { 1: '01' });
    topology = defineStartPoint(topology, { distance: '800m' });
    topology = bindGroupDevice(topology, '800m', '06');
    topology = bindGroupDevice(topology, '800m', '05');
    const entries = [
      makeEntry('X', '100m', lane(1), 0),
      makeEntry('P', '800m', { kind: 'scratch' }, 2),
      makeEntry('Q', '800m', { kind: 'scratch' }, 0.5),
    ];

    const { devices } = buildDeviceSchedule(topology, entries, DEFAULT_SIGNAL_TIMING);

    expect(Object.keys(devices)).toEqual(['01', '05', '06']);
    expect(devices['05']).toEqual({ redOn: 0.5, orangeOn: 5.5, greenOn: 9.5, off: 11.5 });
    expect(devices['06']).toEqual(devices['05']);
  });

  it('reports laned entries without a lane', () => {
    const topology = lanedTopology(2, { 1: '01' });
    const entries = [makeEntry('X', '100m', null, 0)];

    const result = buildDeviceSchedule(topology, entries, DEFAULT_SIGNAL_TIMING, { idleDevices: 'omit' });

    expect(result.devices).toEqual({});
    expect(result.diagnostics).toEqual([{ kind: 'unassigned-entry', distance: '100m', athleteId: 'X' }]);
  });

  it('reports a scratch start with athletes but no devices', () => {
    const topology = defineStartPoint({}, { distance: '800m' });
    const entries = [makeEntry('P', '800m', { kind: 'scratch' }, 0)];

    const result = buildDeviceSchedule(topology, entries, DEFAULT_SIGNAL_TIMING);

    expect(result.devices).toEqual({});
    expect(result.diagnostics).toEqual([
      { kind: 'unbound-device', distance: '800m', lane: { kind: 'scratch' }, athleteIds: ['P'] },
    ]);
  });
});

describe('listSignalEvents', () => {
  it('orders events by time, then device', () => {
    const events = listSignalEvents({
      '02': signalTimesFrom(0, DEFAULT_SIGNAL_TIMING),
      '01': signalTimesFrom(2, DEFAULT_SIGNAL_TIMING),
    });

    expect(events.map(e => `${e.time} ${e.device} ${e.signal}`)).toEqual([
      '0 02 marks',
      '2 01 marks',
      '5 02 set',
      '7 01 set',
      '9 02 go',
      '11 01 go',
      '11 02 off',
      '13 01 off',
    ]);
  });
});
