/**
 * Core type definitions for the handicap start controller.
 */

import type { Diagnostic } from './diagnostics.js';
import type { StartPoint, Topology } from './track/types.js';

// -- Identifiers --

/** Upper-cased athlete token, e.g. `A12`. */
export type AthleteId = string;

/** Two-character zero-padded device address, `00`-`99`. */
export type DeviceId = string;

/** Distance label of a start point, e.g. `100`. */
export type Distance = string;

// -- Roster --

export interface Athlete {
  id: AthleteId;
  name: string;
  /** Personal best per distance, in seconds. Absent = unknown. */
  personalBests: Record<Distance, number>;
}

export type Roster = Record<AthleteId, Athlete>;

// -- Lanes --

/**
 * Where an entry starts: a numbered lane (1-based) or the scratch group
 * of a start point without lanes.
 */
export type LaneRef =
  | { kind: 'lane'; index: number }
  | { kind: 'scratch' };

// -- Race Entries --

export interface RaceEntry {
  athleteId: AthleteId;
  distance: Distance;
  /** Assigned lane. `null` for a laned entry not (yet) placed in a lane. */
  lane: LaneRef | null;
  /** PB at this distance, 0 when the athlete has none. */
  personalBest: number;
  /** Distinguishes a missing PB from a recorded PB of 0. */
  hasPersonalBest: boolean;
  /** Head start in seconds relative to the slowest athlete of the distance. */
  startOffset: number;
  /** Device resolved from the entry's lane or group. */
  device: DeviceId | null;
}

// -- Signal Timing --

/**
 * Seconds after red-on at which each later signal fires.
 * Orange comes on at `redSeconds`, green at `greenSeconds`,
 * and everything goes off at `offSeconds`.
 */
export interface SignalTiming {
  redSeconds: number;
  greenSeconds: number;
  offSeconds: number;
}

export const DEFAULT_SIGNAL_TIMING: SignalTiming = {
  redSeconds: 5,
  greenSeconds: 9,
  offSeconds: 11,
};

// -- Device Schedule --

export interface DeviceSignalTimes {
  redOn: number;
  orangeOn: number;
  greenOn: number;
  off: number;
}

export type DeviceSchedule = Record<DeviceId, DeviceSignalTimes>;

export interface BuiltSchedule {
  devices: DeviceSchedule;
  /** Context revision the schedule was built from. */
  revision: number;
}

// -- Volumes --

export interface VolumeTable {
  defaultVolume?: number;
  perDevice: Record<DeviceId, number>;
}

export const MIN_VOLUME = 0;
export const MAX_VOLUME = 30;

// -- Wire Command --

export interface WireEntry {
  device: DeviceId;
  red: number;
  orange: number;
  green: number;
  off: number;
  volume?: number;
}

export interface WireCommand {
  entries: WireEntry[];
  /** Serialized command, including the trailing `;\n`. */
  text: string;
  /** Context revision the command was encoded from. */
  revision: number;
}

// -- Race Lifecycle --

export type RaceStage =
  | 'configuring'
  | 'handicaps-computed'
  | 'lanes-assigned'
  | 'schedule-built'
  | 'command-encoded'
  | 'dispatched';

export interface RaceContext {
  roster: Roster;
  topology: Topology;
  entries: RaceEntry[];
  volumes: VolumeTable;
  timing: SignalTiming;
  stage: RaceStage;
  /** Bumped on every upstream edit; derived values carry the revision they came from. */
  revision: number;
  schedule: BuiltSchedule | null;
  /** Diagnostics from the most recent computation. */
  diagnostics: Diagnostic[];
}

export type { StartPoint, Topology };

// -- Constants --

/** Decimal places kept on computed start offsets. */
export const OFFSET_PRECISION = 3;

export const START_COMMAND_TAG = 'START:';
export const START_ACK_TOKEN = 'STARTTIMER';
