/**
 * Race Lifecycle Management
 *
 * A RaceContext bundles the roster, the track topology and the race entries
 * and moves through these stages:
 *
 *   configuring → handicaps-computed → lanes-assigned (laned only)
 *     → schedule-built → command-encoded → dispatched
 *
 * Every function takes a context and returns a new one. Any edit to the
 * roster, topology, entries, volumes or timing returns to 'configuring' and
 * discards derived data, so each later stage has to be re-run before a
 * command can be encoded again.
 */

import type {
  AthleteId,
  DeviceId,
  Distance,
  RaceContext,
  RaceEntry,
  RaceStage,
  Roster,
  SignalTiming,
  VolumeTable,
  WireCommand,
} from './types.js';
import { DEFAULT_SIGNAL_TIMING, OFFSET_PRECISION } from './types.js';
import type { Topology, StartPointDefinition } from './track/types.js';
import type { Diagnostic } from './diagnostics.js';
import type { AthleteInput } from './roster.js';
import type { LanePolicy } from './lanes.js';
import type { ScheduleOptions } from './schedule.js';
import { RaceSetupError, RaceStageError } from './errors.js';
import { normalizeAthleteId, upsertAthlete } from './roster.js';
import {
  bindGroupDevice,
  bindLaneDevice,
  clearDeviceBindings,
  compareDistances,
  defineStartPoint,
  getLanedStartPoint,
  getStartPoint,
  normalizeDeviceId,
  removeStartPoint,
  resolveDevice,
  unbindDevice,
} from './track/topology.js';
import { computeStartOffsets, roundTo } from './handicap.js';
import { assignLanes } from './lanes.js';
import { buildDeviceSchedule, validateSignalTiming } from './schedule.js';
import { encodeStartCommand } from './protocol/command.js';
import { raceContextSchema } from './schemas.js';

// -- Construction --

export interface RaceContextInit {
  roster?: Roster;
  topology?: Topology;
  volumes?: VolumeTable;
  timing?: SignalTiming;
}

export function createRaceContext(init: RaceContextInit = {}): RaceContext {
  const timing = init.timing ?? DEFAULT_SIGNAL_TIMING;
  validateSignalTiming(timing);
  return {
    roster: init.roster ?? {},
    topology: init.topology ?? {},
    entries: [],
    volumes: init.volumes ?? { perDevice: {} },
    timing,
    stage: 'configuring',
    revision: 0,
    schedule: null,
    diagnostics: [],
  };
}

// -- Edits (return to 'configuring') --

type EditableFields = Pick<RaceContext, 'roster' | 'topology' | 'entries' | 'volumes' | 'timing'>;

/**
 * Apply an upstream edit. Entries whose athlete or start point no longer
 * exists are dropped; the rest keep their lane but lose derived values.
 */
function edit(context: RaceContext, patch: Partial<EditableFields>): RaceContext {
  const roster = patch.roster ?? context.roster;
  const topology = patch.topology ?? context.topology;
  const entries = (patch.entries ?? context.entries)
    .filter(e => e.athleteId in roster && e.distance in topology)
    .map(resetDerived);

  return {
    ...context,
    ...patch,
    roster,
    topology,
    entries,
    stage: 'configuring',
    revision: context.revision + 1,
    schedule: null,
    diagnostics: [],
  };
}

function resetDerived(entry: RaceEntry): RaceEntry {
  return { ...entry, personalBest: 0, hasPersonalBest: false, startOffset: 0, device: null };
}

export function setRoster(context: RaceContext, roster: Roster): RaceContext {
  return edit(context, { roster });
}

/** Add or replace one athlete on the roster. */
export function putAthlete(context: RaceContext, input: AthleteInput): RaceContext {
  return edit(context, { roster: upsertAthlete(context.roster, input) });
}

export function addStartPoint(context: RaceContext, definition: StartPointDefinition): RaceContext {
  return edit(context, { topology: defineStartPoint(context.topology, definition) });
}

/** Remove a start point together with its entries. */
export function dropStartPoint(context: RaceContext, distance: Distance): RaceContext {
  return edit(context, { topology: removeStartPoint(context.topology, distance) });
}

export function assignLaneDevice(
  context: RaceContext,
  distance: Distance,
  laneIndex: number,
  device: DeviceId,
): RaceContext {
  return edit(context, { topology: bindLaneDevice(context.topology, distance, laneIndex, device) });
}

export function assignGroupDevice(context: RaceContext, distance: Distance, device: DeviceId): RaceContext {
  return edit(context, { topology: bindGroupDevice(context.topology, distance, device) });
}

export function releaseDevice(context: RaceContext, device: DeviceId): RaceContext {
  return edit(context, { topology: unbindDevice(context.topology, device) });
}

export function resetDeviceBindings(context: RaceContext, distance?: Distance): RaceContext {
  return edit(context, { topology: clearDeviceBindings(context.topology, distance) });
}

/**
 * Enter an athlete into one start point. For laned start points the lane
 * is optional; entries without a lane get one from a lane policy.
 */
export function enterAthlete(
  context: RaceContext,
  athleteId: string,
  distance: Distance,
  laneIndex?: number,
): RaceContext {
  const id = normalizeAthleteId(athleteId);
  if (!(id in context.roster)) {
    throw new RaceSetupError(`Unknown athlete ${id}`);
  }
  const existing = context.entries.find(e => e.athleteId === id);
  if (existing) {
    throw new RaceSetupError(`${id} is already entered at ${existing.distance}`);
  }

  const startPoint = getStartPoint(context.topology, distance);
  let lane: RaceEntry['lane'];
  if (startPoint.hasLanes) {
    if (laneIndex === undefined) {
      lane = null;
    } else {
      if (!Number.isInteger(laneIndex) || laneIndex < 1 || laneIndex > startPoint.laneCount) {
        throw new RaceSetupError(`Lane ${laneIndex} is outside 1-${startPoint.laneCount} for ${distance}`);
      }
      const taken = context.entries.find(
        e => e.distance === distance && e.lane?.kind === 'lane' && e.lane.index === laneIndex,
      );
      if (taken) {
        throw new RaceSetupError(`Lane ${laneIndex} at ${distance} is already taken by ${taken.athleteId}`);
      }
      lane = { kind: 'lane', index: laneIndex };
    }
  } else {
    if (laneIndex !== undefined) {
      throw new RaceSetupError(`Start point ${distance} has no lanes`);
    }
    lane = { kind: 'scratch' };
  }

  const entry: RaceEntry = {
    athleteId: id,
    distance: startPoint.distance,
    lane,
    personalBest: 0,
    hasPersonalBest: false,
    startOffset: 0,
    device: null,
  };
  return edit(context, { entries: [...context.entries, entry] });
}

export function withdrawAthlete(context: RaceContext, athleteId: string): RaceContext {
  const id = normalizeAthleteId(athleteId);
  if (!context.entries.some(e => e.athleteId === id)) {
    throw new RaceSetupError(`${id} is not entered`);
  }
  return edit(context, { entries: context.entries.filter(e => e.athleteId !== id) });
}

/**
 * Set the default volume (no device) or a per-device override.
 * `undefined` clears it. Values are clamped when the command is encoded.
 */
export function setVolume(context: RaceContext, volume: number | undefined, device?: DeviceId): RaceContext {
  if (device === undefined) {
    const { defaultVolume: _previous, ...rest } = context.volumes;
    return edit(context, { volumes: volume === undefined ? rest : { ...rest, defaultVolume: volume } });
  }
  const id = normalizeDeviceId(device);
  const perDevice = { ...context.volumes.perDevice };
  if (volume === undefined) {
    delete perDevice[id];
  } else {
    perDevice[id] = volume;
  }
  return edit(context, { volumes: { ...context.volumes, perDevice } });
}

export function setSignalTiming(context: RaceContext, timing: SignalTiming): RaceContext {
  validateSignalTiming(timing);
  return edit(context, { timing });
}

// -- Derived stages --

/**
 * Compute PBs and start offsets for every start point and resolve each
 * entry's device. Discards earlier offset overrides.
 */
export function computeHandicaps(context: RaceContext): RaceContext {
  const diagnostics: Diagnostic[] = [];
  const computed = new Map<AthleteId, RaceEntry>();

  for (const distance of Object.keys(context.topology).sort(compareDistances)) {
    const startPoint = context.topology[distance];
    const ofDistance = context.entries.filter(e => e.distance === distance);
    const result = computeStartOffsets(ofDistance, context.roster, distance);
    diagnostics.push(...result.diagnostics);
    for (const entry of result.entries) {
      computed.set(entry.athleteId, { ...entry, device: resolveDevice(startPoint, entry.lane) });
    }
  }

  return {
    ...context,
    entries: context.entries.map(e => computed.get(e.athleteId) ?? e),
    stage: 'handicaps-computed',
    revision: context.revision + 1,
    schedule: null,
    diagnostics,
  };
}

/**
 * Re-deal the lanes of one laned start point. Replaces its previous lane
 * mapping entirely.
 */
export function applyLanePolicy(context: RaceContext, distance: Distance, policy: LanePolicy): RaceContext {
  assertHandicapsComputed(context, 'assign lanes');
  const startPoint = getLanedStartPoint(context.topology, distance);
  const ofDistance = context.entries.filter(e => e.distance === distance);
  const result = assignLanes(ofDistance, context.roster, startPoint, policy);
  const placed = new Map(result.entries.map(e => [e.athleteId, e]));

  return {
    ...context,
    entries: context.entries.map(e => placed.get(e.athleteId) ?? e),
    stage: 'lanes-assigned',
    revision: context.revision + 1,
    schedule: null,
    diagnostics: result.diagnostics,
  };
}

/** Replace one athlete's computed head start. */
export function overrideStartOffset(context: RaceContext, athleteId: string, seconds: number): RaceContext {
  assertHandicapsComputed(context, 'override start offsets');
  const id = normalizeAthleteId(athleteId);
  if (!context.entries.some(e => e.athleteId === id)) {
    throw new RaceSetupError(`${id} is not entered`);
  }
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new RaceSetupError(`Start offset must be a non-negative number, got ${seconds}`);
  }
  const startOffset = roundTo(seconds, OFFSET_PRECISION);
  return adjustOffsets(context, e => (e.athleteId === id ? startOffset : e.startOffset));
}

/**
 * Add `delta` seconds to every head start, or to one distance's.
 * Rejected when any offset would drop below zero.
 */
export function shiftStartOffsets(context: RaceContext, delta: number, distance?: Distance): RaceContext {
  assertHandicapsComputed(context, 'shift start offsets');
  if (!Number.isFinite(delta)) {
    throw new RaceSetupError(`Offset delta must be a number, got ${delta}`);
  }
  if (distance !== undefined) getStartPoint(context.topology, distance);

  const applies = (e: RaceEntry) => distance === undefined || e.distance === distance;
  const shifted = (e: RaceEntry) => roundTo(e.startOffset + delta, OFFSET_PRECISION);
  const negative = context.entries.find(e => applies(e) && shifted(e) < 0);
  if (negative) {
    throw new RaceSetupError(`Shifting by ${delta}s would give ${negative.athleteId} a negative start offset`);
  }
  return adjustOffsets(context, e => (applies(e) ? shifted(e) : e.startOffset));
}

function adjustOffsets(context: RaceContext, offsetOf: (entry: RaceEntry) => number): RaceContext {
  return {
    ...context,
    entries: context.entries.map(e => ({ ...e, startOffset: offsetOf(e) })),
    stage: context.stage === 'lanes-assigned' ? 'lanes-assigned' : 'handicaps-computed',
    revision: context.revision + 1,
    schedule: null,
    diagnostics: [],
  };
}

/**
 * Build the device schedule. Each build moves to a new revision, so a
 * command encoded from an earlier build is stale even when the options
 * alone changed.
 */
export function buildSchedule(context: RaceContext, options: ScheduleOptions = {}): RaceContext {
  assertHandicapsComputed(context, 'build the device schedule');
  const result = buildDeviceSchedule(context.topology, context.entries, context.timing, options);
  const revision = context.revision + 1;
  return {
    ...context,
    stage: 'schedule-built',
    revision,
    schedule: { devices: result.devices, revision },
    diagnostics: result.diagnostics,
  };
}

export interface EncodeCommandResult {
  context: RaceContext;
  /** Null when the schedule is missing or out of date. */
  command: WireCommand | null;
  diagnostics: Diagnostic[];
}

/**
 * Encode the current schedule. Reports `stale-schedule-dispatch` instead
 * of encoding when the schedule is missing or predates the latest change.
 */
export function encodeCommand(context: RaceContext): EncodeCommandResult {
  const stale = staleReason(context);
  if (stale !== null || context.schedule === null) {
    const diagnostics: Diagnostic[] = [
      { kind: 'stale-schedule-dispatch', reason: stale ?? 'no schedule has been built' },
    ];
    return { context: { ...context, diagnostics }, command: null, diagnostics };
  }

  const { command, diagnostics } = encodeStartCommand(
    context.schedule.devices,
    context.volumes,
    context.schedule.revision,
  );
  return {
    context: { ...context, stage: 'command-encoded', diagnostics },
    command,
    diagnostics,
  };
}

/**
 * Record that `command` went out. A command encoded before the latest
 * change is refused with `stale-schedule-dispatch`.
 */
export function markDispatched(
  context: RaceContext,
  command: WireCommand,
): { context: RaceContext; diagnostics: Diagnostic[] } {
  const reason = checkCommandFresh(context, command);
  if (reason !== null) {
    const diagnostics: Diagnostic[] = [{ kind: 'stale-schedule-dispatch', reason }];
    return { context: { ...context, diagnostics }, diagnostics };
  }
  return { context: { ...context, stage: 'dispatched', diagnostics: [] }, diagnostics: [] };
}

/**
 * Why `command` may not be sent for this context, or null when it may.
 */
export function checkCommandFresh(context: RaceContext, command: WireCommand): string | null {
  if (command.revision !== context.revision) {
    return `command was encoded at revision ${command.revision}, race is at revision ${context.revision}`;
  }
  if (context.stage !== 'command-encoded' && context.stage !== 'dispatched') {
    return `race is in stage '${context.stage}'`;
  }
  return null;
}

export interface PrepareOptions {
  /** Lane policy per laned distance. Distances not listed keep their lanes. */
  lanePolicies?: Record<Distance, LanePolicy>;
  schedule?: ScheduleOptions;
}

/**
 * Run every stage in order and encode the command.
 * Diagnostics of all stages are returned together.
 */
export function prepareRace(context: RaceContext, options: PrepareOptions = {}): EncodeCommandResult {
  const diagnostics: Diagnostic[] = [];

  let next = computeHandicaps(context);
  diagnostics.push(...next.diagnostics);

  const policies = Object.entries(options.lanePolicies ?? {})
    .sort(([a], [b]) => compareDistances(a, b));
  for (const [distance, policy] of policies) {
    next = applyLanePolicy(next, distance, policy);
    diagnostics.push(...next.diagnostics);
  }

  next = buildSchedule(next, options.schedule);
  diagnostics.push(...next.diagnostics);

  const encoded = encodeCommand(next);
  diagnostics.push(...encoded.diagnostics);
  return { ...encoded, context: { ...encoded.context, diagnostics }, diagnostics };
}

// -- Queries --

export function entriesAt(context: RaceContext, distance: Distance): RaceEntry[] {
  return context.entries.filter(e => e.distance === distance);
}

/** Lane index → athlete for one laned start point. */
export function laneMap(context: RaceContext, distance: Distance): Record<number, AthleteId> {
  const lanes: Record<number, AthleteId> = {};
  for (const entry of entriesAt(context, distance)) {
    if (entry.lane?.kind === 'lane') lanes[entry.lane.index] = entry.athleteId;
  }
  return lanes;
}

// -- Serialization --

export function serializeRaceContext(context: RaceContext): string {
  return JSON.stringify(context);
}

/**
 * Restore a context saved with serializeRaceContext. Throws when the JSON
 * does not describe a valid context.
 */
export function deserializeRaceContext(json: string): RaceContext {
  const parsed: unknown = JSON.parse(json);
  const result = raceContextSchema.safeParse(parsed);
  if (!result.success) {
    throw new RaceSetupError(`Invalid race context: ${result.error.issues[0]?.message ?? 'unknown error'}`);
  }
  return result.data;
}

// -- Helpers --

const STAGES_AFTER_HANDICAPS: readonly RaceStage[] = [
  'handicaps-computed',
  'lanes-assigned',
  'schedule-built',
  'command-encoded',
  'dispatched',
];

function assertHandicapsComputed(context: RaceContext, action: string): void {
  if (!STAGES_AFTER_HANDICAPS.includes(context.stage)) {
    throw new RaceStageError(
      `Cannot ${action} in stage '${context.stage}': compute handicaps first`,
      context.stage,
    );
  }
}

function staleReason(context: RaceContext): string | null {
  if (context.schedule === null) {
    return context.stage === 'configuring'
      ? 'race data changed since the last schedule was built'
      : 'no schedule has been built';
  }
  if (context.schedule.revision !== context.revision) {
    return `schedule was built at revision ${context.schedule.revision}, race is at revision ${context.revision}`;
  }
  return null;
}
