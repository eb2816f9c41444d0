/**
 * Handicap start sequencer.
 *
 * Public API surface for the roster, track topology, handicap and lane
 * calculations, the race lifecycle, the wire protocol and the transmitter
 * link.
 */

// Types
export type {
  AthleteId,
  DeviceId,
  Distance,
  Athlete,
  Roster,
  LaneRef,
  RaceEntry,
  SignalTiming,
  DeviceSignalTimes,
  DeviceSchedule,
  BuiltSchedule,
  VolumeTable,
  WireEntry,
  WireCommand,
  RaceStage,
  RaceContext,
} from './types.js';
export {
  DEFAULT_SIGNAL_TIMING,
  MIN_VOLUME,
  MAX_VOLUME,
  OFFSET_PRECISION,
  START_COMMAND_TAG,
  START_ACK_TOKEN,
} from './types.js';

// Errors and diagnostics
export type { LinkFailure } from './errors.js';
export { RaceSetupError, RaceStageError, ProtocolError, LinkError } from './errors.js';
export type {
  Diagnostic,
  DiagnosticKind,
  MissingPersonalBestDiagnostic,
  LaneOverflowDiagnostic,
  UnboundDeviceDiagnostic,
  UnassignedEntryDiagnostic,
  InvalidVolumeDiagnostic,
  StaleScheduleDiagnostic,
} from './diagnostics.js';
export { describeDiagnostic, hasDiagnostic } from './diagnostics.js';

// Track topology
export * from './track/index.js';

// Roster
export type { AthleteInput, RosterParseResult } from './roster.js';
export {
  normalizeAthleteId,
  createAthlete,
  addAthlete,
  upsertAthlete,
  getAthlete,
  getPersonalBest,
  searchAthletes,
  rosterDistances,
  parseRosterCsv,
  formatRosterCsv,
} from './roster.js';

// Handicaps, lanes, schedule
export type { HandicapResult } from './handicap.js';
export { computeStartOffsets, roundTo } from './handicap.js';
export type { LanePolicy, LaneAssignmentResult } from './lanes.js';
export { LANE_POLICIES, laneSequence, rankEntries, assignLanes } from './lanes.js';
export type { ScheduleOptions, ScheduleResult, SignalKind, SignalEvent } from './schedule.js';
export {
  validateSignalTiming,
  signalTimesFrom,
  buildDeviceSchedule,
  listSignalEvents,
} from './schedule.js';

// Race lifecycle
export type { RaceContextInit, EncodeCommandResult, PrepareOptions } from './race.js';
export {
  createRaceContext,
  setRoster,
  putAthlete,
  addStartPoint,
  dropStartPoint,
  assignLaneDevice,
  assignGroupDevice,
  releaseDevice,
  resetDeviceBindings,
  enterAthlete,
  withdrawAthlete,
  setVolume,
  setSignalTiming,
  computeHandicaps,
  applyLanePolicy,
  overrideStartOffset,
  shiftStartOffsets,
  buildSchedule,
  encodeCommand,
  markDispatched,
  checkCommandFresh,
  prepareRace,
  entriesAt,
  laneMap,
  serializeRaceContext,
  deserializeRaceContext,
} from './race.js';

// Results
export type { FinishTime, RecordedResults, ResultRow } from './results.js';
export {
  reconcileResults,
  applyNewBests,
  recordResults,
  formatSessionCsv,
  SESSION_CSV_HEADER,
} from './results.js';

// Wire protocol
export * from './protocol/index.js';

// Transmitter link and trigger
export * from './link/index.js';

// Configuration
export type { AppConfig } from './config.js';
export { loadConfig } from './config.js';

// Control server
export * from './server/index.js';
