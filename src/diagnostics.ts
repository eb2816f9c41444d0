/**
 * Diagnostics returned alongside computed values.
 *
 * None of these are fatal: the caller decides whether to warn, retry
 * or abort. Argument and ordering mistakes are thrown instead (see errors.ts).
 */

import type { AthleteId, DeviceId, Distance, LaneRef } from './types.js';
import { formatLaneRef } from './track/topology.js';

export interface MissingPersonalBestDiagnostic {
  kind: 'missing-personal-best';
  athleteId: AthleteId;
  distance: Distance;
}

export interface LaneOverflowDiagnostic {
  kind: 'lane-overflow';
  distance: Distance;
  laneCount: number;
  /** Entries left without a lane, in rank order. */
  athleteIds: AthleteId[];
}

export interface UnboundDeviceDiagnostic {
  kind: 'unbound-device';
  distance: Distance;
  lane: LaneRef;
  athleteIds: AthleteId[];
}

export interface UnassignedEntryDiagnostic {
  kind: 'unassigned-entry';
  distance: Distance;
  athleteId: AthleteId;
}

export interface InvalidVolumeDiagnostic {
  kind: 'invalid-volume';
  /** Undefined for the default volume. */
  device?: DeviceId;
  requested: number;
  /** Volume actually encoded, or undefined when the request was dropped. */
  applied?: number;
}

export interface StaleScheduleDiagnostic {
  kind: 'stale-schedule-dispatch';
  reason: string;
}

export type Diagnostic =
  | MissingPersonalBestDiagnostic
  | LaneOverflowDiagnostic
  | UnboundDeviceDiagnostic
  | UnassignedEntryDiagnostic
  | InvalidVolumeDiagnostic
  | StaleScheduleDiagnostic;

export type DiagnosticKind = Diagnostic['kind'];

/**
 * Human-readable one-liner for display in a shell or log.
 */
export function describeDiagnostic(diagnostic: Diagnostic): string {
  switch (diagnostic.kind) {
    case 'missing-personal-best':
      return `${diagnostic.athleteId} has no personal best for ${diagnostic.distance}; starting with no head start`;
    case 'lane-overflow':
      return `${diagnostic.distance}: ${diagnostic.athleteIds.length} athlete(s) did not fit in ${diagnostic.laneCount} lane(s): ${diagnostic.athleteIds.join(', ')}`;
    case 'unbound-device':
      return `${diagnostic.distance} ${formatLaneRef(diagnostic.lane)} has no device bound; excluded: ${diagnostic.athleteIds.join(', ')}`;
    case 'unassigned-entry':
      return `${diagnostic.distance}: ${diagnostic.athleteId} has no lane and was excluded from the schedule`;
    case 'invalid-volume': {
      const target = diagnostic.device === undefined ? 'default volume' : `device ${diagnostic.device} volume`;
      return diagnostic.applied === undefined
        ? `${target} ${diagnostic.requested} is not a number; ignored`
        : `${target} ${diagnostic.requested} adjusted to ${diagnostic.applied}`;
    }
    case 'stale-schedule-dispatch':
      return `Schedule is out of date: ${diagnostic.reason}`;
  }
}

export function hasDiagnostic(diagnostics: Diagnostic[], kind: DiagnosticKind): boolean {
  return diagnostics.some(d => d.kind === kind);
}
