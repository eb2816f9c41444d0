/**
 * Lane assignment policies for laned start points.
 *
 * Entries are ranked slowest → fastest, then dealt onto lanes in the
 * order the policy dictates:
 *   - 'outside-in'    1, N, 2, N-1, 3, ... (snake toward the middle)
 *   - 'left-to-right' 1, 2, ..., N
 *   - 'right-to-left' N, N-1, ..., 1
 */

import type { AthleteId, RaceEntry, Roster } from './types.js';
import type { LanedStartPoint } from './track/types.js';
import type { Diagnostic } from './diagnostics.js';
import { RaceSetupError } from './errors.js';

export type LanePolicy = 'outside-in' | 'left-to-right' | 'right-to-left';

export const LANE_POLICIES: readonly LanePolicy[] = ['outside-in', 'left-to-right', 'right-to-left'];

export interface LaneAssignmentResult {
  /** Entries of the distance with `lane` and `device` replaced. */
  entries: RaceEntry[];
  /** Lane index → athlete. Only lanes that received an athlete. */
  lanes: Record<number, AthleteId>;
  diagnostics: Diagnostic[];
}

/**
 * Lane indices in the order ranked athletes are placed.
 */
export function laneSequence(laneCount: number, policy: LanePolicy): number[] {
  if (!Number.isInteger(laneCount) || laneCount < 1) {
    throw new RaceSetupError(`Lane count must be a positive integer, got ${laneCount}`);
  }
  switch (policy) {
    case 'left-to-right':
      return Array.from({ length: laneCount }, (_, i) => i + 1);
    case 'right-to-left':
      return Array.from({ length: laneCount }, (_, i) => laneCount - i);
    case 'outside-in': {
      const order: number[] = [];
      let left = 1;
      let right = laneCount;
      while (left <= right) {
        order.push(left);
        if (right !== left) order.push(right);
        left++;
        right--;
      }
      return order;
    }
  }
}

/**
 * Rank entries slowest → fastest.
 *
 * The slowest athlete has the smallest head start, so the primary key is
 * ascending `startOffset`. Ties go to the larger PB first, then name,
 * then athlete ID.
 */
export function rankEntries(entries: RaceEntry[], roster: Roster): RaceEntry[] {
  const nameOf = (id: AthleteId) => roster[id]?.name ?? '';
  return [...entries].sort((a, b) => {
    if (a.startOffset !== b.startOffset) return a.startOffset - b.startOffset;
    if (a.personalBest !== b.personalBest) return b.personalBest - a.personalBest;
    const na = nameOf(a.athleteId);
    const nb = nameOf(b.athleteId);
    if (na !== nb) return na < nb ? -1 : 1;
    return a.athleteId < b.athleteId ? -1 : a.athleteId > b.athleteId ? 1 : 0;
  });
}

/**
 * Place the entries of one laned start point. The previous mapping is
 * discarded entirely; entries beyond the lane count are left without a
 * lane and reported as `lane-overflow`.
 */
export function assignLanes(
  entries: RaceEntry[],
  roster: Roster,
  startPoint: LanedStartPoint,
  policy: LanePolicy,
): LaneAssignmentResult {
  for (const entry of entries) {
    if (entry.distance !== startPoint.distance) {
      throw new RaceSetupError(
        `Entry ${entry.athleteId} belongs to ${entry.distance}, not ${startPoint.distance}`,
      );
    }
  }

  const order = laneSequence(startPoint.laneCount, policy);
  const ranked = rankEntries(entries, roster);
  const lanes: Record<number, AthleteId> = {};
  const overflow: AthleteId[] = [];

  const placed = ranked.map((entry, rank): RaceEntry => {
    if (rank >= order.length) {
      overflow.push(entry.athleteId);
      return { ...entry, lane: null, device: null };
    }
    const index = order[rank];
    lanes[index] = entry.athleteId;
    return {
      ...entry,
      lane: { kind: 'lane', index },
      device: startPoint.laneDevices[index] ?? null,
    };
  });

  const diagnostics: Diagnostic[] = overflow.length > 0
    ? [{
      kind: 'lane-overflow',
      distance: startPoint.distance,
      laneCount: startPoint.laneCount,
      athleteIds: overflow,
    }]
    : [];

  return { entries: placed, lanes, diagnostics };
}
