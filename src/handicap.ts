/**
 * Handicap calculation.
 *
 * The slowest athlete of a distance gets no head start; everyone else
 * starts earlier by the gap between their PB and the slowest PB, so that
 * athletes running to their PB all finish together.
 */

import type { Distance, RaceEntry, Roster } from './types.js';
import { OFFSET_PRECISION } from './types.js';
import type { Diagnostic } from './diagnostics.js';
import { getPersonalBest } from './roster.js';
import { RaceSetupError } from './errors.js';

export interface HandicapResult {
  entries: RaceEntry[];
  /** Slowest PB among entries that have one, 0 if none do. */
  slowestPersonalBest: number;
  diagnostics: Diagnostic[];
}

export function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  const rounded = Math.round(value * factor) / factor;
  return rounded === 0 ? 0 : rounded;
}

/**
 * Compute `personalBest` and `startOffset` for every entry of one distance.
 *
 * Entries without a PB for the distance start with no head start and a
 * PB of 0; each one is reported as `missing-personal-best`.
 */
export function computeStartOffsets(
  entries: RaceEntry[],
  roster: Roster,
  distance: Distance,
): HandicapResult {
  const diagnostics: Diagnostic[] = [];

  const withPbs = entries.map(entry => {
    if (entry.distance !== distance) {
      throw new RaceSetupError(
        `Entry ${entry.athleteId} belongs to ${entry.distance}, not ${distance}`,
      );
    }
    const athlete = roster[entry.athleteId];
    if (!athlete) {
      throw new RaceSetupError(`Entry ${entry.athleteId} is not on the roster`);
    }
    return { entry, pb: getPersonalBest(athlete, distance) };
  });

  const known = withPbs.flatMap(({ pb }) => (pb === undefined ? [] : [pb]));
  const slowestPersonalBest = known.length > 0 ? Math.max(...known) : 0;

  const computed = withPbs.map(({ entry, pb }): RaceEntry => {
    if (pb === undefined) {
      diagnostics.push({ kind: 'missing-personal-best', athleteId: entry.athleteId, distance });
      return { ...entry, personalBest: 0, hasPersonalBest: false, startOffset: 0 };
    }
    return {
      ...entry,
      personalBest: pb,
      hasPersonalBest: true,
      startOffset: roundTo(slowestPersonalBest - pb, OFFSET_PRECISION),
    };
  });

  return { entries: computed, slowestPersonalBest, diagnostics };
}
