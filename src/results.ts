/**
 * Post-race result reconciliation.
 *
 * Finish times are read off the gun, so an athlete's actual running time
 * is `finish − startOffset`. An actual time strictly below the previous PB
 * (or any time, when there was no PB) is a new personal best.
 */

import { stringify } from 'csv-stringify/sync';
import type { AthleteId, Distance, RaceContext, Roster } from './types.js';
import { RaceSetupError, RaceStageError } from './errors.js';
import { getPersonalBest, normalizeAthleteId } from './roster.js';
import { roundTo } from './handicap.js';
import { compareDistances } from './track/topology.js';
import { setRoster } from './race.js';

/** Seconds from the gun, or 'DLQ' for a disqualification. */
export type FinishTime = number | 'DLQ';

export interface ResultRow {
  distance: Distance;
  athleteId: AthleteId;
  name: string;
  /** PB before this race, undefined when there was none. */
  previousBest?: number;
  startOffset: number;
  /** Null when disqualified or no time was recorded. */
  finish: number | null;
  actual: number | null;
  isNewBest: boolean;
}

/**
 * Build one row per entry, grouped by distance and ordered by actual time
 * (athletes without a time last).
 */
export function reconcileResults(
  context: RaceContext,
  finishes: Record<AthleteId, FinishTime>,
): ResultRow[] {
  const finishById = new Map<AthleteId, FinishTime>();
  for (const [rawId, finish] of Object.entries(finishes)) {
    const id = normalizeAthleteId(rawId);
    if (!context.entries.some(e => e.athleteId === id)) {
      throw new RaceSetupError(`${id} is not entered in this race`);
    }
    if (finish !== 'DLQ' && (!Number.isFinite(finish) || finish < 0)) {
      throw new RaceSetupError(`Invalid finish time ${finish} for ${id}`);
    }
    finishById.set(id, finish);
  }

  const rows = context.entries.map((entry): ResultRow => {
    const athlete = context.roster[entry.athleteId];
    const previousBest = athlete ? getPersonalBest(athlete, entry.distance) : undefined;
    const recorded = finishById.get(entry.athleteId);
    const finish = recorded === undefined || recorded === 'DLQ' ? null : recorded;
    const actual = finish === null ? null : roundTo(finish - entry.startOffset, 3);
    const isNewBest = actual !== null && actual > 0 && (previousBest === undefined || actual < previousBest);

    const row: ResultRow = {
      distance: entry.distance,
      athleteId: entry.athleteId,
      name: athlete?.name ?? entry.athleteId,
      startOffset: entry.startOffset,
      finish,
      actual,
      isNewBest,
    };
    if (previousBest !== undefined) row.previousBest = previousBest;
    return row;
  });

  return rows.sort((a, b) => {
    const byDistance = compareDistances(a.distance, b.distance);
    if (byDistance !== 0) return byDistance;
    if (a.actual === null || b.actual === null) {
      return a.actual === b.actual ? 0 : a.actual === null ? 1 : -1;
    }
    return a.actual - b.actual;
  });
}

/**
 * Write new bests back into the roster. Only rows flagged as a new best
 * are applied.
 */
export function applyNewBests(roster: Roster, rows: ResultRow[]): Roster {
  const next: Roster = { ...roster };
  for (const row of rows) {
    if (!row.isNewBest || row.actual === null) continue;
    const athlete = next[row.athleteId];
    if (!athlete) continue;
    next[row.athleteId] = {
      ...athlete,
      personalBests: { ...athlete.personalBests, [row.distance]: row.actual },
    };
  }
  return next;
}

export interface RecordedResults {
  context: RaceContext;
  rows: ResultRow[];
}

/**
 * Reconcile a dispatched race and write its new bests into the roster.
 * Updating the roster is an edit, so the context returns to 'configuring'
 * when any PB changed; otherwise it is returned unchanged.
 */
export function recordResults(context: RaceContext, finishes: Record<AthleteId, FinishTime>): RecordedResults {
  if (context.stage !== 'dispatched') {
    throw new RaceStageError(
      `Cannot record results in stage '${context.stage}': dispatch the race first`,
      context.stage,
    );
  }
  const rows = reconcileResults(context, finishes);
  if (!rows.some(row => row.isNewBest)) return { context, rows };
  return { context: setRoster(context, applyNewBests(context.roster, rows)), rows };
}

export const SESSION_CSV_HEADER = [
  'Timestamp',
  'Distance',
  'AthleteID',
  'Name',
  'Start(s)',
  'Finish(s)',
  'Actual(s)',
  'NewPB',
];

/**
 * Session log rows for one race. Times are written to 2 decimals,
 * disqualified or missing times as `DLQ`.
 */
export function formatSessionCsv(rows: ResultRow[], timestamp: string, includeHeader = true): string {
  const records = rows.map(row => [
    timestamp,
    row.distance,
    row.athleteId,
    row.name,
    row.startOffset.toFixed(2),
    row.finish === null ? 'DLQ' : row.finish.toFixed(2),
    row.actual === null ? 'DLQ' : row.actual.toFixed(2),
    row.isNewBest ? 'YES' : '',
  ]);
  return stringify(includeHeader ? [SESSION_CSV_HEADER, ...records] : records);
}
