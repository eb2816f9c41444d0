/**
 * Roster store: athlete identity and personal bests per distance.
 *
 * The roster interchange format is a CSV table:
 *   ID,Name,<distance>,<distance>,...
 * with one PB in seconds per distance column (blank = unknown).
 */

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import type { Athlete, AthleteId, Distance, Roster } from './types.js';
import { RaceSetupError } from './errors.js';
import { compareDistances } from './track/topology.js';

const csvRowsSchema = z.array(z.array(z.string()));

export interface AthleteInput {
  id: string;
  name: string;
  personalBests?: Record<Distance, number>;
}

export interface RosterParseResult {
  roster: Roster;
  /** Distance columns in header order. */
  distances: Distance[];
  /** Skipped cells and rows, for display. */
  warnings: string[];
}

/**
 * Athlete IDs are case-insensitive tokens stored upper-cased.
 */
export function normalizeAthleteId(raw: string): AthleteId {
  const id = raw.trim().toUpperCase();
  if (id === '' || /\s/.test(id)) {
    throw new RaceSetupError(`Invalid athlete ID "${raw}"`);
  }
  return id;
}

export function createAthlete(input: AthleteInput): Athlete {
  const id = normalizeAthleteId(input.id);
  const name = input.name.trim();
  if (name === '') {
    throw new RaceSetupError(`Athlete ${id} needs a name`);
  }
  const personalBests: Record<Distance, number> = {};
  for (const [distance, seconds] of Object.entries(input.personalBests ?? {})) {
    if (!Number.isFinite(seconds) || seconds < 0) {
      throw new RaceSetupError(`Athlete ${id}: invalid personal best ${seconds} for ${distance}`);
    }
    personalBests[distance] = seconds;
  }
  return { id, name, personalBests };
}

/** Add a new athlete. Throws when the ID is already taken. */
export function addAthlete(roster: Roster, input: AthleteInput): Roster {
  const athlete = createAthlete(input);
  if (athlete.id in roster) {
    throw new RaceSetupError(`Athlete ${athlete.id} already exists`);
  }
  return { ...roster, [athlete.id]: athlete };
}

/** Add or replace an athlete. */
export function upsertAthlete(roster: Roster, input: AthleteInput): Roster {
  const athlete = createAthlete(input);
  return { ...roster, [athlete.id]: athlete };
}

export function getAthlete(roster: Roster, id: string): Athlete {
  const athlete = roster[normalizeAthleteId(id)];
  if (!athlete) {
    throw new RaceSetupError(`Unknown athlete ${id}`);
  }
  return athlete;
}

export function getPersonalBest(athlete: Athlete, distance: Distance): number | undefined {
  return Object.prototype.hasOwnProperty.call(athlete.personalBests, distance)
    ? athlete.personalBests[distance]
    : undefined;
}

/**
 * Case-insensitive name search, sorted by name.
 */
export function searchAthletes(roster: Roster, query: string): Athlete[] {
  const q = query.trim().toLowerCase();
  if (q === '') return [];
  return Object.values(roster)
    .filter(a => a.name.toLowerCase().includes(q))
    .sort((a, b) => a.name.toLowerCase().localeCompare(b.name.toLowerCase()));
}

/** Every distance with at least one recorded PB. */
export function rosterDistances(roster: Roster): Distance[] {
  const distances = new Set<Distance>();
  for (const athlete of Object.values(roster)) {
    for (const distance of Object.keys(athlete.personalBests)) distances.add(distance);
  }
  return [...distances].sort(compareDistances);
}

// -- CSV interchange --

export function parseRosterCsv(text: string): RosterParseResult {
  const parsed: unknown = parse(text, {
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
  });
  const rows = csvRowsSchema.parse(parsed);
  if (rows.length === 0) {
    return { roster: {}, distances: [], warnings: [] };
  }

  const header = rows[0];
  const idIndex = header.indexOf('ID');
  const nameIndex = header.indexOf('Name');
  if (idIndex < 0 || nameIndex < 0) {
    throw new RaceSetupError('Roster header must contain ID and Name columns');
  }
  const distanceColumns = header
    .map((label, index) => ({ label, index }))
    .filter(c => c.index !== idIndex && c.index !== nameIndex && c.label !== '');

  const roster: Roster = {};
  const warnings: string[] = [];

  rows.slice(1).forEach((row, i) => {
    const line = i + 2;
    const rawId = row[idIndex] ?? '';
    const name = row[nameIndex] ?? '';
    if (rawId === '' || name === '') {
      warnings.push(`Line ${line}: missing ID or Name, row skipped`);
      return;
    }
    const id = rawId.toUpperCase();
    if (/\s/.test(id)) {
      warnings.push(`Line ${line}: invalid athlete ID "${rawId}", row skipped`);
      return;
    }
    if (id in roster) {
      warnings.push(`Line ${line}: duplicate athlete ID ${id}, row skipped`);
      return;
    }

    const personalBests: Record<Distance, number> = {};
    for (const { label, index } of distanceColumns) {
      const cell = row[index] ?? '';
      if (cell === '') continue;
      const seconds = Number(cell);
      if (!Number.isFinite(seconds) || seconds < 0) {
        warnings.push(`Line ${line}: skipping invalid PB for ${id}: ${label}='${cell}'`);
        continue;
      }
      personalBests[label] = seconds;
    }
    roster[id] = { id, name, personalBests };
  });

  return { roster, distances: distanceColumns.map(c => c.label), warnings };
}

/**
 * Serialize a roster back to CSV. Distances are the union of `distances`
 * and every PB on file, ordered numerically; PBs are written to 2 decimals.
 */
export function formatRosterCsv(roster: Roster, distances: Distance[] = []): string {
  const columns = [...new Set([...distances, ...rosterDistances(roster)])].sort(compareDistances);
  const records: string[][] = [['ID', 'Name', ...columns]];
  for (const athlete of Object.values(roster)) {
    records.push([
      athlete.id,
      athlete.name,
      ...columns.map(d => {
        const pb = getPersonalBest(athlete, d);
        return pb === undefined ? '' : pb.toFixed(2);
      }),
    ]);
  }
  return stringify(records);
}
