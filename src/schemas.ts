/**
 * zod schemas for values that cross a process boundary: saved race
 * contexts and control-server messages.
 */

import { z } from 'zod';
import type {
  Athlete,
  LaneRef,
  RaceContext,
  RaceEntry,
  SignalTiming,
  VolumeTable,
} from './types.js';
import type { StartPoint } from './track/types.js';
import type { Diagnostic } from './diagnostics.js';

export const deviceIdSchema = z.string().regex(/^\d{2}$/, 'device IDs are two digits');

const secondsSchema = z.number().finite().nonnegative();

export const athleteSchema: z.ZodType<Athlete> = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  personalBests: z.record(z.string(), secondsSchema),
});

export const laneRefSchema: z.ZodType<LaneRef> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('lane'), index: z.number().int().positive() }),
  z.object({ kind: z.literal('scratch') }),
]);

export const startPointSchema: z.ZodType<StartPoint> = z.discriminatedUnion('hasLanes', [
  z.object({
    distance: z.string().min(1),
    hasLanes: z.literal(true),
    laneCount: z.number().int().positive(),
    laneDevices: z.record(z.string(), deviceIdSchema),
  }),
  z.object({
    distance: z.string().min(1),
    hasLanes: z.literal(false),
    groupDevices: z.array(deviceIdSchema),
  }),
]);

export const raceEntrySchema: z.ZodType<RaceEntry> = z.object({
  athleteId: z.string().min(1),
  distance: z.string().min(1),
  lane: laneRefSchema.nullable(),
  personalBest: secondsSchema,
  hasPersonalBest: z.boolean(),
  startOffset: z.number().finite(),
  device: deviceIdSchema.nullable(),
});

export const volumeTableSchema: z.ZodType<VolumeTable> = z.object({
  defaultVolume: z.number().optional(),
  perDevice: z.record(z.string(), z.number()),
});

export const signalTimingSchema: z.ZodType<SignalTiming> = z.object({
  redSeconds: z.number().positive(),
  greenSeconds: z.number().positive(),
  offSeconds: z.number().positive(),
});

const signalTimesSchema = z.object({
  redOn: secondsSchema,
  orangeOn: secondsSchema,
  greenOn: secondsSchema,
  off: secondsSchema,
});

const diagnosticSchema: z.ZodType<Diagnostic> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('missing-personal-best'), athleteId: z.string(), distance: z.string() }),
  z.object({
    kind: z.literal('lane-overflow'),
    distance: z.string(),
    laneCount: z.number(),
    athleteIds: z.array(z.string()),
  }),
  z.object({
    kind: z.literal('unbound-device'),
    distance: z.string(),
    lane: laneRefSchema,
    athleteIds: z.array(z.string()),
  }),
  z.object({ kind: z.literal('unassigned-entry'), distance: z.string(), athleteId: z.string() }),
  z.object({
    kind: z.literal('invalid-volume'),
    device: z.string().optional(),
    requested: z.number(),
    applied: z.number().optional(),
  }),
  z.object({ kind: z.literal('stale-schedule-dispatch'), reason: z.string() }),
]);

/**
 * Cross-field rules the edit functions maintain but the field schemas
 * cannot see: topology keys, lane ranges, device uniqueness and entry
 * references.
 */
function checkContextInvariants(context: RaceContext, ctx: z.RefinementCtx): void {
  const boundAt = new Map<string, string>();
  const bind = (device: string, where: string, path: (string | number)[]) => {
    const previous = boundAt.get(device);
    if (previous !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Device ${device} is bound to both ${previous} and ${where}`,
        path,
      });
      return;
    }
    boundAt.set(device, where);
  };

  for (const [key, startPoint] of Object.entries(context.topology)) {
    if (startPoint.distance !== key) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Start point ${key} is labelled ${startPoint.distance}`,
        path: ['topology', key, 'distance'],
      });
    }
    if (startPoint.hasLanes) {
      for (const [lane, device] of Object.entries(startPoint.laneDevices)) {
        const index = Number(lane);
        if (!/^\d+$/.test(lane) || index < 1 || index > startPoint.laneCount) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Lane ${lane} at ${key} is outside 1-${startPoint.laneCount}`,
            path: ['topology', key, 'laneDevices', lane],
          });
        }
        bind(device, `${key} lane ${lane}`, ['topology', key, 'laneDevices', lane]);
      }
    } else {
      startPoint.groupDevices.forEach((device, i) => {
        bind(device, `the ${key} group`, ['topology', key, 'groupDevices', i]);
      });
    }
  }

  const entered = new Set<string>();
  const lanesTaken = new Set<string>();
  context.entries.forEach((entry, i) => {
    const path = ['entries', i];
    const issue = (message: string) => ctx.addIssue({ code: z.ZodIssueCode.custom, message, path });

    if (entered.has(entry.athleteId)) issue(`${entry.athleteId} is entered twice`);
    entered.add(entry.athleteId);
    if (!(entry.athleteId in context.roster)) issue(`Entry ${entry.athleteId} is not on the roster`);

    const startPoint = context.topology[entry.distance];
    if (startPoint === undefined) {
      issue(`Entry ${entry.athleteId} names unknown start point ${entry.distance}`);
      return;
    }
    if (entry.lane === null) return;
    if (!startPoint.hasLanes) {
      if (entry.lane.kind === 'lane') issue(`Start point ${entry.distance} has no lanes`);
      return;
    }
    if (entry.lane.kind !== 'lane') {
      issue(`Entry ${entry.athleteId} at laned ${entry.distance} has a scratch lane`);
      return;
    }
    const { index } = entry.lane;
    if (index > startPoint.laneCount) {
      issue(`Lane ${index} at ${entry.distance} is outside 1-${startPoint.laneCount}`);
    }
    const slot = `${entry.distance}#${index}`;
    if (lanesTaken.has(slot)) issue(`Lane ${index} at ${entry.distance} is taken twice`);
    lanesTaken.add(slot);
  });
}

export const raceContextSchema: z.ZodType<RaceContext> = z.object({
  roster: z.record(z.string(), athleteSchema),
  topology: z.record(z.string(), startPointSchema),
  entries: z.array(raceEntrySchema),
  volumes: volumeTableSchema,
  timing: signalTimingSchema,
  stage: z.enum([
    'configuring',
    'handicaps-computed',
    'lanes-assigned',
    'schedule-built',
    'command-encoded',
    'dispatched',
  ]),
  revision: z.number().int().nonnegative(),
  schedule: z.object({
    devices: z.record(z.string(), signalTimesSchema),
    revision: z.number().int().nonnegative(),
  }).nullable(),
  diagnostics: z.array(diagnosticSchema),
}).superRefine(checkContextInvariants);
