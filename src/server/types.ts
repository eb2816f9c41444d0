/**
 * Control-server message protocol.
 *
 * Operators drive one race session over a WebSocket: every edit is a
 * client message, and the server answers with the updated session state.
 */

import { z } from 'zod';
import type { DeviceId, RaceContext, WireCommand } from '../types.js';
import type { TriggerResult } from '../link/types.js';
import type { ResultRow } from '../results.js';

// -- Client → Server --

const athleteInputSchema = z.object({
  id: z.string(),
  name: z.string(),
  personalBests: z.record(z.string(), z.number()).optional(),
});

const lanePolicySchema = z.enum(['outside-in', 'left-to-right', 'right-to-left']);

export const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('get-state') }),
  z.object({ type: z.literal('load-roster'), csv: z.string() }),
  z.object({ type: z.literal('put-athlete'), athlete: athleteInputSchema }),
  z.object({
    type: z.literal('add-start-point'),
    distance: z.string(),
    laneCount: z.number().int().nonnegative().optional(),
  }),
  z.object({ type: z.literal('remove-start-point'), distance: z.string() }),
  z.object({
    type: z.literal('bind-lane-device'),
    distance: z.string(),
    lane: z.number().int(),
    device: z.string(),
  }),
  z.object({ type: z.literal('bind-group-device'), distance: z.string(), device: z.string() }),
  z.object({ type: z.literal('release-device'), device: z.string() }),
  z.object({ type: z.literal('clear-device-bindings'), distance: z.string().optional() }),
  z.object({
    type: z.literal('enter-athlete'),
    athleteId: z.string(),
    distance: z.string(),
    lane: z.number().int().optional(),
  }),
  z.object({ type: z.literal('withdraw-athlete'), athleteId: z.string() }),
  z.object({
    type: z.literal('set-volume'),
    /** null clears the setting. */
    volume: z.number().nullable(),
    device: z.string().optional(),
  }),
  z.object({ type: z.literal('compute-handicaps') }),
  z.object({ type: z.literal('assign-lanes'), distance: z.string(), policy: lanePolicySchema }),
  z.object({ type: z.literal('override-start'), athleteId: z.string(), seconds: z.number() }),
  z.object({ type: z.literal('shift-starts'), delta: z.number(), distance: z.string().optional() }),
  z.object({ type: z.literal('build-schedule'), idleDevices: z.enum(['schedule', 'omit']).optional() }),
  z.object({ type: z.literal('encode-command') }),
  z.object({ type: z.literal('dispatch') }),
  z.object({ type: z.literal('discover-devices') }),
  z.object({ type: z.literal('flash-devices') }),
  z.object({
    type: z.literal('record-results'),
    /** Seconds from the gun, or 'DLQ', per athlete ID. */
    finishes: z.record(z.string(), z.union([z.number(), z.literal('DLQ')])),
    /** Session-log timestamp; the current time when omitted. */
    timestamp: z.string().optional(),
  }),
]);

export type ClientMessage = z.infer<typeof clientMessageSchema>;
export type ClientMessageType = ClientMessage['type'];

// -- Server → Client --

export interface SessionState {
  context: RaceContext;
  /** The context's diagnostics as operator-facing text. */
  messages: string[];
  /** Last encoded command, null until one is encoded. */
  command: WireCommand | null;
  /** Devices that answered the last discovery poll. */
  discoveredDevices: DeviceId[];
  /** A link operation is in progress; edits are refused meanwhile. */
  busy: boolean;
}

export interface StateMessage {
  type: 'state';
  state: SessionState;
}

export interface RosterLoadedMessage {
  type: 'roster-loaded';
  athletes: number;
  warnings: string[];
}

export interface DevicesMessage {
  type: 'devices';
  action: 'discover' | 'flash';
  devices: DeviceId[];
}

export interface DispatchedMessage {
  type: 'dispatched';
  sent: boolean;
  acknowledged: boolean;
  trigger: TriggerResult | null;
  error?: string;
}

export interface ResultsMessage {
  type: 'results';
  rows: ResultRow[];
  /** Session-log lines for this race, with header. */
  sessionCsv: string;
  /** The roster after new bests were written back. */
  rosterCsv: string;
}

export interface ErrorMessage {
  type: 'error';
  message: string;
}

export type ServerMessage =
  | StateMessage
  | RosterLoadedMessage
  | DevicesMessage
  | DispatchedMessage
  | ResultsMessage
  | ErrorMessage;
