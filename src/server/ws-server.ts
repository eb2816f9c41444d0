/**
 * WebSocket control server for one race session.
 *
 * Thin adapter layer: maps operator messages onto the race lifecycle
 * functions and broadcasts the resulting session state to every connected
 * console. Uses the `ws` library for WebSocket support.
 */

import { WebSocketServer, WebSocket } from 'ws';
import type { RawData } from 'ws';
import type { RaceContext } from '../types.js';
import type { StartLink, TriggerNotifier } from '../link/types.js';
import type {
  ClientMessage,
  DispatchedMessage,
  ServerMessage,
  SessionState,
} from './types.js';
import { clientMessageSchema } from './types.js';
import { describeDiagnostic } from '../diagnostics.js';
import { formatRosterCsv, parseRosterCsv } from '../roster.js';
import { formatSessionCsv, recordResults } from '../results.js';
import {
  addStartPoint,
  applyLanePolicy,
  assignGroupDevice,
  assignLaneDevice,
  buildSchedule,
  computeHandicaps,
  createRaceContext,
  dropStartPoint,
  encodeCommand,
  enterAthlete,
  overrideStartOffset,
  putAthlete,
  releaseDevice,
  resetDeviceBindings,
  setRoster,
  setVolume,
  shiftStartOffsets,
  withdrawAthlete,
} from '../race.js';
import { dispatchRace } from '../link/dispatch.js';
import { discoverDevices, flashDevices, DEVICE_REPLY_WINDOW_MS } from '../link/devices.js';
import { logEvent, logError } from '../utils/log.js';

// -- Server State --

interface Session {
  context: RaceContext;
  command: SessionState['command'];
  discoveredDevices: SessionState['discoveredDevices'];
  busy: boolean;
}

interface ServerState {
  session: Session;
  connections: Set<WebSocket>;
}

export interface ControlServerConfig {
  port: number;
  /** Transmitter link. Without one, dispatch and device commands are refused. */
  link?: StartLink;
  /** Fired after the transmitter acknowledges a start command. */
  notify?: TriggerNotifier;
  /** How long to wait for STARTTIMER. Default 120000. */
  ackTimeoutMs?: number;
  /** How long to collect replies to DISCOVER and FLASH. */
  deviceReplyWindowMs?: number;
  /** Session to resume; a fresh one is created when omitted. */
  context?: RaceContext;
}

export interface ControlServer {
  /** The underlying WebSocket server. */
  wss: WebSocketServer;
  /** Disconnect every console and stop listening. */
  close(): void;
  /** Get server state for testing/monitoring. */
  getState(): Readonly<ServerState>;
}

/**
 * Create and start the race control WebSocket server.
 */
export function createControlServer(config: ControlServerConfig): ControlServer {
  const state: ServerState = {
    session: {
      context: config.context ?? createRaceContext(),
      command: null,
      discoveredDevices: [],
      busy: false,
    },
    connections: new Set(),
  };

  const wss = new WebSocketServer({ port: config.port });
  wss.on('error', (err: Error) => {
    logError('control.server_error', err, { port: config.port });
  });

  wss.on('connection', (ws: WebSocket) => {
    state.connections.add(ws);
    logEvent('control.connected', { consoles: state.connections.size });
    sendJson(ws, stateMessage(state));

    ws.on('message', (data: RawData) => {
      handleRawMessage(state, ws, data.toString(), config).catch((err: unknown) => {
        logError('control.message_failed', err);
        sendJson(ws, { type: 'error', message: errorMessage(err) });
      });
    });

    ws.on('close', () => {
      state.connections.delete(ws);
      logEvent('control.disconnected', { consoles: state.connections.size });
    });

    ws.on('error', (err: Error) => {
      logError('control.socket_error', err);
      state.connections.delete(ws);
    });
  });

  return {
    wss,
    close() {
      for (const ws of state.connections) {
        ws.terminate();
      }
      state.connections.clear();
      wss.close();
    },
    getState() {
      return state;
    },
  };
}

// -- Message Handling --

async function handleRawMessage(
  state: ServerState,
  ws: WebSocket,
  raw: string,
  config: ControlServerConfig,
): Promise<void> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    sendJson(ws, { type: 'error', message: 'Invalid message: not JSON' });
    return;
  }

  const result = clientMessageSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` (${issue.path.join('.')})` : '';
    sendJson(ws, { type: 'error', message: `Invalid message: ${issue?.message ?? 'unknown error'}${where}` });
    return;
  }

  await handleMessage(state, ws, result.data, config);
}

async function handleMessage(
  state: ServerState,
  ws: WebSocket,
  message: ClientMessage,
  config: ControlServerConfig,
): Promise<void> {
  if (message.type === 'get-state') {
    sendJson(ws, stateMessage(state));
    return;
  }
  if (state.session.busy) {
    sendJson(ws, { type: 'error', message: 'A link operation is in progress' });
    return;
  }

  switch (message.type) {
    case 'load-roster': {
      const { roster, warnings } = parseRosterCsv(message.csv);
      state.session.context = setRoster(state.session.context, roster);
      sendJson(ws, { type: 'roster-loaded', athletes: Object.keys(roster).length, warnings });
      break;
    }

    case 'encode-command': {
      const encoded = encodeCommand(state.session.context);
      state.session.context = encoded.context;
      if (encoded.command) state.session.command = encoded.command;
      break;
    }

    case 'dispatch':
      await handleDispatch(state, ws, config);
      break;

    case 'discover-devices':
    case 'flash-devices':
      await handleDeviceCommand(state, ws, message.type, config);
      break;

    case 'record-results': {
      const { context, rows } = recordResults(state.session.context, message.finishes);
      state.session.context = context;
      sendJson(ws, {
        type: 'results',
        rows,
        sessionCsv: formatSessionCsv(rows, message.timestamp ?? new Date().toISOString()),
        rosterCsv: formatRosterCsv(context.roster),
      });
      break;
    }

    default:
      state.session.context = applyEdit(state.session.context, message);
      break;
  }

  broadcast(state, stateMessage(state));
}

type EditMessage = Exclude<
  ClientMessage,
  {
    type:
      | 'get-state'
      | 'load-roster'
      | 'encode-command'
      | 'dispatch'
      | 'discover-devices'
      | 'flash-devices'
      | 'record-results';
  }
>;

function applyEdit(context: RaceContext, message: EditMessage): RaceContext {
  switch (message.type) {
    case 'put-athlete':
      return putAthlete(context, message.athlete);
    case 'add-start-point':
      return addStartPoint(context, { distance: message.distance, laneCount: message.laneCount });
    case 'remove-start-point':
      return dropStartPoint(context, message.distance);
    case 'bind-lane-device':
      return assignLaneDevice(context, message.distance, message.lane, message.device);
    case 'bind-group-device':
      return assignGroupDevice(context, message.distance, message.device);
    case 'release-device':
      return releaseDevice(context, message.device);
    case 'clear-device-bindings':
      return resetDeviceBindings(context, message.distance);
    case 'enter-athlete':
      return enterAthlete(context, message.athleteId, message.distance, message.lane);
    case 'withdraw-athlete':
      return withdrawAthlete(context, message.athleteId);
    case 'set-volume':
      return setVolume(context, message.volume ?? undefined, message.device);
    case 'compute-handicaps':
      return computeHandicaps(context);
    case 'assign-lanes':
      return applyLanePolicy(context, message.distance, message.policy);
    case 'override-start':
      return overrideStartOffset(context, message.athleteId, message.seconds);
    case 'shift-starts':
      return shiftStartOffsets(context, message.delta, message.distance);
    case 'build-schedule':
      return buildSchedule(context, message.idleDevices ? { idleDevices: message.idleDevices } : {});
  }
}

async function handleDispatch(state: ServerState, ws: WebSocket, config: ControlServerConfig): Promise<void> {
  if (!config.link) {
    sendJson(ws, { type: 'error', message: 'No transmitter link is configured' });
    return;
  }
  const command = state.session.command;
  if (!command) {
    sendJson(ws, { type: 'error', message: 'No start command has been encoded' });
    return;
  }

  state.session.busy = true;
  broadcast(state, stateMessage(state));
  try {
    const result = await dispatchRace(state.session.context, command, {
      link: config.link,
      notify: config.notify,
      ackTimeoutMs: config.ackTimeoutMs ?? 120_000,
    });
    state.session.context = result.context;
    const reply: DispatchedMessage = {
      type: 'dispatched',
      sent: result.sent,
      acknowledged: result.acknowledged,
      trigger: result.trigger,
    };
    if (result.error !== undefined) reply.error = result.error;
    broadcast(state, reply);
  } finally {
    state.session.busy = false;
  }
}

async function handleDeviceCommand(
  state: ServerState,
  ws: WebSocket,
  type: 'discover-devices' | 'flash-devices',
  config: ControlServerConfig,
): Promise<void> {
  if (!config.link) {
    sendJson(ws, { type: 'error', message: 'No transmitter link is configured' });
    return;
  }
  const windowMs = config.deviceReplyWindowMs ?? DEVICE_REPLY_WINDOW_MS;

  state.session.busy = true;
  try {
    if (type === 'discover-devices') {
      const devices = await discoverDevices(config.link, windowMs);
      state.session.discoveredDevices = devices;
      sendJson(ws, { type: 'devices', action: 'discover', devices });
    } else {
      const devices = await flashDevices(config.link, windowMs);
      sendJson(ws, { type: 'devices', action: 'flash', devices });
    }
  } finally {
    state.session.busy = false;
  }
}

// -- Helpers --

function stateMessage(state: ServerState): ServerMessage {
  const { context, command, discoveredDevices, busy } = state.session;
  return {
    type: 'state',
    state: {
      context,
      messages: context.diagnostics.map(describeDiagnostic),
      command,
      discoveredDevices,
      busy,
    },
  };
}

function broadcast(state: ServerState, message: ServerMessage): void {
  for (const ws of state.connections) {
    sendJson(ws, message);
  }
}

function sendJson(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Invalid message';
}
