/**
 * Race control server: a WebSocket front end over one race session,
 * wired to the transmitter link and the trigger notifier.
 */

export type { ControlServerConfig, ControlServer } from './ws-server.js';
export { createControlServer } from './ws-server.js';

export type {
  ClientMessage,
  ClientMessageType,
  ServerMessage,
  SessionState,
  StateMessage,
  RosterLoadedMessage,
  DevicesMessage,
  DispatchedMessage,
  ResultsMessage,
  ErrorMessage,
} from './types.js';
export { clientMessageSchema } from './types.js';
