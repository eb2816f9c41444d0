export type { EncodeResult } from './command.js';
export {
  EMPTY_VOLUMES,
  DISCOVER_COMMAND,
  FLASH_COMMAND,
  clampVolume,
  encodeStartCommand,
  formatStartCommand,
  decodeStartCommand,
  formatVolumeCommand,
} from './command.js';

export type { ControllerReply } from './replies.js';
export {
  parseControllerLine,
  collectDiscoveredDevices,
  collectFlashedDevices,
} from './replies.js';

export type { StartPacket } from './packet.js';
export {
  START_PACKET_TYPE,
  READY_ACK_TYPE,
  START_PACKET_SIZE,
  READY_ACK_SIZE,
  encodeStartPacket,
  decodeStartPacket,
  startPacketFromSignalTimes,
  encodeReadyAck,
  decodeReadyAck,
} from './packet.js';
