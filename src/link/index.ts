export type {
  StartLink,
  TriggerNotifier,
  TriggerProtocol,
  TriggerResult,
  TriggerTarget,
} from './types.js';
export type { SerialLinkOptions, SerialPortOptions } from './serial-link.js';
export { SerialLink, openSerialLink, pickTransmitterPort } from './serial-link.js';
export type { TriggerOptions } from './trigger.js';
export { sendTrigger, createTriggerNotifier, DEFAULT_TRIGGER_OPTIONS } from './trigger.js';
export type { DispatchDeps, DispatchResult } from './dispatch.js';
export { dispatchRace } from './dispatch.js';
export { discoverDevices, flashDevices, sendVolume, DEVICE_REPLY_WINDOW_MS } from './devices.js';
