/**
 * Runtime configuration from environment variables.
 *
 *   CONTROL_PORT          WebSocket control server port (3000)
 *   SERIAL_PATH           transmitter serial port; auto-detected when unset
 *   SERIAL_BAUD_RATE      115200
 *   ACK_TIMEOUT_MS        how long to wait for STARTTIMER (120000)
 *   TRIGGER_HOST          timing-capture listener host (127.0.0.1)
 *   TRIGGER_PORT          6000
 *   TRIGGER_PROTOCOL      udp | tcp (udp)
 *   TRIGGER_PAYLOAD       bytes sent when the countdown starts ("s")
 *   SIGNAL_RED_SECONDS    red → orange (5)
 *   SIGNAL_GREEN_SECONDS  red → green (9)
 *   SIGNAL_OFF_SECONDS    red → off (11)
 *   DEFAULT_VOLUME        0-30, unset = controller default
 */

import { z } from 'zod';
import type { SignalTiming } from './types.js';
import { DEFAULT_SIGNAL_TIMING } from './types.js';
import { validateSignalTiming } from './schedule.js';

const port = z.coerce.number().int().min(0).max(65535);
const positiveSeconds = z.coerce.number().positive();

const envSchema = z.object({
  CONTROL_PORT: port.default(3000),
  SERIAL_PATH: z.string().min(1).optional(),
  SERIAL_BAUD_RATE: z.coerce.number().int().positive().default(115200),
  ACK_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  TRIGGER_HOST: z.string().min(1).default('127.0.0.1'),
  TRIGGER_PORT: port.default(6000),
  TRIGGER_PROTOCOL: z.enum(['udp', 'tcp']).default('udp'),
  TRIGGER_PAYLOAD: z.string().min(1).default('s'),
  SIGNAL_RED_SECONDS: positiveSeconds.default(DEFAULT_SIGNAL_TIMING.redSeconds),
  SIGNAL_GREEN_SECONDS: positiveSeconds.default(DEFAULT_SIGNAL_TIMING.greenSeconds),
  SIGNAL_OFF_SECONDS: positiveSeconds.default(DEFAULT_SIGNAL_TIMING.offSeconds),
  DEFAULT_VOLUME: z.coerce.number().int().min(0).max(30).optional(),
});

export interface AppConfig {
  controlPort: number;
  serial: {
    /** Undefined = pick the first port that looks like the transmitter. */
    path?: string;
    baudRate: number;
    ackTimeoutMs: number;
  };
  trigger: {
    host: string;
    port: number;
    protocol: 'udp' | 'tcp';
    payload: string;
  };
  timing: SignalTiming;
  defaultVolume?: number;
}

/**
 * Read and validate configuration. Blank variables count as unset.
 * Throws with every problem listed when a value is invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') present[key] = value.trim();
  }

  const result = envSchema.safeParse(present);
  if (!result.success) {
    const problems = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }
  const e = result.data;

  const timing: SignalTiming = {
    redSeconds: e.SIGNAL_RED_SECONDS,
    greenSeconds: e.SIGNAL_GREEN_SECONDS,
    offSeconds: e.SIGNAL_OFF_SECONDS,
  };
  validateSignalTiming(timing);

  const config: AppConfig = {
    controlPort: e.CONTROL_PORT,
    serial: {
      baudRate: e.SERIAL_BAUD_RATE,
      ackTimeoutMs: e.ACK_TIMEOUT_MS,
    },
    trigger: {
      host: e.TRIGGER_HOST,
      port: e.TRIGGER_PORT,
      protocol: e.TRIGGER_PROTOCOL,
      payload: e.TRIGGER_PAYLOAD,
    },
    timing,
  };
  if (e.SERIAL_PATH !== undefined) config.serial.path = e.SERIAL_PATH;
  if (e.DEFAULT_VOLUME !== undefined) config.defaultVolume = e.DEFAULT_VOLUME;
  return config;
}
