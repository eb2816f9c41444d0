/**
 * Trigger notifier: tells the timing-capture process that a countdown has
 * started so it can align finish times with the gun.
 *
 * Delivery is retried a bounded number of times. Running out of attempts
 * is reported in the result, not thrown, since the devices have already
 * accepted the schedule by the time this runs.
 */

import dgram from 'dgram';
import net from 'net';
import { setTimeout as delay } from 'timers/promises';
import type { TriggerNotifier, TriggerResult, TriggerTarget } from './types.js';
import { logEvent, logError } from '../utils/log.js';

export interface TriggerOptions {
  attempts?: number;
  /** Pause between attempts. */
  backoffMs?: number;
  /** TCP connect-and-write timeout per attempt. */
  timeoutMs?: number;
}

export const DEFAULT_TRIGGER_OPTIONS: Required<TriggerOptions> = {
  attempts: 5,
  backoffMs: 50,
  timeoutMs: 200,
};

export async function sendTrigger(target: TriggerTarget, options: TriggerOptions = {}): Promise<TriggerResult> {
  const { attempts, backoffMs, timeoutMs } = { ...DEFAULT_TRIGGER_OPTIONS, ...options };
  let lastError = 'no attempt made';

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      if (target.protocol === 'udp') {
        await sendDatagram(target);
      } else {
        await sendStream(target, timeoutMs);
      }
      logEvent('trigger.delivered', { host: target.host, port: target.port, protocol: target.protocol, attempt });
      return { delivered: true, attempts: attempt };
    } catch (err) {
      lastError = err instanceof Error ? err.message : String(err);
      logError('trigger.attempt_failed', err, { attempt, attempts });
      if (attempt < attempts) await delay(backoffMs);
    }
  }

  return { delivered: false, attempts, error: lastError };
}

/** Bind a target so the dispatcher can call it without arguments. */
export function createTriggerNotifier(target: TriggerTarget, options: TriggerOptions = {}): TriggerNotifier {
  return () => sendTrigger(target, options);
}

function sendDatagram(target: TriggerTarget): Promise<void> {
  const socket = dgram.createSocket(net.isIPv6(target.host) ? 'udp6' : 'udp4');
  return new Promise<void>((resolve, reject) => {
    let settled = false;
    const finish = (err?: Error | null) => {
      if (settled) return;
      settled = true;
      socket.close();
      if (err) reject(err);
      else resolve();
    };
    socket.once('error', finish);
    socket.send(Buffer.from(target.payload, 'utf8'), target.port, target.host, finish);
  });
}

function sendStream(target: TriggerTarget, timeoutMs: number): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const socket = net.createConnection({ host: target.host, port: target.port });
    socket.setTimeout(timeoutMs);
    socket.once('timeout', () => {
      socket.destroy(new Error(`Trigger connection timed out after ${timeoutMs}ms`));
    });
    socket.once('error', reject);
    socket.once('connect', () => {
      socket.end(target.payload, 'utf8');
    });
    socket.once('close', hadError => {
      if (!hadError) resolve();
    });
  });
}
