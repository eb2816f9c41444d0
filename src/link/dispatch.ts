/**
 * Race dispatch: sends an encoded start command over the link, waits for
 * the transmitter's acknowledgement and fires the trigger notifier.
 */

import type { RaceContext, WireCommand } from '../types.js';
import { START_ACK_TOKEN } from '../types.js';
import type { Diagnostic } from '../diagnostics.js';
import type { StartLink, TriggerNotifier, TriggerResult } from './types.js';
import { checkCommandFresh, markDispatched } from '../race.js';
import { LinkError } from '../errors.js';
import { logEvent, logError } from '../utils/log.js';

export interface DispatchDeps {
  link: StartLink;
  /** Called once the transmitter acknowledges. Omit to skip the trigger. */
  notify?: TriggerNotifier;
  ackTimeoutMs: number;
}

export interface DispatchResult {
  context: RaceContext;
  /** The command was written to the link. */
  sent: boolean;
  /** The transmitter replied STARTTIMER. */
  acknowledged: boolean;
  /** Null when the trigger was not attempted. */
  trigger: TriggerResult | null;
  diagnostics: Diagnostic[];
  /** Link failure, when there was one. */
  error?: string;
}

/**
 * Dispatch `command` for `context`.
 *
 * A stale command is refused before anything is written. Link failures
 * are reported in the result. The context is marked dispatched as soon as
 * the command has been written, whether or not it is acknowledged.
 */
export async function dispatchRace(
  context: RaceContext,
  command: WireCommand,
  deps: DispatchDeps,
): Promise<DispatchResult> {
  const reason = checkCommandFresh(context, command);
  if (reason !== null) {
    const diagnostics: Diagnostic[] = [{ kind: 'stale-schedule-dispatch', reason }];
    logEvent('dispatch.refused', { reason });
    return { context: { ...context, diagnostics }, sent: false, acknowledged: false, trigger: null, diagnostics };
  }

  logEvent('dispatch.sending', { revision: command.revision, devices: command.entries.length });
  try {
    await deps.link.request(command.text, line => line === START_ACK_TOKEN, deps.ackTimeoutMs);
  } catch (err) {
    if (!(err instanceof LinkError)) throw err;
    logError('dispatch.link_failed', err, { failure: err.failure });
    const sent = err.failure === 'timeout';
    const next = sent ? markDispatched(context, command).context : context;
    return { context: next, sent, acknowledged: false, trigger: null, diagnostics: [], error: err.message };
  }

  const marked = markDispatched(context, command);
  logEvent('dispatch.acknowledged', { revision: command.revision });

  const trigger = deps.notify ? await deps.notify() : null;
  if (trigger && !trigger.delivered) {
    logEvent('dispatch.trigger_undelivered', { attempts: trigger.attempts, error: trigger.error });
  }

  return { context: marked.context, sent: true, acknowledged: true, trigger, diagnostics: marked.diagnostics };
}
