/**
 * Contracts of the collaborators the race core hands its output to.
 */

/**
 * Line-oriented link to the transmitter that relays commands to the
 * starter devices.
 */
export interface StartLink {
  /**
   * Write `text` and resolve with the first later line accepted by `match`.
   * Rejects with a LinkError when the write fails or no line matches
   * within `timeoutMs`.
   */
  request(text: string, match: (line: string) => boolean, timeoutMs: number): Promise<string>;
  /** Write `text` and resolve with every line received in the next `windowMs`. */
  query(text: string, windowMs: number): Promise<string[]>;
  close(): Promise<void>;
}

export type TriggerProtocol = 'udp' | 'tcp';

export interface TriggerTarget {
  host: string;
  port: number;
  protocol: TriggerProtocol;
  payload: string;
}

export interface TriggerResult {
  delivered: boolean;
  attempts: number;
  /** Message of the last failed attempt. */
  error?: string;
}

/** Sends the "countdown started" signal to the timing-capture process. */
export type TriggerNotifier = () => Promise<TriggerResult>;
