/**
 * Serial link to the transmitter.
 *
 * Thin adapter over a duplex byte stream: writes command lines and splits
 * the replies into lines. Uses the `serialport` package for the real port;
 * tests drive the same class with an in-memory stream.
 */

import { EventEmitter } from 'events';
import type { Duplex } from 'stream';
import { setTimeout as delay } from 'timers/promises';
import { SerialPort, ReadlineParser } from 'serialport';
import type { StartLink } from './types.js';
import { LinkError } from '../errors.js';
import { logEvent } from '../utils/log.js';

export interface SerialLinkOptions {
  /** Releases the underlying port. Defaults to destroying the stream. */
  close?: () => Promise<void>;
}

export class SerialLink implements StartLink {
  private readonly stream: Duplex;
  private readonly lines = new EventEmitter();
  private readonly closeStream: () => Promise<void>;
  private closed = false;

  constructor(stream: Duplex, options: SerialLinkOptions = {}) {
    this.stream = stream;
    this.closeStream = options.close ?? (async () => {
      stream.destroy();
    });

    const parser = stream.pipe(new ReadlineParser({ delimiter: '\n', encoding: 'utf8' }));
    parser.on('data', (chunk: Buffer | string) => {
      const line = chunk.toString().trim();
      if (line === '') return;
      logEvent('link.line', { line });
      this.lines.emit('line', line);
    });
    stream.on('close', () => {
      this.closed = true;
      this.lines.emit('closed');
    });
  }

  async request(text: string, match: (line: string) => boolean, timeoutMs: number): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        this.lines.off('line', onLine);
        this.lines.off('closed', onClosed);
      };
      const onLine = (line: string) => {
        if (!match(line)) return;
        cleanup();
        resolve(line);
      };
      const onClosed = () => {
        cleanup();
        reject(new LinkError('Link closed while waiting for a reply', 'closed'));
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(new LinkError(`No matching reply within ${timeoutMs}ms`, 'timeout'));
      }, timeoutMs);

      this.lines.on('line', onLine);
      this.lines.once('closed', onClosed);
      this.write(text).catch((err: unknown) => {
        cleanup();
        reject(err);
      });
    });
  }

  async query(text: string, windowMs: number): Promise<string[]> {
    const received: string[] = [];
    const onLine = (line: string) => {
      received.push(line);
    };
    this.lines.on('line', onLine);
    try {
      await this.write(text);
      await delay(windowMs);
      return received;
    } finally {
      this.lines.off('line', onLine);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.closeStream();
  }

  private write(text: string): Promise<void> {
    if (this.closed) {
      return Promise.reject(new LinkError('Link is closed', 'closed'));
    }
    return new Promise<void>((resolve, reject) => {
      this.stream.write(text, (err?: Error | null) => {
        if (err) {
          reject(new LinkError(`Write failed: ${err.message}`, 'write', { cause: err }));
          return;
        }
        logEvent('link.sent', { text: text.trimEnd() });
        resolve();
      });
    });
  }
}

// -- Real serial port --

export interface SerialPortOptions {
  /** Undefined = auto-detect. */
  path?: string;
  baudRate: number;
  /** Wait after opening; the transmitter resets when the port opens. */
  settleMs?: number;
}

interface PortCandidate {
  path: string;
  manufacturer?: string;
}

/**
 * Choose the port that looks like the transmitter: an Arduino by
 * manufacturer, or a USB serial adapter by device path.
 */
export function pickTransmitterPort(ports: PortCandidate[]): string | null {
  const match = ports.find(p =>
    (p.manufacturer ?? '').includes('Arduino') || p.path.includes('ttyUSB') || p.path.includes('ttyACM'),
  );
  return match ? match.path : null;
}

export async function openSerialLink(options: SerialPortOptions): Promise<SerialLink> {
  let path = options.path;
  if (path === undefined) {
    const detected = pickTransmitterPort(await SerialPort.list());
    if (detected === null) {
      throw new LinkError('Could not auto-detect the transmitter serial port. Is it connected?', 'open');
    }
    path = detected;
  }

  const port = new SerialPort({ path, baudRate: options.baudRate, autoOpen: false });
  await new Promise<void>((resolve, reject) => {
    port.open(err => {
      if (err) reject(new LinkError(`Cannot open ${path}: ${err.message}`, 'open', { cause: err }));
      else resolve();
    });
  });
  logEvent('link.opened', { path, baudRate: options.baudRate });
  await delay(options.settleMs ?? 2000);

  return new SerialLink(port, {
    close: () => new Promise<void>((resolve, reject) => {
      port.close(err => (err ? reject(err) : resolve()));
    }),
  });
}
