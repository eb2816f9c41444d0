/**
 * Error classes for mistakes the caller must fix before retrying.
 */

import type { RaceStage } from './types.js';

/** Invalid roster, topology or entry arguments. */
export class RaceSetupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RaceSetupError';
  }
}

/** An operation was called before the stage it depends on. */
export class RaceStageError extends Error {
  readonly stage: RaceStage;

  constructor(message: string, stage: RaceStage) {
    super(message);
    this.name = 'RaceStageError';
    this.stage = stage;
  }
}

/** Malformed wire text or packet bytes. */
export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

export type LinkFailure = 'open' | 'write' | 'timeout' | 'closed';

/** The serial link could not be used. */
export class LinkError extends Error {
  readonly failure: LinkFailure;

  constructor(message: string, failure: LinkFailure, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LinkError';
    this.failure = failure;
  }
}
