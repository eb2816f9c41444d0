import type { DeviceId, Distance } from "../types.js";

/**
 * A start point whose athletes each get a lane, one device per lane.
 */
export interface LanedStartPoint {
  distance: Distance;
  hasLanes: true;
  /** Number of lanes, numbered 1..laneCount */
  laneCount: number;
  /** Lane index → bound device. Never holds a lane outside 1..laneCount */
  laneDevices: Record<number, DeviceId>;
}

/**
 * A scratch start: all athletes start together and every bound
 * device fires identically.
 */
export interface ScratchStartPoint {
  distance: Distance;
  hasLanes: false;
  groupDevices: DeviceId[];
}

export type StartPoint = LanedStartPoint | ScratchStartPoint;

/** All start points of a track, keyed by distance. */
export type Topology = Record<Distance, StartPoint>;

export interface StartPointDefinition {
  distance: Distance;
  /** Omit (or 0) for a scratch start. */
  laneCount?: number;
}

/** Where a device is bound within a topology. */
export interface DeviceBinding {
  distance: Distance;
  device: DeviceId;
  /** Lane index for laned start points, null for a scratch group. */
  laneIndex: number | null;
}
