import type { DeviceId, Distance, LaneRef } from "../types.js";
import { RaceSetupError } from "../errors.js";
import type {
  DeviceBinding,
  LanedStartPoint,
  StartPoint,
  StartPointDefinition,
  Topology,
} from "./types.js";

const DEVICE_ID_PATTERN = /^\d{1,2}$/;

/**
 * Normalize a device address to its two-character form (`3` → `03`).
 * Throws for anything outside 00-99.
 */
export function normalizeDeviceId(raw: string | number): DeviceId {
  const text = String(raw).trim();
  if (!DEVICE_ID_PATTERN.test(text)) {
    throw new RaceSetupError(`Invalid device ID "${text}": expected 00-99`);
  }
  return text.padStart(2, "0");
}

export function isDeviceId(value: string): boolean {
  return /^\d{2}$/.test(value);
}

/**
 * Parse a device list such as `03, 05-08 12`. Ranges are inclusive and
 * may be written in either direction. Duplicates keep their first position.
 */
export function parseDeviceList(input: string): { devices: DeviceId[]; invalid: string[] } {
  const devices: DeviceId[] = [];
  const invalid: string[] = [];
  const seen = new Set<DeviceId>();

  const add = (device: DeviceId) => {
    if (!seen.has(device)) {
      seen.add(device);
      devices.push(device);
    }
  };

  for (const token of input.replace(/,/g, " ").split(/\s+/).filter(t => t !== "")) {
    const range = /^(\d{1,2})-(\d{1,2})$/.exec(token);
    if (range) {
      let start = parseInt(range[1], 10);
      let end = parseInt(range[2], 10);
      if (start > end) [start, end] = [end, start];
      for (let i = start; i <= end; i++) add(normalizeDeviceId(i));
    } else if (DEVICE_ID_PATTERN.test(token)) {
      add(normalizeDeviceId(token));
    } else {
      invalid.push(token);
    }
  }

  return { devices, invalid };
}

/** Display form of a lane reference. */
export function formatLaneRef(lane: LaneRef): string {
  return lane.kind === "lane" ? `Lane ${lane.index}` : "Scratch";
}

/**
 * Order distance labels numerically where they are numbers,
 * falling back to string order.
 */
export function compareDistances(a: Distance, b: Distance): number {
  const na = Number(a);
  const nb = Number(b);
  const aNumeric = a.trim() !== "" && Number.isFinite(na);
  const bNumeric = b.trim() !== "" && Number.isFinite(nb);
  if (aNumeric && bNumeric) return na - nb;
  if (aNumeric) return -1;
  if (bNumeric) return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

// -- Start points --

export function defineStartPoint(topology: Topology, definition: StartPointDefinition): Topology {
  const distance = definition.distance.trim();
  if (distance === "") {
    throw new RaceSetupError("Start point distance must not be blank");
  }
  if (distance in topology) {
    throw new RaceSetupError(`Start point ${distance} is already defined`);
  }

  const laneCount = definition.laneCount ?? 0;
  if (!Number.isInteger(laneCount) || laneCount < 0) {
    throw new RaceSetupError(`Lane count must be a whole number of lanes, got ${laneCount}`);
  }

  const startPoint: StartPoint = laneCount > 0
    ? { distance, hasLanes: true, laneCount, laneDevices: {} }
    : { distance, hasLanes: false, groupDevices: [] };

  return { ...topology, [distance]: startPoint };
}

export function removeStartPoint(topology: Topology, distance: Distance): Topology {
  getStartPoint(topology, distance);
  const next = { ...topology };
  delete next[distance];
  return next;
}

export function getStartPoint(topology: Topology, distance: Distance): StartPoint {
  const startPoint = topology[distance];
  if (!startPoint) {
    throw new RaceSetupError(`No start point defined for ${distance}`);
  }
  return startPoint;
}

export function getLanedStartPoint(topology: Topology, distance: Distance): LanedStartPoint {
  const startPoint = getStartPoint(topology, distance);
  if (!startPoint.hasLanes) {
    throw new RaceSetupError(`Start point ${distance} has no lanes`);
  }
  return startPoint;
}

// -- Device bindings --

/**
 * Bind a device to one lane. A device may only be bound once across the
 * whole topology; rebinding the lane replaces its previous device.
 */
export function bindLaneDevice(
  topology: Topology,
  distance: Distance,
  laneIndex: number,
  device: DeviceId,
): Topology {
  const startPoint = getLanedStartPoint(topology, distance);
  if (!Number.isInteger(laneIndex) || laneIndex < 1 || laneIndex > startPoint.laneCount) {
    throw new RaceSetupError(
      `Lane ${laneIndex} is outside 1-${startPoint.laneCount} for ${distance}`,
    );
  }
  const id = normalizeDeviceId(device);
  const existing = findDeviceBinding(topology, id);
  if (existing) {
    if (existing.distance === distance && existing.laneIndex === laneIndex) return topology;
    throw new RaceSetupError(`Device ${id} is already bound to ${describeBinding(existing)}`);
  }

  return {
    ...topology,
    [distance]: {
      ...startPoint,
      laneDevices: { ...startPoint.laneDevices, [laneIndex]: id },
    },
  };
}

/** Add a device to a scratch start point's group. */
export function bindGroupDevice(topology: Topology, distance: Distance, device: DeviceId): Topology {
  const startPoint = getStartPoint(topology, distance);
  if (startPoint.hasLanes) {
    throw new RaceSetupError(`Start point ${distance} has lanes; bind devices per lane`);
  }
  const id = normalizeDeviceId(device);
  const existing = findDeviceBinding(topology, id);
  if (existing) {
    if (existing.distance === distance) return topology;
    throw new RaceSetupError(`Device ${id} is already bound to ${describeBinding(existing)}`);
  }

  return {
    ...topology,
    [distance]: { ...startPoint, groupDevices: [...startPoint.groupDevices, id] },
  };
}

/** Remove a device from wherever it is bound. No-op when unbound. */
export function unbindDevice(topology: Topology, device: DeviceId): Topology {
  const id = normalizeDeviceId(device);
  const binding = findDeviceBinding(topology, id);
  if (!binding) return topology;

  const startPoint = getStartPoint(topology, binding.distance);
  if (startPoint.hasLanes) {
    const laneDevices = { ...startPoint.laneDevices };
    if (binding.laneIndex !== null) delete laneDevices[binding.laneIndex];
    return { ...topology, [binding.distance]: { ...startPoint, laneDevices } };
  }
  return {
    ...topology,
    [binding.distance]: {
      ...startPoint,
      groupDevices: startPoint.groupDevices.filter(d => d !== id),
    },
  };
}

/**
 * Clear device bindings of one start point, or of every start point
 * when no distance is given.
 */
export function clearDeviceBindings(topology: Topology, distance?: Distance): Topology {
  const targets = distance === undefined ? Object.keys(topology) : [getStartPoint(topology, distance).distance];
  const next = { ...topology };
  for (const key of targets) {
    const sp = next[key];
    next[key] = sp.hasLanes ? { ...sp, laneDevices: {} } : { ...sp, groupDevices: [] };
  }
  return next;
}

export function findDeviceBinding(topology: Topology, device: DeviceId): DeviceBinding | null {
  for (const startPoint of Object.values(topology)) {
    if (startPoint.hasLanes) {
      for (const [lane, bound] of Object.entries(startPoint.laneDevices)) {
        if (bound === device) {
          return { distance: startPoint.distance, device, laneIndex: Number(lane) };
        }
      }
    } else if (startPoint.groupDevices.includes(device)) {
      return { distance: startPoint.distance, device, laneIndex: null };
    }
  }
  return null;
}

/** Every device bound anywhere in the topology, ascending. */
export function listBindings(topology: Topology): DeviceBinding[] {
  const bindings: DeviceBinding[] = [];
  for (const startPoint of Object.values(topology)) {
    if (startPoint.hasLanes) {
      for (const [lane, device] of Object.entries(startPoint.laneDevices)) {
        bindings.push({ distance: startPoint.distance, device, laneIndex: Number(lane) });
      }
    } else {
      for (const device of startPoint.groupDevices) {
        bindings.push({ distance: startPoint.distance, device, laneIndex: null });
      }
    }
  }
  return bindings.sort((a, b) => (a.device < b.device ? -1 : a.device > b.device ? 1 : 0));
}

/**
 * Device that fires for an entry: the lane's device, or the first device
 * of a scratch group. Null when nothing is bound.
 */
export function resolveDevice(startPoint: StartPoint, lane: LaneRef | null): DeviceId | null {
  if (!startPoint.hasLanes) {
    return startPoint.groupDevices[0] ?? null;
  }
  if (lane === null || lane.kind !== "lane") return null;
  return startPoint.laneDevices[lane.index] ?? null;
}

function describeBinding(binding: DeviceBinding): string {
  return binding.laneIndex === null
    ? `the ${binding.distance} scratch group`
    : `${binding.distance} lane ${binding.laneIndex}`;
}
