export {
  normalizeDeviceId,
  isDeviceId,
  parseDeviceList,
  formatLaneRef,
  compareDistances,
  defineStartPoint,
  removeStartPoint,
  getStartPoint,
  getLanedStartPoint,
  bindLaneDevice,
  bindGroupDevice,
  unbindDevice,
  clearDeviceBindings,
  findDeviceBinding,
  listBindings,
  resolveDevice,
} from "./topology.js";
export type {
  DeviceBinding,
  LanedStartPoint,
  ScratchStartPoint,
  StartPoint,
  StartPointDefinition,
  Topology,
} from "./types.js";
