export {
  changeRequestSchema,
  switchportModeSchema,
  toValidationIssues,
  validateChangeRequest,
  vlanIdSchema,
  MAX_DESCRIPTION_LENGTH,
  MAX_VLAN_ID,
  MAX_VNI,
  MIN_VLAN_ID,
} from "./schema.js";
export type { ChangeRequestInput } from "./schema.js";
export { NxosConfigRenderer, createNxosRenderer, renderInterfaceLines } from "./nxos-renderer.js";
export type { NxosRendererOptions } from "./nxos-renderer.js";
export { collectTrunkVlans, formatVlanList, parseVlanList } from "./vlan-list.js";
