export * from "./provision/asset-acquisition.js";
export * from "./provision/asset-manifest.js";
export * from "./provision/carried-state.js";
export * from "./provision/choice-prompt.js";
export * from "./provision/config.js";
export * from "./provision/environment.js";
export * from "./provision/errors.js";
export * from "./provision/host-probe.js";
export * from "./provision/menus.js";
export * from "./provision/package-installer.js";
export * from "./provision/package-plan.js";
export * from "./provision/summary.js";
export * from "./provision/supplied-assets.js";
export * from "./provision/verifier.js";
export type * from "./provision/types.js";
export {
  runProvisioner,
  type ProvisionResult,
  type ProvisionStatus,
  type ProvisionerOptions,
} from "./provision/orchestrator.js";
