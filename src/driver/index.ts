/**
 * Driver module.
 * Starts, probes and stops the external driver process. Port negotiation
 * and profile construction live here; wire traffic does not.
 */

export { DriverSupervisor, createDriver, basePortFor, standaloneArgs, resolveExtensionPrefs } from './supervisor.js';
export type { DriverState, DriverOptions, LaunchPlan } from './supervisor.js';
export { allocatePort, acquirePortLock, findFreePort, tryListen, closeServer } from './ports.js';
export type { PortLease, AllocateOptions } from './ports.js';
export { probePort, canConnect } from './probe.js';
export type { ProbeOptions } from './probe.js';
export { launchProcess } from './process.js';
export type { LaunchSpec, LaunchedProcess } from './process.js';
export {
  createTempProfile,
  renderPrefs,
  parsePrefs,
  extensionIdFromRdf,
  extensionIdFromManifest,
  resolveEntryPath,
} from './profile.js';
