export {
  reconcile,
  emptyState,
  identityModeOf,
  identityKeys,
  snapshotDigest,
  DIGEST_KEY_PREFIX,
} from "./engine.js";
export type { Transition, ReconcileResult } from "./engine.js";
