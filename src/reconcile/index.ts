export { Reconciler } from "./reconciler.js";
export type { ReconcilerDeps, ReconcileResult } from "./reconciler.js";
export {
    mergeConfig,
    deepMerge,
    mergeObjects,
    toApiDevice,
    toApiFolder,
    declaredDeviceList,
    declaredFolderList,
} from "./merge.js";
export type { MergePolicy } from "./merge.js";
