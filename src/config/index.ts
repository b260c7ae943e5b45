export { loadConfig, writeDefaultConfig, validateConfig, getConfigHome } from "./loader.js";
export { validateSettings, validateDevice, validateFolder } from "./settings.js";
export type {
    SyncthingInitConfig,
    DeclaredSettings,
    DeclaredDevice,
    DeclaredFolder,
    FolderDeviceRef,
    FolderVersioning,
    VersioningType,
    JsonObject,
    JsonValue,
} from "./types.js";
export { CONFIG_DEFAULTS } from "./types.js";
