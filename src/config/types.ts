/**
 * Any value that survives a JSON round trip. Syncthing's REST config is made of these.
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

export interface JsonObject {
    [key: string]: JsonValue;
}

/**
 * A folder's device entry: either the symbolic name of a declared device,
 * or a structured reference passed to the API as-is.
 */
export type FolderDeviceRef = string | JsonObject;

/**
 * File versioning strategy for a folder.
 * - `simple`: keep a fixed number of old versions
 * - `trashcan`: move replaced files to a trash can, cleaned out after a number of days
 * - `staggered`: keep versions at decreasing density over time
 * - `external`: hand the file to an external command
 */
export type VersioningType = "external" | "simple" | "staggered" | "trashcan";

export interface FolderVersioning {
    type: VersioningType;
    /** Where versions are stored; empty means the folder's default location */
    fsPath: string;
    params: Record<string, string>;
}

/**
 * A remote device, keyed by a local symbolic name in the config file.
 */
export interface DeclaredDevice {
    /** Display name sent to the daemon (defaults to the symbolic name) */
    name: string;
    /** The device ID, stable across every peer */
    id: string;
    /** Addresses to dial, e.g. `tcp://192.168.0.10:51820`. Empty means dynamic discovery. */
    addresses: string[];
    /** Whether the device may introduce other devices and folders */
    introducer: boolean;
    /** Accept folders this device advertises at the default path */
    autoAcceptFolders: boolean;
    /** Any other REST API device fields, passed through unchanged */
    extra: JsonObject;
}

/**
 * A shared folder, keyed by a local symbolic name in the config file.
 */
export interface DeclaredFolder {
    /** Disabled folders are left out of the declared list entirely */
    enable: boolean;
    /** Folder ID; must match on every peer sharing the folder */
    id: string;
    label: string;
    /** Absolute path, or one starting with `~/` */
    path: string;
    devices: FolderDeviceRef[];
    versioning: FolderVersioning | null;
    /** Tuning fields (defaults applied) and any other REST API folder fields */
    options: JsonObject;
}

/**
 * The administrator's desired Syncthing settings.
 */
export interface DeclaredSettings {
    /** Every top-level key other than `devices` and `folders`, merged verbatim */
    global: JsonObject;
    devices: Map<string, DeclaredDevice>;
    folders: Map<string, DeclaredFolder>;
}

/**
 * Top-level syncthing-init configuration (maps to .syncthing-init.yml).
 */
export interface SyncthingInitConfig {
    /** Address of the daemon's GUI / REST API */
    guiAddress: string;
    /** Check the GUI's TLS certificate; off accepts the daemon's self-signed one */
    verifyTls: boolean;
    /** Where synchronised folders live */
    dataDir: string;
    /** Where the daemon keeps config.xml and its keys */
    configDir: string;
    /** Drop live devices that are not declared */
    overrideDevices: boolean;
    /** Drop live folders that are not declared */
    overrideFolders: boolean;
    /** Install system-wide units (true) or per-user units (false) */
    systemService: boolean;
    user: string;
    group: string;
    /** Path to a cert.pem copied into configDir before the daemon starts */
    cert: string | null;
    /** Path to a key.pem copied into configDir before the daemon starts */
    key: string | null;
    /** Value for the daemon's all_proxy environment variable */
    allProxy: string | null;
    /** Extra flags for the daemon command line */
    extraFlags: string[];
    /** Daemon executable */
    syncthingBinary: string;
    /** Attempts per control API call */
    apiRetries: number;
    /** Fixed delay between control API attempts (ms) */
    apiRetryDelayMs: number;
    /** Delay between reads of the API key (ms) */
    credentialPollIntervalMs: number;
    /** Give up waiting for the API key after this long (ms). Unset waits forever. */
    credentialTimeoutMs?: number;
    /** Directory for log files; null uses logs/ under the config home */
    logDir: string | null;
    /** Maximum size of a single log file in MB before rotation (default: 10) */
    maxLogSizeMB: number;
    /** Maximum number of rotated log files to keep (default: 5) */
    maxLogFiles: number;
    settings: DeclaredSettings;
}

/** Default configuration values */
export const CONFIG_DEFAULTS = {
    guiAddress: "127.0.0.1:8384",
    verifyTls: false,
    dataDir: "/var/lib/syncthing",
    configSubdir: ".config/syncthing",
    overrideDevices: true,
    overrideFolders: true,
    systemService: true,
    user: "syncthing",
    group: "syncthing",
    syncthingBinary: "syncthing",
    apiRetries: 1000,
    apiRetryDelayMs: 1000,
    credentialPollIntervalMs: 1000,
    maxLogSizeMB: 10,
    maxLogFiles: 5,
    configFileName: ".syncthing-init.yml",
    /** Config home used when running as root, readable by the service user */
    systemConfigHome: "/etc/syncthing-init",
} as const;
