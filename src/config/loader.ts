import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import * as yaml from "yaml";
import type { SyncthingInitConfig } from "./types.js";
import { CONFIG_DEFAULTS } from "./types.js";
import { validateSettings } from "./settings.js";
import { isJsonObject } from "./fields.js";

/**
 * Returns the syncthing-init config home directory: ~/.syncthing-init,
 * or /etc/syncthing-init for root so that system units running as the
 * service user can read it. This is where the default config file and logs are stored.
 */
export function getConfigHome(uid: number | undefined = process.getuid?.()): string {
    if (uid === 0) {
        return CONFIG_DEFAULTS.systemConfigHome;
    }
    return path.join(os.homedir(), ".syncthing-init");
}

function stringOr(raw: Record<string, unknown>, key: string, fallback: string): string {
    const value = raw[key];
    if (value === undefined) return fallback;
    if (typeof value !== "string" || value.trim() === "") {
        throw new Error(`${key} must be a non-empty string`);
    }
    return value.trim();
}

function nullableString(raw: Record<string, unknown>, key: string): string | null {
    const value = raw[key];
    if (value === undefined || value === null) return null;
    if (typeof value !== "string" || value.trim() === "") {
        throw new Error(`${key} must be a non-empty string or null`);
    }
    return value.trim();
}

function booleanOr(raw: Record<string, unknown>, key: string, fallback: boolean): boolean {
    const value = raw[key];
    if (value === undefined) return fallback;
    if (typeof value !== "boolean") {
        throw new Error(`${key} must be a boolean`);
    }
    return value;
}

function absolutePath(raw: Record<string, unknown>, key: string, fallback: string): string {
    const value = stringOr(raw, key, fallback);
    if (!path.posix.isAbsolute(value)) {
        throw new Error(`${key} must be an absolute path`);
    }
    return value;
}

/**
 * Validate a loaded configuration object. Throws on invalid config.
 */
export function validateConfig(config: unknown): SyncthingInitConfig {
    if (!isJsonObject(config)) {
        throw new Error("Configuration must be a YAML object");
    }

    const raw: Record<string, unknown> = config;

    const guiAddress = stringOr(raw, "guiAddress", CONFIG_DEFAULTS.guiAddress);
    const logDir = raw.logDir === undefined || raw.logDir === null
        ? null
        : absolutePath(raw, "logDir", "");
    const dataDir = absolutePath(raw, "dataDir", CONFIG_DEFAULTS.dataDir);
    const configDir = absolutePath(
        raw,
        "configDir",
        path.posix.join(dataDir, CONFIG_DEFAULTS.configSubdir),
    );

    const apiRetries =
        typeof raw.apiRetries === "number" ? raw.apiRetries : CONFIG_DEFAULTS.apiRetries;
    if (apiRetries <= 0 || !Number.isInteger(apiRetries)) {
        throw new Error("apiRetries must be a positive integer");
    }

    const apiRetryDelayMs =
        typeof raw.apiRetryDelayMs === "number" ? raw.apiRetryDelayMs : CONFIG_DEFAULTS.apiRetryDelayMs;
    if (apiRetryDelayMs < 0) {
        throw new Error("apiRetryDelayMs must not be negative");
    }

    const credentialPollIntervalMs =
        typeof raw.credentialPollIntervalMs === "number"
            ? raw.credentialPollIntervalMs
            : CONFIG_DEFAULTS.credentialPollIntervalMs;
    if (credentialPollIntervalMs <= 0) {
        throw new Error("credentialPollIntervalMs must be a positive number");
    }

    let credentialTimeoutMs: number | undefined;
    if (raw.credentialTimeoutMs !== undefined && raw.credentialTimeoutMs !== null) {
        if (typeof raw.credentialTimeoutMs !== "number" || raw.credentialTimeoutMs <= 0) {
            throw new Error("credentialTimeoutMs must be a positive number");
        }
        credentialTimeoutMs = raw.credentialTimeoutMs;
    }

    const maxLogSizeMB =
        typeof raw.maxLogSizeMB === "number" ? raw.maxLogSizeMB : CONFIG_DEFAULTS.maxLogSizeMB;
    if (maxLogSizeMB <= 0) {
        throw new Error("maxLogSizeMB must be a positive number");
    }

    const maxLogFiles =
        typeof raw.maxLogFiles === "number" ? raw.maxLogFiles : CONFIG_DEFAULTS.maxLogFiles;
    if (maxLogFiles <= 0 || !Number.isInteger(maxLogFiles)) {
        throw new Error("maxLogFiles must be a positive integer");
    }

    let extraFlags: string[] = [];
    if (raw.extraFlags !== undefined && raw.extraFlags !== null) {
        if (!Array.isArray(raw.extraFlags)) {
            throw new Error("extraFlags must be an array");
        }
        extraFlags = raw.extraFlags.map((flag: unknown, index: number) => {
            if (typeof flag !== "string" || flag === "") {
                throw new Error(`extraFlags[${index}] must be a non-empty string`);
            }
            return flag;
        });
    }

    const result: SyncthingInitConfig = {
        guiAddress,
        verifyTls: booleanOr(raw, "verifyTls", CONFIG_DEFAULTS.verifyTls),
        dataDir,
        configDir,
        overrideDevices: booleanOr(raw, "overrideDevices", CONFIG_DEFAULTS.overrideDevices),
        overrideFolders: booleanOr(raw, "overrideFolders", CONFIG_DEFAULTS.overrideFolders),
        systemService: booleanOr(raw, "systemService", CONFIG_DEFAULTS.systemService),
        user: stringOr(raw, "user", CONFIG_DEFAULTS.user),
        group: stringOr(raw, "group", CONFIG_DEFAULTS.group),
        cert: nullableString(raw, "cert"),
        key: nullableString(raw, "key"),
        allProxy: nullableString(raw, "allProxy"),
        extraFlags,
        syncthingBinary: stringOr(raw, "syncthingBinary", CONFIG_DEFAULTS.syncthingBinary),
        apiRetries,
        apiRetryDelayMs,
        credentialPollIntervalMs,
        logDir,
        maxLogSizeMB,
        maxLogFiles,
        settings: validateSettings(raw.settings, dataDir),
    };
    if (credentialTimeoutMs !== undefined) {
        result.credentialTimeoutMs = credentialTimeoutMs;
    }
    return result;
}

/**
 * Load and validate a syncthing-init config from a YAML file.
 * @param configDir Directory containing the config file (defaults to ~/.syncthing-init)
 */
export function loadConfig(configDir?: string): SyncthingInitConfig {
    const dir = configDir ?? getConfigHome();
    const configPath = path.join(dir, CONFIG_DEFAULTS.configFileName);

    if (!fs.existsSync(configPath)) {
        throw new Error(`Config file not found: ${configPath}`);
    }

    const raw = fs.readFileSync(configPath, "utf-8");
    const parsed: unknown = yaml.parse(raw);
    return validateConfig(parsed);
}

/**
 * Write a default .syncthing-init.yml configuration file.
 * @param configDir Directory to write the config file to (defaults to ~/.syncthing-init)
 * @returns The path of the created file
 */
export function writeDefaultConfig(configDir?: string): string {
    const dir = configDir ?? getConfigHome();
    const configPath = path.join(dir, CONFIG_DEFAULTS.configFileName);

    if (fs.existsSync(configPath)) {
        throw new Error(`Config file already exists: ${configPath}`);
    }

    fs.mkdirSync(dir, { recursive: true });

    const template = [
        "# syncthing-init configuration",
        "",
        "# Address of the Syncthing GUI / REST API",
        "guiAddress: 127.0.0.1:8384",
        "# Check the GUI's TLS certificate (the daemon's own certificate is self-signed)",
        "# verifyTls: false",
        "",
        "# Where synchronised folders live, and where Syncthing keeps config.xml",
        "dataDir: /var/lib/syncthing",
        "# configDir: /var/lib/syncthing/.config/syncthing",
        "",
        "# Remove devices and folders added through the web interface",
        "overrideDevices: true",
        "overrideFolders: true",
        "",
        "# Retry policy for REST calls (optional)",
        "# apiRetries: 1000",
        "# apiRetryDelayMs: 1000",
        "# credentialPollIntervalMs: 1000",
        "# credentialTimeoutMs: 300000   # stop waiting for config.xml after 5 minutes",
        "",
        "# Logging (optional)",
        "# logDir: /var/log/syncthing-init",
        "# maxLogSizeMB: 10    # Max log file size in MB before rotation (default: 10)",
        "# maxLogFiles: 5      # Max number of rotated log files to keep (default: 5)",
        "",
        "# Syncthing settings, in the format of the REST config endpoint.",
        "# Devices and folders are keyed by a local name; folders refer to devices by that name.",
        "settings:",
        "# options:",
        "#   localAnnounceEnabled: false",
        "# devices:",
        "#   bigbox:",
        "#     id: 7CFNTQM-IMTJBHJ-3UWRDIU-ZGQJFR6-VCXZ3NB-XUH3KZO-N52ITXR-LAIYUAU",
        "#     addresses:",
        "#       - tcp://192.168.0.10:51820",
        "# folders:",
        "#   documents:",
        "#     path: /home/user/documents",
        "#     devices:",
        "#       - bigbox",
        "#     versioning:",
        "#       type: simple",
        "#       params:",
        "#         keep: \"10\"",
    ].join("\n") + "\n";

    fs.writeFileSync(configPath, template, "utf-8");
    return configPath;
}
