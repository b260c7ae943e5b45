import * as path from "node:path";
import type {
    DeclaredDevice,
    DeclaredFolder,
    DeclaredSettings,
    FolderDeviceRef,
    FolderVersioning,
    JsonObject,
    VersioningType,
} from "./types.js";
import {
    FOLDER_FIELDS,
    GLOBAL_OPTION_FIELDS,
    checkField,
    isJsonObject,
    toJsonObject,
    toJsonValue,
} from "./fields.js";

const VERSIONING_TYPES: readonly string[] = ["external", "simple", "staggered", "trashcan"];

function isVersioningType(value: unknown): value is VersioningType {
    return typeof value === "string" && VERSIONING_TYPES.includes(value);
}

function optionalString(value: unknown, fallback: string, where: string): string {
    if (value === undefined) return fallback;
    if (typeof value !== "string" || value.trim() === "") {
        throw new Error(`${where} must be a non-empty string`);
    }
    return value;
}

function optionalBoolean(value: unknown, fallback: boolean, where: string): boolean {
    if (value === undefined) return fallback;
    if (typeof value !== "boolean") {
        throw new Error(`${where} must be a boolean`);
    }
    return value;
}

/**
 * Collect every key not already consumed into a pass-through object.
 */
function remainder(raw: Record<string, unknown>, consumed: readonly string[], where: string): JsonObject {
    const extra: JsonObject = {};
    for (const [key, value] of Object.entries(raw)) {
        if (consumed.includes(key)) continue;
        extra[key] = toJsonValue(value, `${where}.${key}`);
    }
    return extra;
}

const DEVICE_KEYS = ["name", "id", "addresses", "introducer", "autoAcceptFolders"] as const;

export function validateDevice(key: string, raw: unknown): DeclaredDevice {
    const where = `settings.devices.${key}`;
    if (!isJsonObject(raw)) {
        throw new Error(`${where} must be an object`);
    }

    if (typeof raw.id !== "string" || raw.id.trim() === "") {
        throw new Error(`${where}.id must be a non-empty string`);
    }

    let addresses: string[] = [];
    if (raw.addresses !== undefined) {
        if (!Array.isArray(raw.addresses)) {
            throw new Error(`${where}.addresses must be an array`);
        }
        addresses = raw.addresses.map((a, i) => {
            if (typeof a !== "string" || a.trim() === "") {
                throw new Error(`${where}.addresses[${i}] must be a non-empty string`);
            }
            return a;
        });
    }

    return {
        name: optionalString(raw.name, key, `${where}.name`),
        id: raw.id.trim(),
        addresses,
        introducer: optionalBoolean(raw.introducer, false, `${where}.introducer`),
        autoAcceptFolders: optionalBoolean(raw.autoAcceptFolders, false, `${where}.autoAcceptFolders`),
        extra: remainder(raw, DEVICE_KEYS, where),
    };
}

function validateVersioning(raw: unknown, where: string): FolderVersioning | null {
    if (raw === undefined || raw === null) return null;
    if (!isJsonObject(raw)) {
        throw new Error(`${where} must be an object or null`);
    }
    if (!isVersioningType(raw.type)) {
        throw new Error(`${where}.type must be one of: ${VERSIONING_TYPES.join(", ")}`);
    }

    const params: Record<string, string> = {};
    if (raw.params !== undefined) {
        if (!isJsonObject(raw.params)) {
            throw new Error(`${where}.params must be an object`);
        }
        for (const [name, value] of Object.entries(raw.params)) {
            // The REST API takes every param as a string
            if (typeof value === "string") {
                params[name] = value;
            } else if (typeof value === "number" || typeof value === "boolean") {
                params[name] = String(value);
            } else {
                throw new Error(`${where}.params.${name} must be a string`);
            }
        }
    }

    if (raw.fsPath !== undefined && typeof raw.fsPath !== "string") {
        throw new Error(`${where}.fsPath must be a string`);
    }

    return {
        type: raw.type,
        fsPath: raw.fsPath ?? "",
        params,
    };
}

const FOLDER_KEYS = ["enable", "id", "label", "path", "devices", "versioning"] as const;

export function validateFolder(
    key: string,
    raw: unknown,
    devices: ReadonlyMap<string, DeclaredDevice>,
    dataDir: string,
): DeclaredFolder {
    const where = `settings.folders.${key}`;
    if (!isJsonObject(raw)) {
        throw new Error(`${where} must be an object`);
    }

    let folderPath = path.posix.join(dataDir, key);
    if (raw.path !== undefined) {
        folderPath = optionalString(raw.path, folderPath, `${where}.path`);
        if (!folderPath.startsWith("/") && !folderPath.startsWith("~/")) {
            throw new Error(`${where}.path must be absolute or start with "~/"`);
        }
    }

    const deviceRefs: FolderDeviceRef[] = [];
    if (raw.devices !== undefined) {
        if (!Array.isArray(raw.devices)) {
            throw new Error(`${where}.devices must be an array`);
        }
        raw.devices.forEach((ref, i) => {
            if (typeof ref === "string") {
                if (!devices.has(ref)) {
                    throw new Error(`${where}.devices[${i}] references unknown device "${ref}"`);
                }
                deviceRefs.push(ref);
            } else if (isJsonObject(ref)) {
                deviceRefs.push(toJsonObject(ref, `${where}.devices[${i}]`));
            } else {
                throw new Error(`${where}.devices[${i}] must be a device name or an object`);
            }
        });
    }

    const options: JsonObject = {};
    for (const [field, spec] of FOLDER_FIELDS) {
        const value = raw[field];
        if (value === undefined) {
            if (spec.default !== undefined) options[field] = spec.default;
        } else {
            options[field] = checkField(spec, value, `${where}.${field}`);
        }
    }
    Object.assign(options, remainder(raw, [...FOLDER_KEYS, ...FOLDER_FIELDS.keys()], where));

    return {
        enable: optionalBoolean(raw.enable, true, `${where}.enable`),
        id: optionalString(raw.id, key, `${where}.id`),
        label: optionalString(raw.label, key, `${where}.label`),
        path: folderPath,
        devices: deviceRefs,
        versioning: validateVersioning(raw.versioning, `${where}.versioning`),
        options,
    };
}

/**
 * Validate the `settings` document: known global options are type-checked,
 * devices and folders get their defaults, everything else passes through.
 */
export function validateSettings(raw: unknown, dataDir: string): DeclaredSettings {
    if (raw === undefined || raw === null) {
        return { global: {}, devices: new Map(), folders: new Map() };
    }
    if (!isJsonObject(raw)) {
        throw new Error("settings must be an object");
    }

    if (raw.options !== undefined) {
        if (!isJsonObject(raw.options)) {
            throw new Error("settings.options must be an object");
        }
        for (const [field, spec] of GLOBAL_OPTION_FIELDS) {
            if (raw.options[field] !== undefined) {
                checkField(spec, raw.options[field], `settings.options.${field}`);
            }
        }
    }

    const devices = new Map<string, DeclaredDevice>();
    if (raw.devices !== undefined && raw.devices !== null) {
        if (!isJsonObject(raw.devices)) {
            throw new Error("settings.devices must be a mapping of names to devices");
        }
        for (const [key, device] of Object.entries(raw.devices)) {
            devices.set(key, validateDevice(key, device));
        }
    }

    const folders = new Map<string, DeclaredFolder>();
    if (raw.folders !== undefined && raw.folders !== null) {
        if (!isJsonObject(raw.folders)) {
            throw new Error("settings.folders must be a mapping of names to folders");
        }
        for (const [key, folder] of Object.entries(raw.folders)) {
            folders.set(key, validateFolder(key, folder, devices, dataDir));
        }
    }

    return {
        global: remainder(raw, ["devices", "folders"], "settings"),
        devices,
        folders,
    };
}
