import type {
    DeclaredDevice,
    DeclaredFolder,
    DeclaredSettings,
    JsonObject,
    JsonValue,
} from "../config/types.js";
import { isJsonObject } from "../config/fields.js";

/**
 * Whether declared devices/folders replace the live lists or are put in front of them.
 */
export interface MergePolicy {
    overrideDevices: boolean;
    overrideFolders: boolean;
}

/**
 * Field-level merge: two objects merge key by key, recursively; anything else
 * (scalars, arrays, null) is replaced by the overlay. Neither input is modified.
 */
export function deepMerge(base: JsonValue, overlay: JsonValue): JsonValue {
    if (isJsonObject(base) && isJsonObject(overlay)) {
        return mergeObjects(base, overlay);
    }
    return clone(overlay);
}

export function mergeObjects(base: JsonObject, overlay: JsonObject): JsonObject {
    const result: JsonObject = {};
    for (const [key, value] of Object.entries(base)) {
        result[key] = clone(value);
    }
    for (const [key, value] of Object.entries(overlay)) {
        result[key] = key in result ? deepMerge(result[key], value) : clone(value);
    }
    return result;
}

function clone(value: JsonValue): JsonValue {
    if (Array.isArray(value)) {
        return value.map(clone);
    }
    if (isJsonObject(value)) {
        return mergeObjects({}, value);
    }
    return value;
}

/**
 * A declared device as the REST API wants it: the symbolic name is dropped
 * and the id travels as `deviceID`.
 */
export function toApiDevice(device: DeclaredDevice): JsonObject {
    return {
        deviceID: device.id,
        name: device.name,
        addresses: [...device.addresses],
        introducer: device.introducer,
        autoAcceptFolders: device.autoAcceptFolders,
        ...mergeObjects({}, device.extra),
    };
}

/**
 * A declared folder as the REST API wants it. Device names are resolved to
 * `{ deviceId }` references; structured references pass through.
 */
export function toApiFolder(folder: DeclaredFolder, devices: ReadonlyMap<string, DeclaredDevice>): JsonObject {
    const refs: JsonValue[] = folder.devices.map((ref) => {
        if (typeof ref !== "string") {
            return mergeObjects({}, ref);
        }
        const device = devices.get(ref);
        if (!device) {
            throw new Error(`Folder "${folder.id}" references unknown device "${ref}"`);
        }
        return { deviceId: device.id };
    });

    const result: JsonObject = {
        id: folder.id,
        label: folder.label,
        path: folder.path,
        devices: refs,
    };
    if (folder.versioning) {
        result.versioning = {
            type: folder.versioning.type,
            fsPath: folder.versioning.fsPath,
            params: { ...folder.versioning.params },
        };
    }
    return { ...result, ...mergeObjects({}, folder.options) };
}

export function declaredDeviceList(settings: DeclaredSettings): JsonObject[] {
    return [...settings.devices.values()].map(toApiDevice);
}

/**
 * Enabled folders only; a disabled folder is simply not declared to the daemon.
 */
export function declaredFolderList(settings: DeclaredSettings): JsonObject[] {
    return [...settings.folders.values()]
        .filter((folder) => folder.enable)
        .map((folder) => toApiFolder(folder, settings.devices));
}

function liveList(value: JsonValue | undefined): JsonValue[] {
    return Array.isArray(value) ? value.map(clone) : [];
}

/**
 * Declared entries first; the live entries follow unless the override flag
 * is set and something was declared. Entries are not deduplicated by id.
 */
function combine(
    declared: JsonObject[],
    live: JsonValue | undefined,
    override: boolean,
    nothingDeclared: boolean,
): JsonValue[] {
    if (nothingDeclared || !override) {
        return [...declared, ...liveList(live)];
    }
    return declared;
}

/**
 * Compute the config to submit: the live config with the declared settings
 * merged over it, and the device and folder lists rebuilt per the policy.
 */
export function mergeConfig(live: JsonObject, settings: DeclaredSettings, policy: MergePolicy): JsonObject {
    const merged = mergeObjects(live, settings.global);

    const devices = declaredDeviceList(settings);
    const folders = declaredFolderList(settings);
    merged.devices = combine(devices, live.devices, policy.overrideDevices, devices.length === 0);
    // Disabled folders do not count as declared
    merged.folders = combine(folders, live.folders, policy.overrideFolders, folders.length === 0);

    return merged;
}
