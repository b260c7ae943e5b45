import folderOptionsTable from "./schema/folder-options.json";
import globalOptionsTable from "./schema/global-options.json";
import type { JsonObject, JsonValue } from "./types.js";

export type FieldType = "int" | "bool" | "string" | "enum";

export type FieldValue = string | number | boolean;

/**
 * Type (and optional default) of one known Syncthing setting.
 */
export interface FieldSpec {
    type: FieldType;
    /** Allowed values for `enum` fields */
    values?: string[];
    default?: FieldValue;
}

const FIELD_TYPES: readonly string[] = ["int", "bool", "string", "enum"];

export function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Check that a parsed YAML value is plain JSON data and return it typed as such.
 */
export function toJsonValue(value: unknown, where: string): JsonValue {
    if (value === null || typeof value === "string" || typeof value === "boolean") {
        return value;
    }
    if (typeof value === "number") {
        if (!Number.isFinite(value)) {
            throw new Error(`${where} must be a finite number`);
        }
        return value;
    }
    if (Array.isArray(value)) {
        return value.map((item, i) => toJsonValue(item, `${where}[${i}]`));
    }
    if (isJsonObject(value)) {
        return toJsonObject(value, where);
    }
    throw new Error(`${where} is not representable as JSON`);
}

export function toJsonObject(value: unknown, where: string): JsonObject {
    if (!isJsonObject(value)) {
        throw new Error(`${where} must be an object`);
    }
    const result: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
        result[key] = toJsonValue(item, `${where}.${key}`);
    }
    return result;
}

function isFieldType(value: unknown): value is FieldType {
    return typeof value === "string" && FIELD_TYPES.includes(value);
}

function isFieldValue(value: unknown): value is FieldValue {
    return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function parseFieldTable(table: unknown, source: string): Map<string, FieldSpec> {
    if (!isJsonObject(table)) {
        throw new Error(`${source} must be an object`);
    }
    const fields = new Map<string, FieldSpec>();
    for (const [name, entry] of Object.entries(table)) {
        if (!isJsonObject(entry) || !isFieldType(entry.type)) {
            throw new Error(`${source}: invalid field "${name}"`);
        }
        const spec: FieldSpec = { type: entry.type };
        if (Array.isArray(entry.values)) {
            spec.values = entry.values.filter((v): v is string => typeof v === "string");
        }
        if (isFieldValue(entry.default)) {
            spec.default = entry.default;
        }
        fields.set(name, spec);
    }
    return fields;
}

/** Folder tuning fields, with the defaults sent for every declared folder */
export const FOLDER_FIELDS = parseFieldTable(folderOptionsTable, "folder-options.json");

/** Known global options; type-checked when given, never defaulted */
export const GLOBAL_OPTION_FIELDS = parseFieldTable(globalOptionsTable, "global-options.json");

/**
 * Validate a single value against its field spec. Throws on mismatch.
 */
export function checkField(spec: FieldSpec, value: unknown, where: string): FieldValue {
    switch (spec.type) {
        case "int":
            if (typeof value !== "number" || !Number.isInteger(value)) {
                throw new Error(`${where} must be an integer`);
            }
            return value;
        case "bool":
            if (typeof value !== "boolean") {
                throw new Error(`${where} must be a boolean`);
            }
            return value;
        case "string":
            if (typeof value !== "string") {
                throw new Error(`${where} must be a string`);
            }
            return value;
        case "enum": {
            const allowed = spec.values ?? [];
            if (typeof value !== "string" || !allowed.includes(value)) {
                throw new Error(`${where} must be one of: ${allowed.join(", ")}`);
            }
            return value;
        }
    }
}
