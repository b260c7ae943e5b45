import * as fs from "node:fs";
import * as path from "node:path";
import { XMLParser } from "fast-xml-parser";
import { isJsonObject } from "../config/fields.js";
import type { LogSink } from "../utils/logger.js";
import { sleep } from "../utils/retry.js";
import { CredentialTimeoutError } from "./errors.js";

export type ApiKeyResult = { ok: true; apiKey: string } | { ok: false; reason: string };

export interface WaitForApiKeyOptions {
    /** Delay between reads (ms) */
    pollIntervalMs: number;
    /** Give up after this long (ms); unset waits forever */
    timeoutMs?: number;
    logger?: LogSink;
}

const parser = new XMLParser({
    ignoreAttributes: true,
    parseTagValue: false,
    trimValues: true,
});

/**
 * Path of the daemon's own config file inside its config directory.
 */
export function configXmlPath(configDir: string): string {
    return path.join(configDir, "config.xml");
}

/**
 * Pull `configuration > gui > apikey` out of a config.xml document.
 */
export function parseApiKey(xml: string): ApiKeyResult {
    let doc: unknown;
    try {
        doc = parser.parse(xml);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return { ok: false, reason: `config.xml is not valid XML: ${message}` };
    }

    const configuration = isJsonObject(doc) ? doc.configuration : undefined;
    const gui = isJsonObject(configuration) ? configuration.gui : undefined;
    const apiKey = isJsonObject(gui) ? gui.apikey : undefined;

    if (typeof apiKey !== "string" || apiKey === "") {
        return { ok: false, reason: "config.xml has no gui API key yet" };
    }
    return { ok: true, apiKey };
}

/**
 * Read the API key once. The daemon writes config.xml on first start,
 * so a missing or half-written file means "not ready", not an error.
 */
export function readApiKey(configDir: string): ApiKeyResult {
    const xmlPath = configXmlPath(configDir);
    if (!fs.existsSync(xmlPath)) {
        return { ok: false, reason: `${xmlPath} does not exist yet` };
    }

    let xml: string;
    try {
        xml = fs.readFileSync(xmlPath, "utf-8");
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return { ok: false, reason: `cannot read ${xmlPath}: ${message}` };
    }
    return parseApiKey(xml);
}

/**
 * Poll config.xml until it yields an API key.
 * Throws CredentialTimeoutError only when a timeout is configured and elapses.
 */
export async function waitForApiKey(configDir: string, options: WaitForApiKeyOptions): Promise<string> {
    const startedAt = Date.now();
    let lastReason: string | null = null;

    for (;;) {
        const result = readApiKey(configDir);
        if (result.ok) {
            return result.apiKey;
        }

        if (result.reason !== lastReason) {
            options.logger?.info(`Waiting for API key: ${result.reason}`);
            lastReason = result.reason;
        }

        const waited = Date.now() - startedAt;
        if (options.timeoutMs !== undefined && waited >= options.timeoutMs) {
            throw new CredentialTimeoutError(
                `Gave up waiting for the API key after ${waited}ms: ${result.reason}`,
                configXmlPath(configDir),
                waited,
            );
        }

        await sleep(options.pollIntervalMs);
    }
}
