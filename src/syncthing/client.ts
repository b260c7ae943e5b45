import { Agent, fetch as undiciFetch, type Dispatcher } from "undici";
import type { JsonObject } from "../config/types.js";
import { isJsonObject } from "../config/fields.js";
import type { LogSink } from "../utils/logger.js";
import { retry, RetryExhaustedError } from "../utils/retry.js";
import { TransportError } from "./errors.js";

export type HttpMethod = "GET" | "PUT" | "POST";

export interface HttpRequest {
    method: HttpMethod;
    headers: Record<string, string>;
    body?: string;
}

/** The part of a fetch Response the client reads */
export interface HttpResponse {
    ok: boolean;
    status: number;
    text(): Promise<string>;
}

export type FetchLike = (url: string, init: HttpRequest) => Promise<HttpResponse>;

/** Certificate failures reported by Node's TLS layer */
const TLS_ERROR_CODES = new Set([
    "DEPTH_ZERO_SELF_SIGNED_CERT",
    "SELF_SIGNED_CERT_IN_CHAIN",
    "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
    "UNABLE_TO_GET_ISSUER_CERT",
    "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
    "CERT_HAS_EXPIRED",
    "CERT_NOT_YET_VALID",
    "CERT_UNTRUSTED",
    "ERR_TLS_CERT_ALTNAME_INVALID",
]);

/** REST endpoints the reconciler talks to */
export const ENDPOINTS = {
    config: "/rest/config",
    restartRequired: "/rest/config/restart-required",
    restart: "/rest/system/restart",
    ping: "/rest/system/ping",
} as const;

export interface SyncthingClientOptions {
    /** GUI address, with or without scheme, e.g. `127.0.0.1:8384` */
    guiAddress: string;
    apiKey: string;
    /** Attempts per call, including the first */
    retries: number;
    /** Fixed delay between attempts (ms) */
    retryDelayMs: number;
    /**
     * Check the GUI's TLS certificate. Off by default: the daemon generates
     * a self-signed certificate for its GUI.
     */
    verifyTls?: boolean;
    /** Defaults to undici's fetch */
    fetch?: FetchLike;
    logger?: LogSink;
}

/**
 * Non-2xx answer from the daemon.
 */
class HttpStatusError extends Error {
    constructor(
        public readonly status: number,
        body: string,
    ) {
        super(`HTTP ${status}${body ? `: ${body.trim()}` : ""}`);
        this.name = "HttpStatusError";
    }
}

/**
 * The daemon's certificate was rejected. Retrying cannot fix it.
 */
class TlsCertificateError extends Error {
    constructor(
        public readonly code: string,
        cause: Error,
    ) {
        super(`TLS certificate rejected (${code}): ${cause.message}`, { cause });
        this.name = "TlsCertificateError";
    }
}

/**
 * Find a TLS certificate failure in an error's cause chain.
 */
export function findTlsError(err: unknown): { code: string; error: Error } | null {
    let current: unknown = err;
    for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
        const code: unknown = Reflect.get(current, "code");
        if (typeof code === "string" && TLS_ERROR_CODES.has(code)) {
            return { code, error: current };
        }
        current = current.cause;
    }
    return null;
}

/**
 * Network failures and server-side errors are worth retrying while the daemon
 * comes up; any other HTTP error (a bad API key, say) will not fix itself.
 */
function isRetryable(err: unknown): boolean {
    if (err instanceof HttpStatusError) {
        return err.status >= 500 || err.status === 408 || err.status === 429;
    }
    return !(err instanceof TlsCertificateError);
}

/**
 * Turn a GUI address into a base URL. Bare `host:port` means plain HTTP.
 */
export function apiBaseUrl(guiAddress: string): string {
    const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(guiAddress) ? guiAddress : `http://${guiAddress}`;
    return withScheme.replace(/\/+$/, "");
}

/**
 * Dispatcher for calls to the GUI: one that accepts any certificate for an
 * `https://` address unless verification is asked for, otherwise undici's default.
 */
export function createDispatcher(guiAddress: string, verifyTls: boolean): Agent | undefined {
    if (verifyTls || !apiBaseUrl(guiAddress).toLowerCase().startsWith("https://")) {
        return undefined;
    }
    return new Agent({ connect: { rejectUnauthorized: false } });
}

function undiciFetchWith(dispatcher: Dispatcher | undefined): FetchLike {
    return (url, init) => undiciFetch(url, { ...init, dispatcher });
}

/**
 * Thin client for the daemon's REST control API. Every call carries the API key
 * and is retried with a fixed delay.
 */
export class SyncthingClient {
    private readonly baseUrl: string;
    private readonly apiKey: string;
    private readonly retries: number;
    private readonly retryDelayMs: number;
    private readonly fetchImpl: FetchLike;
    private readonly dispatcher?: Agent;
    private readonly logger?: LogSink;

    constructor(options: SyncthingClientOptions) {
        this.baseUrl = apiBaseUrl(options.guiAddress);
        this.apiKey = options.apiKey;
        this.retries = options.retries;
        this.retryDelayMs = options.retryDelayMs;
        if (options.fetch) {
            this.fetchImpl = options.fetch;
        } else {
            this.dispatcher = createDispatcher(options.guiAddress, options.verifyTls ?? false);
            this.fetchImpl = undiciFetchWith(this.dispatcher);
        }
        this.logger = options.logger;
    }

    /**
     * Fetch the daemon's live configuration.
     */
    async getConfig(): Promise<JsonObject> {
        const body = await this.request("GET", ENDPOINTS.config);
        if (!isJsonObject(body)) {
            throw new TransportError(`GET ${ENDPOINTS.config} did not return a JSON object`, 1);
        }
        return body;
    }

    /**
     * Replace the daemon's configuration.
     */
    async putConfig(config: JsonObject): Promise<void> {
        await this.request("PUT", ENDPOINTS.config, config);
    }

    async restartRequired(): Promise<boolean> {
        const body = await this.request("GET", ENDPOINTS.restartRequired);
        return isJsonObject(body) && body.requiresRestart === true;
    }

    /**
     * Ask the daemon to restart. Returns once the request is accepted,
     * not once the restart has finished.
     */
    async restart(): Promise<void> {
        await this.request("POST", ENDPOINTS.restart);
    }

    /**
     * Single-attempt liveness check.
     */
    async ping(): Promise<boolean> {
        try {
            await this.request("GET", ENDPOINTS.ping, undefined, 1);
            return true;
        } catch (err) {
            if (err instanceof TransportError) return false;
            throw err;
        }
    }

    /**
     * Release the connections held by the insecure dispatcher, if any.
     */
    async close(): Promise<void> {
        await this.dispatcher?.close();
    }

    private async request(
        method: HttpMethod,
        endpoint: string,
        body?: JsonObject,
        attempts: number = this.retries,
    ): Promise<unknown> {
        try {
            return await retry(() => this.send(method, endpoint, body), {
                attempts,
                delayMs: this.retryDelayMs,
                shouldRetry: isRetryable,
                onRetry: (err, attempt) => {
                    const message = err instanceof Error ? err.message : String(err);
                    // The daemon is usually still starting; only note the first few
                    if (attempt <= 3) {
                        this.logger?.warn(`${method} ${endpoint} failed (attempt ${attempt}/${attempts}): ${message}`);
                    }
                },
            });
        } catch (err) {
            if (err instanceof RetryExhaustedError) {
                const status = err.lastError instanceof HttpStatusError ? err.lastError.status : undefined;
                throw new TransportError(
                    `${method} ${endpoint} failed after ${err.attempts} attempt(s): ${err.message}`,
                    err.attempts,
                    status,
                );
            }
            throw err;
        }
    }

    private async send(method: HttpMethod, endpoint: string, body?: JsonObject): Promise<unknown> {
        const init: HttpRequest = { method, headers: { "X-API-Key": this.apiKey } };
        if (body !== undefined) {
            init.headers["Content-Type"] = "application/json";
            init.body = JSON.stringify(body);
        }

        let response: HttpResponse;
        try {
            response = await this.fetchImpl(`${this.baseUrl}${endpoint}`, init);
        } catch (err) {
            const tls = findTlsError(err);
            if (tls) {
                throw new TlsCertificateError(tls.code, tls.error);
            }
            throw err;
        }
        const text = await response.text();
        if (!response.ok) {
            throw new HttpStatusError(response.status, text);
        }
        if (text.trim() === "") {
            return null;
        }
        const parsed: unknown = JSON.parse(text);
        return parsed;
    }
}
