import { describe, it, expect } from "vitest";
import { Agent } from "undici";
import { SyncthingClient, apiBaseUrl, createDispatcher, findTlsError, ENDPOINTS } from "../src/syncthing/client.js";
import { TransportError } from "../src/syncthing/errors.js";
import { FakeSyncthingDaemon, MemoryLogger, TEST_API_KEY } from "./helpers/fake-daemon.js";

function createClient(daemon: FakeSyncthingDaemon, retries = 3, logger?: MemoryLogger): SyncthingClient {
    return new SyncthingClient({
        guiAddress: "127.0.0.1:8384",
        apiKey: TEST_API_KEY,
        retries,
        retryDelayMs: 0,
        fetch: daemon.fetch,
        logger,
    });
}

async function transportError(promise: Promise<unknown>): Promise<TransportError> {
    const error = await promise.catch((err: unknown) => err);
    if (!(error instanceof TransportError)) {
        throw new Error(`expected a TransportError, got ${String(error)}`);
    }
    return error;
}

describe("apiBaseUrl", () => {
    it("should assume http for a bare address", () => {
        expect(apiBaseUrl("127.0.0.1:8384")).toBe("http://127.0.0.1:8384");
    });

    it("should keep an explicit scheme and drop trailing slashes", () => {
        expect(apiBaseUrl("https://sync.example.test:8384/")).toBe("https://sync.example.test:8384");
    });
});

describe("createDispatcher", () => {
    it("should accept self-signed certificates on https by default", async () => {
        const dispatcher = createDispatcher("https://127.0.0.1:8384", false);
        expect(dispatcher).toBeInstanceOf(Agent);
        await dispatcher?.close();
    });

    it("should use the default dispatcher when verification is on", () => {
        expect(createDispatcher("https://127.0.0.1:8384", true)).toBeUndefined();
    });

    it("should use the default dispatcher for plain http", () => {
        expect(createDispatcher("127.0.0.1:8384", false)).toBeUndefined();
        expect(createDispatcher("http://127.0.0.1:8384", false)).toBeUndefined();
    });
});

describe("findTlsError", () => {
    it("should find a certificate error in the cause chain", () => {
        const cause = Object.assign(new Error("certificate has expired"), { code: "CERT_HAS_EXPIRED" });
        const found = findTlsError(new TypeError("fetch failed", { cause }));
        expect(found?.code).toBe("CERT_HAS_EXPIRED");
        expect(found?.error).toBe(cause);
    });

    it("should ignore connection errors", () => {
        const cause = Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:8384"), { code: "ECONNREFUSED" });
        expect(findTlsError(new TypeError("fetch failed", { cause }))).toBeNull();
    });
});

describe("SyncthingClient", () => {
    it("should send the API key on every call", async () => {
        const daemon = new FakeSyncthingDaemon({ version: 37 });
        const client = createClient(daemon);

        await client.getConfig();
        await client.restartRequired();

        expect(daemon.calls.map((c) => c.apiKey)).toEqual([TEST_API_KEY, TEST_API_KEY]);
    });

    it("should fetch and replace the config", async () => {
        const daemon = new FakeSyncthingDaemon({ version: 37, devices: [] });
        const client = createClient(daemon);

        expect(await client.getConfig()).toEqual({ version: 37, devices: [] });
        await client.putConfig({ version: 37, devices: [], folders: [] });

        expect(daemon.config).toEqual({ version: 37, devices: [], folders: [] });
        expect(daemon.callsTo("PUT", ENDPOINTS.config)[0].body).toEqual({ version: 37, devices: [], folders: [] });
    });

    it("should retry through dropped connections and server errors", async () => {
        const daemon = new FakeSyncthingDaemon({ version: 37 });
        daemon.failNext(ENDPOINTS.config, "network", 503);
        const logger = new MemoryLogger();
        const client = createClient(daemon, 3, logger);

        expect(await client.getConfig()).toEqual({ version: 37 });
        expect(daemon.callsTo("GET", ENDPOINTS.config)).toHaveLength(3);
        expect(logger.lines).toEqual([
            "WARN GET /rest/config failed (attempt 1/3): fetch failed",
            'WARN GET /rest/config failed (attempt 2/3): HTTP 503: {"error":"injected failure"}',
        ]);
    });

    it("should fail with a TransportError once retries run out", async () => {
        const daemon = new FakeSyncthingDaemon({ version: 37 });
        daemon.failNext(ENDPOINTS.config, 500, 500, 500);
        const client = createClient(daemon, 3);

        const error = await transportError(client.getConfig());
        expect(error.attempts).toBe(3);
        expect(error.status).toBe(500);
        expect(error.message).toBe(
            'GET /rest/config failed after 3 attempt(s): HTTP 500: {"error":"injected failure"}',
        );
    });

    it("should not retry a rejected API key", async () => {
        const daemon = new FakeSyncthingDaemon({ version: 37 }, "test-other-key");
        const client = createClient(daemon, 5);

        const error = await transportError(client.getConfig());
        expect(error.attempts).toBe(1);
        expect(error.status).toBe(403);
        expect(daemon.calls).toHaveLength(1);
    });

    it("should not retry a rejected certificate", async () => {
        const daemon = new FakeSyncthingDaemon({ version: 37 });
        daemon.failNext(ENDPOINTS.config, "tls");
        const client = createClient(daemon, 5);

        const error = await transportError(client.getConfig());
        expect(error.attempts).toBe(1);
        expect(error.status).toBeUndefined();
        expect(error.message).toBe(
            "GET /rest/config failed after 1 attempt(s): " +
            "TLS certificate rejected (DEPTH_ZERO_SELF_SIGNED_CERT): self-signed certificate",
        );
        expect(daemon.calls).toHaveLength(1);
    });

    it("should retry rate limiting", async () => {
        const daemon = new FakeSyncthingDaemon({ version: 37 });
        daemon.failNext(ENDPOINTS.config, 429);
        const client = createClient(daemon, 2);

        await expect(client.getConfig()).resolves.toEqual({ version: 37 });
    });

    it("should report the restart-required flag", async () => {
        const daemon = new FakeSyncthingDaemon({ version: 37 });
        const client = createClient(daemon);

        expect(await client.restartRequired()).toBe(false);
        daemon.requiresRestart = true;
        expect(await client.restartRequired()).toBe(true);
    });

    it("should post a restart", async () => {
        const daemon = new FakeSyncthingDaemon({ version: 37 });
        const client = createClient(daemon);

        await client.restart();
        expect(daemon.restarts).toBe(1);
        expect(daemon.callsTo("POST", ENDPOINTS.restart)).toHaveLength(1);
    });

    it("should ping once without retrying", async () => {
        const daemon = new FakeSyncthingDaemon({ version: 37 });
        const client = createClient(daemon, 5);

        expect(await client.ping()).toBe(true);
        daemon.failNext(ENDPOINTS.ping, "network");
        expect(await client.ping()).toBe(false);
        expect(daemon.callsTo("GET", ENDPOINTS.ping)).toHaveLength(2);
    });
});
