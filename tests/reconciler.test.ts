import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Reconciler } from "../src/reconcile/reconciler.js";
import { validateConfig } from "../src/config/loader.js";
import type { SyncthingInitConfig } from "../src/config/types.js";
import { ENDPOINTS } from "../src/syncthing/client.js";
import { CredentialTimeoutError, RestartTriggerError, TransportError } from "../src/syncthing/errors.js";
import {
    FakeSyncthingDaemon,
    MemoryLogger,
    cleanupDir,
    createTempDir,
    writeConfigXml,
} from "./helpers/fake-daemon.js";

describe("Reconciler", () => {
    let tempDir: string;
    let daemon: FakeSyncthingDaemon;
    let logger: MemoryLogger;

    function createConfig(settings: unknown = {}, extra: Record<string, unknown> = {}): SyncthingInitConfig {
        return validateConfig({
            configDir: tempDir,
            apiRetries: 3,
            apiRetryDelayMs: 0,
            credentialPollIntervalMs: 5,
            settings,
            ...extra,
        });
    }

    function createReconciler(config: SyncthingInitConfig): Reconciler {
        return new Reconciler(config, { fetch: daemon.fetch, logger });
    }

    beforeEach(() => {
        tempDir = createTempDir();
        writeConfigXml(tempDir);
        logger = new MemoryLogger();
        daemon = new FakeSyncthingDaemon({
            version: 37,
            options: { maxSendKbps: 0, maxRecvKbps: 0 },
            devices: [],
            folders: [],
        });
    });

    afterEach(() => {
        cleanupDir(tempDir);
    });

    it("should submit the merged config", async () => {
        const config = createConfig({ options: { maxSendKbps: 500 } });

        const result = await createReconciler(config).reconcile();

        const expected = {
            version: 37,
            options: { maxSendKbps: 500, maxRecvKbps: 0 },
            devices: [],
            folders: [],
        };
        expect(result.config).toEqual(expected);
        expect(daemon.config).toEqual(expected);
        expect(daemon.callsTo("PUT", ENDPOINTS.config)).toHaveLength(1);
    });

    it("should not restart when the daemon does not ask for it", async () => {
        const result = await createReconciler(createConfig()).reconcile();

        expect(result.restarted).toBe(false);
        expect(daemon.callsTo("POST", ENDPOINTS.restart)).toHaveLength(0);
        expect(logger.lines).toContain("INFO No restart required");
    });

    it("should restart exactly once when the daemon asks for it", async () => {
        daemon.restartAfterPut = true;

        const result = await createReconciler(createConfig()).reconcile();

        expect(result.restarted).toBe(true);
        expect(daemon.restarts).toBe(1);
        expect(daemon.callsTo("POST", ENDPOINTS.restart)).toHaveLength(1);
    });

    it("should call the endpoints in order", async () => {
        await createReconciler(createConfig()).reconcile();

        expect(daemon.calls.map((c) => `${c.method} ${c.path}`)).toEqual([
            "GET /rest/config",
            "PUT /rest/config",
            "GET /rest/config/restart-required",
        ]);
    });

    it("should submit the same config on a second run", async () => {
        const config = createConfig({
            devices: { bigbox: { id: "ABC123" } },
            folders: { docs: { path: "/srv/docs", devices: ["bigbox"] } },
        });

        const first = await createReconciler(config).reconcile();
        const second = await createReconciler(config).reconcile();

        expect(second.config).toEqual(first.config);
        expect(daemon.config).toEqual(first.config);
    });

    it("should wire declared folders to declared devices", async () => {
        const config = createConfig({
            devices: { bigbox: { id: "ABC123" } },
            folders: { docs: { path: "/srv/docs", devices: ["bigbox"] } },
        });

        await createReconciler(config).reconcile();

        const folders = daemon.config.folders;
        expect(Array.isArray(folders) ? folders[0] : undefined).toMatchObject({
            id: "docs",
            devices: [{ deviceId: "ABC123" }],
        });
    });

    it("should retry a daemon that is still starting", async () => {
        daemon.failNext(ENDPOINTS.config, "network", "network");

        await createReconciler(createConfig()).reconcile();

        expect(daemon.callsTo("GET", ENDPOINTS.config)).toHaveLength(3);
        expect(daemon.callsTo("PUT", ENDPOINTS.config)).toHaveLength(1);
    });

    it("should not submit anything when the config cannot be fetched", async () => {
        daemon.failNext(ENDPOINTS.config, 500, 500, 500);

        await expect(createReconciler(createConfig()).reconcile()).rejects.toBeInstanceOf(TransportError);
        expect(daemon.callsTo("PUT", ENDPOINTS.config)).toHaveLength(0);
    });

    it("should report a failed restart separately from a failed submit", async () => {
        daemon.restartAfterPut = true;
        daemon.failNext(ENDPOINTS.restart, 500, 500, 500);

        const error = await createReconciler(createConfig()).reconcile().catch((err: unknown) => err);

        expect(error).toBeInstanceOf(RestartTriggerError);
        if (error instanceof RestartTriggerError) {
            expect(error.cause).toBeInstanceOf(TransportError);
            expect(error.message).toBe(
                "Config was applied but the restart step failed: " +
                'POST /rest/system/restart failed after 3 attempt(s): HTTP 500: {"error":"injected failure"}',
            );
        }
        expect(daemon.callsTo("PUT", ENDPOINTS.config)).toHaveLength(1);
    });

    it("should give up waiting for the API key when a timeout is set", async () => {
        const emptyDir = createTempDir();
        try {
            const config = validateConfig({
                configDir: emptyDir,
                credentialPollIntervalMs: 5,
                credentialTimeoutMs: 20,
            });
            await expect(createReconciler(config).reconcile()).rejects.toBeInstanceOf(CredentialTimeoutError);
            expect(daemon.calls).toHaveLength(0);
        } finally {
            cleanupDir(emptyDir);
        }
    });

    it("should plan without submitting", async () => {
        const config = createConfig({ options: { maxRecvKbps: 100 } });

        const planned = await createReconciler(config).plan();

        expect(planned.options).toEqual({ maxSendKbps: 0, maxRecvKbps: 100 });
        expect(daemon.callsTo("PUT", ENDPOINTS.config)).toHaveLength(0);
        expect(logger.lines).toContain("INFO Merged config: devices 0 live → 0, folders 0 live → 0");
    });
});
