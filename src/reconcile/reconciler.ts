import type { JsonObject, SyncthingInitConfig } from "../config/types.js";
import { SyncthingClient, apiBaseUrl, type FetchLike } from "../syncthing/client.js";
import { waitForApiKey } from "../syncthing/credential.js";
import { RestartTriggerError } from "../syncthing/errors.js";
import type { LogSink } from "../utils/logger.js";
import { mergeConfig } from "./merge.js";

export interface ReconcilerDeps {
    /** Stand-in for the global fetch */
    fetch?: FetchLike;
    logger?: LogSink;
}

export interface ReconcileResult {
    /** The config that was submitted */
    config: JsonObject;
    /** Whether a restart was requested */
    restarted: boolean;
}

function countOf(value: unknown): number {
    return Array.isArray(value) ? value.length : 0;
}

/**
 * Brings a running daemon's configuration in line with the declared one.
 *
 * One pass is fetch, merge, submit, then restart if the daemon asks for it.
 * There is no compare-and-swap on the daemon side: an edit made through the
 * web UI between our fetch and our submit is lost.
 */
export class Reconciler {
    private readonly logger?: LogSink;

    constructor(
        private readonly config: SyncthingInitConfig,
        private readonly deps: ReconcilerDeps = {},
    ) {
        this.logger = deps.logger;
    }

    /**
     * Wait for the API key, then build an authenticated client.
     */
    async connect(): Promise<SyncthingClient> {
        const apiKey = await waitForApiKey(this.config.configDir, {
            pollIntervalMs: this.config.credentialPollIntervalMs,
            timeoutMs: this.config.credentialTimeoutMs,
            logger: this.logger,
        });

        return new SyncthingClient({
            guiAddress: this.config.guiAddress,
            apiKey,
            retries: this.config.apiRetries,
            retryDelayMs: this.config.apiRetryDelayMs,
            verifyTls: this.config.verifyTls,
            fetch: this.deps.fetch,
            logger: this.logger,
        });
    }

    /**
     * Fetch the live config and return what would be submitted, without submitting it.
     */
    async plan(client?: SyncthingClient): Promise<JsonObject> {
        if (!client) {
            const own = await this.connect();
            try {
                return await this.plan(own);
            } finally {
                await own.close();
            }
        }

        this.logger?.info(`Fetching live config from ${apiBaseUrl(this.config.guiAddress)}`);
        const live = await client.getConfig();

        const merged = mergeConfig(live, this.config.settings, {
            overrideDevices: this.config.overrideDevices,
            overrideFolders: this.config.overrideFolders,
        });

        this.logger?.info(
            `Merged config: devices ${countOf(live.devices)} live → ${countOf(merged.devices)}, ` +
            `folders ${countOf(live.folders)} live → ${countOf(merged.folders)}`,
        );
        return merged;
    }

    /**
     * Run one reconciliation pass.
     */
    async reconcile(): Promise<ReconcileResult> {
        const client = await this.connect();
        try {
            return await this.submit(client);
        } finally {
            await client.close();
        }
    }

    private async submit(client: SyncthingClient): Promise<ReconcileResult> {
        const merged = await this.plan(client);

        await client.putConfig(merged);
        this.logger?.info("Submitted merged config");

        let restarted = false;
        try {
            if (await client.restartRequired()) {
                this.logger?.info("Daemon reports a restart is required. Restarting...");
                await client.restart();
                restarted = true;
            } else {
                this.logger?.info("No restart required");
            }
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            throw new RestartTriggerError(
                `Config was applied but the restart step failed: ${message}`,
                { cause: err },
            );
        }

        return { config: merged, restarted };
    }
}
