import { loadConfig, getConfigHome } from "../../config/loader.js";
import { Reconciler, type ReconcilerDeps } from "../../reconcile/reconciler.js";
import { Logger } from "../../utils/logger.js";

interface PlanOptions {
    config?: string;
}

/**
 * Print the config `apply` would submit. Nothing is written to the daemon.
 */
export async function planCommand(options: PlanOptions, deps: ReconcilerDeps = {}): Promise<void> {
    try {
        const config = loadConfig(options.config ?? getConfigHome());
        const logger = new Logger({
            logDir: config.logDir ?? undefined,
            maxLogSizeMB: config.maxLogSizeMB,
            maxLogFiles: config.maxLogFiles,
        });

        const merged = await new Reconciler(config, { ...deps, logger }).plan();
        console.log(JSON.stringify(merged, null, 2));
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`Error: ${message}`);
        process.exit(1);
    }
}
