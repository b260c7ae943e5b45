import { loadConfig, getConfigHome } from "../../config/loader.js";
import { Reconciler, type ReconcilerDeps } from "../../reconcile/reconciler.js";
import { Logger } from "../../utils/logger.js";

interface ApplyOptions {
    config?: string;
}

/**
 * One reconciliation pass. Exits non-zero on any unrecovered failure so the
 * service manager's restart policy can take over.
 */
export async function applyCommand(options: ApplyOptions, deps: ReconcilerDeps = {}): Promise<void> {
    const configDir = options.config ?? getConfigHome();

    let logger: Logger | undefined;
    try {
        const config = loadConfig(configDir);
        logger = new Logger({
            logDir: config.logDir ?? undefined,
            maxLogSizeMB: config.maxLogSizeMB,
            maxLogFiles: config.maxLogFiles,
            console: true,
        });

        logger.info(
            `Reconciling ${config.settings.devices.size} device(s) and ` +
            `${config.settings.folders.size} folder(s) against ${config.guiAddress}`,
        );
        const result = await new Reconciler(config, { ...deps, logger }).reconcile();
        logger.info(result.restarted ? "Reconciliation complete, restart requested." : "Reconciliation complete.");
    } catch (err) {
        const name = err instanceof Error ? err.name : "Error";
        const message = err instanceof Error ? err.message : String(err);
        logger ??= new Logger({ console: true });
        logger.error(`${name}: ${message}`);
        process.exit(1);
    }
}
