import { loadConfig, getConfigHome } from "../../config/loader.js";
import { assertSystemdPlatform } from "../../service/platform.js";
import { uninstallServices } from "../../service/linux.js";

interface UninstallServiceOptions {
    config?: string;
}

export function uninstallServiceCommand(options: UninstallServiceOptions): void {
    try {
        assertSystemdPlatform();
        const config = loadConfig(options.config ?? getConfigHome());

        const removed = uninstallServices(config);
        if (removed.length === 0) {
            console.log("No unit files found.");
            return;
        }
        for (const file of removed) {
            console.log(`Removed ${file}`);
        }
        const ctl = config.systemService ? "systemctl" : "systemctl --user";
        console.log(`Run '${ctl} daemon-reload' to apply changes.`);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`Error: ${message}`);
        process.exit(1);
    }
}
