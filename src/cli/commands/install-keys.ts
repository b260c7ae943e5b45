import { loadConfig, getConfigHome } from "../../config/loader.js";
import { installKeys } from "../../service/keys.js";

interface InstallKeysCommandOptions {
    config?: string;
}

export function installKeysCommand(options: InstallKeysCommandOptions): void {
    try {
        const config = loadConfig(options.config ?? getConfigHome());
        const written = installKeys(config);
        if (written.length === 0) {
            console.log("No cert or key declared; nothing to install.");
            return;
        }
        for (const file of written) {
            console.log(`Installed ${file}`);
        }
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`Error: ${message}`);
        process.exit(1);
    }
}
