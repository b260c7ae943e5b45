import * as path from "node:path";
import { loadConfig, getConfigHome } from "../../config/loader.js";
import { CONFIG_DEFAULTS } from "../../config/types.js";
import { assertSystemdPlatform } from "../../service/platform.js";
import { installServices, getSystemdInstructions, assertWorldReadable } from "../../service/linux.js";

interface InstallServiceOptions {
    config?: string;
}

export function installServiceCommand(options: InstallServiceOptions): void {
    try {
        assertSystemdPlatform();
        const configDir = path.resolve(options.config ?? getConfigHome());
        const config = loadConfig(configDir);
        if (config.systemService) {
            try {
                assertWorldReadable(path.join(configDir, CONFIG_DEFAULTS.configFileName));
            } catch (err) {
                const message = err instanceof Error ? err.message : String(err);
                throw new Error(
                    `The service runs as "${config.user}" and must read its configuration: ${message}. ` +
                    `Move it to ${CONFIG_DEFAULTS.systemConfigHome} or pass --config with a readable directory.`,
                );
            }
        }

        console.log(`Installing ${config.systemService ? "system" : "user"} services...`);
        const files = installServices(config, { toolConfigDir: configDir });
        for (const file of files) {
            console.log(`Unit file created: ${file}`);
        }
        console.log();
        console.log(getSystemdInstructions(config));
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`Error: ${message}`);
        process.exit(1);
    }
}
