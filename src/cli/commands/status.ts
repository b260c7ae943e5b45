import { loadConfig, getConfigHome } from "../../config/loader.js";
import { SyncthingClient, apiBaseUrl } from "../../syncthing/client.js";
import { readApiKey, configXmlPath } from "../../syncthing/credential.js";

interface StatusOptions {
    config?: string;
}

export async function statusCommand(options: StatusOptions = {}): Promise<void> {
    try {
        const configDir = options.config ?? getConfigHome();

        console.log("=== syncthing-init Status ===\n");
        console.log(`Config dir: ${configDir}`);

        const config = loadConfig(configDir);
        console.log(`API: ${apiBaseUrl(config.guiAddress)}`);
        console.log(`Syncthing config: ${configXmlPath(config.configDir)}`);
        console.log(`Override devices: ${config.overrideDevices ? "yes" : "no"}`);
        console.log(`Override folders: ${config.overrideFolders ? "yes" : "no"}`);
        console.log();

        const { devices, folders } = config.settings;
        console.log(`Devices (${devices.size}):`);
        for (const [name, device] of devices) {
            console.log(`  ${name}: ${device.id}`);
        }
        console.log(`Folders (${folders.size}):`);
        for (const [name, folder] of folders) {
            const state = folder.enable ? "" : " (disabled)";
            console.log(`  ${name}: ${folder.path} [${folder.id}]${state}`);
        }
        console.log();

        const key = readApiKey(config.configDir);
        if (!key.ok) {
            console.log(`API key: unavailable (${key.reason})`);
            return;
        }
        console.log("API key: available");

        const client = new SyncthingClient({
            guiAddress: config.guiAddress,
            apiKey: key.apiKey,
            retries: 1,
            retryDelayMs: 0,
            verifyTls: config.verifyTls,
        });
        try {
            console.log(`Daemon: ${(await client.ping()) ? "reachable" : "not reachable"}`);
        } finally {
            await client.close();
        }
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`Error: ${message}`);
        process.exit(1);
    }
}
