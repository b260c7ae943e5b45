import * as os from "node:os";

/**
 * Units are systemd units; refuse anywhere but Linux.
 */
export function assertSystemdPlatform(platform: NodeJS.Platform = os.platform()): void {
    if (platform !== "linux") {
        throw new Error(`Unsupported platform: ${platform} (service units need systemd on Linux)`);
    }
}
