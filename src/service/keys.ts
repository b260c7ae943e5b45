import * as fs from "node:fs";
import * as path from "node:path";
import * as child_process from "node:child_process";
import type { SyncthingInitConfig } from "../config/types.js";

export interface InstallKeysOptions {
    /**
     * Hand the copied files to the configured user and group.
     * Defaults to true for system services when running as root.
     */
    chown?: boolean;
}

interface Owner {
    uid: number;
    gid: number;
}

function lookupId(args: string[]): number {
    const output = child_process.execFileSync(args[0], args.slice(1), { encoding: "utf-8", timeout: 5000 });
    const id = parseInt(output.trim(), 10);
    if (isNaN(id)) {
        throw new Error(`Unexpected output from ${args.join(" ")}: ${output.trim()}`);
    }
    return id;
}

function resolveOwner(user: string, group: string): Owner {
    const uid = lookupId(["id", "-u", user]);
    // getent prints "name:x:gid:members"
    const entry = child_process
        .execFileSync("getent", ["group", group], { encoding: "utf-8", timeout: 5000 })
        .trim();
    const gid = parseInt(entry.split(":")[2] ?? "", 10);
    if (isNaN(gid)) {
        throw new Error(`Cannot resolve group "${group}"`);
    }
    return { uid, gid };
}

/**
 * Copy the declared cert and key into the daemon's config directory,
 * readable by their owner only.
 * @returns Paths written, empty when neither is declared
 */
export function installKeys(config: SyncthingInitConfig, options: InstallKeysOptions = {}): string[] {
    const sources: Array<[string | null, string]> = [
        [config.cert, "cert.pem"],
        [config.key, "key.pem"],
    ];
    const pending = sources.filter((entry): entry is [string, string] => entry[0] !== null);
    if (pending.length === 0) {
        return [];
    }

    const chown = options.chown ?? (config.systemService && process.getuid?.() === 0);
    const owner = chown ? resolveOwner(config.user, config.group) : null;

    fs.mkdirSync(config.configDir, { recursive: true, mode: 0o700 });
    fs.chmodSync(config.configDir, 0o700);
    if (owner) {
        fs.chownSync(config.configDir, owner.uid, owner.gid);
    }

    const written: string[] = [];
    for (const [source, name] of pending) {
        if (!fs.existsSync(source)) {
            throw new Error(`Key file not found: ${source}`);
        }
        const dest = path.join(config.configDir, name);
        // A previous copy is read-only; remove it so copyFile can replace it
        fs.rmSync(dest, { force: true });
        fs.copyFileSync(source, dest);
        fs.chmodSync(dest, 0o400);
        if (owner) {
            fs.chownSync(dest, owner.uid, owner.gid);
        }
        written.push(dest);
    }
    return written;
}
