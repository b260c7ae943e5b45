import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import type { SyncthingInitConfig } from "../config/types.js";

export const DAEMON_UNIT = "syncthing.service";
export const INIT_UNIT = "syncthing-init.service";
export const RESUME_UNIT = "syncthing-resume.service";

const SYSTEM_UNIT_DIR = "/etc/systemd/system";

const HARDENING = [
    "MemoryDenyWriteExecute=true",
    "NoNewPrivileges=true",
    "PrivateDevices=true",
    "PrivateMounts=true",
    "PrivateTmp=true",
    "PrivateUsers=true",
    "ProtectControlGroups=true",
    "ProtectHostname=true",
    "ProtectKernelModules=true",
    "ProtectKernelTunables=true",
    "RestrictNamespaces=true",
    "RestrictRealtime=true",
    "RestrictSUIDSGID=true",
    "CapabilityBoundingSet=~CAP_SYS_PTRACE",
    "CapabilityBoundingSet=~CAP_SYS_ADMIN",
    "CapabilityBoundingSet=~CAP_SETGID",
    "CapabilityBoundingSet=~CAP_SETUID",
    "CapabilityBoundingSet=~CAP_SETPCAP",
    "CapabilityBoundingSet=~CAP_SYS_TIME",
    "CapabilityBoundingSet=~CAP_KILL",
];

export interface UnitOptions {
    /** Directory holding .syncthing-init.yml, passed to the CLI */
    toolConfigDir: string;
    nodePath?: string;
    /** Path of the built CLI entry point */
    cliPath?: string;
}

/**
 * Quote one word of a unit command line. `%` is a specifier prefix in unit files.
 */
export function quoteUnitArg(arg: string): string {
    const escaped = arg.replace(/%/g, "%%");
    if (escaped !== "" && !/[\s"'\\]/.test(escaped)) {
        return escaped;
    }
    return `"${escaped.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

function commandLine(args: string[]): string {
    return args.map(quoteUnitArg).join(" ");
}

function cliCommand(options: UnitOptions, subcommand: string): string {
    const node = options.nodePath ?? process.execPath;
    const cli = options.cliPath ?? path.resolve(__dirname, "..", "cli", "index.js");
    return commandLine([node, cli, subcommand, "--config", options.toolConfigDir]);
}

function wantedBy(config: SyncthingInitConfig): string {
    return config.systemService ? "multi-user.target" : "default.target";
}

/**
 * Generate the unit that runs the Syncthing daemon itself.
 */
export function generateDaemonUnit(config: SyncthingInitConfig, options: UnitOptions): string {
    const service: string[] = [
        "Type=simple",
        "Environment=STNORESTART=yes",
        "Environment=STNOUPGRADE=yes",
    ];
    if (config.allProxy !== null) {
        service.push(`Environment=${quoteUnitArg(`all_proxy=${config.allProxy}`)}`);
    }
    if (config.systemService) {
        service.push(`User=${config.user}`, `Group=${config.group}`);
    }
    if (config.cert !== null || config.key !== null) {
        // "+" runs the step with full privileges so it can hand the keys to the daemon's user
        service.push(`ExecStartPre=+${cliCommand(options, "install-keys")}`);
    }
    service.push(
        `ExecStart=${commandLine([
            config.syncthingBinary,
            "-no-browser",
            `-gui-address=${config.guiAddress}`,
            `-home=${config.configDir}`,
            ...config.extraFlags,
        ])}`,
        "Restart=on-failure",
        "SuccessExitStatus=3 4",
        "RestartForceExitStatus=3 4",
    );
    if (config.systemService) {
        service.push(...HARDENING);
    }

    return [
        "[Unit]",
        "Description=Syncthing service",
        "After=network.target",
        "",
        "[Service]",
        ...service,
        "",
        "[Install]",
        `WantedBy=${wantedBy(config)}`,
        "",
    ].join("\n");
}

/**
 * Generate the one-shot unit that reconciles the daemon's config once it is up.
 */
export function generateInitUnit(config: SyncthingInitConfig, options: UnitOptions): string {
    const service = ["Type=oneshot", "RemainAfterExit=true"];
    if (config.systemService) {
        service.push(`User=${config.user}`, `Group=${config.group}`);
    }
    service.push(`ExecStart=${cliCommand(options, "apply")}`);

    return [
        "[Unit]",
        "Description=Syncthing configuration updater",
        `Requisite=${DAEMON_UNIT}`,
        `After=${DAEMON_UNIT}`,
        "",
        "[Service]",
        ...service,
        "",
        "[Install]",
        `WantedBy=${wantedBy(config)}`,
        "",
    ].join("\n");
}

/**
 * Generate the unit that restarts the daemon after a suspend. System services
 * only: user managers never reach suspend.target.
 */
export function generateResumeUnit(): string {
    return [
        "[Unit]",
        "Description=Restart Syncthing after resume",
        "After=suspend.target",
        "",
        "[Service]",
        "Type=oneshot",
        `ExecStart=systemctl try-restart ${DAEMON_UNIT}`,
        "",
        "[Install]",
        "WantedBy=suspend.target",
        "",
    ].join("\n");
}

function unitsFor(config: SyncthingInitConfig): string[] {
    return config.systemService ? [DAEMON_UNIT, INIT_UNIT, RESUME_UNIT] : [DAEMON_UNIT, INIT_UNIT];
}

/**
 * Check that a file can be read by any user: every directory above it
 * searchable by others, the file itself readable by others. System units run
 * `apply` as the service user, which cannot see into a 0700 home directory.
 */
export function assertWorldReadable(file: string): void {
    const resolved = path.resolve(file);
    const stat = fs.statSync(resolved);
    if ((stat.mode & 0o004) === 0) {
        throw new Error(`${resolved} is not readable by other users`);
    }
    for (let dir = path.dirname(resolved); ; dir = path.dirname(dir)) {
        if ((fs.statSync(dir).mode & 0o001) === 0) {
            throw new Error(`${dir} is not searchable by other users, so ${resolved} cannot be read`);
        }
        if (dir === path.dirname(dir)) break;
    }
}

/**
 * Where units go: system-wide, or the invoking user's systemd directory.
 */
export function defaultUnitDir(config: SyncthingInitConfig): string {
    return config.systemService
        ? SYSTEM_UNIT_DIR
        : path.join(os.homedir(), ".config", "systemd", "user");
}

/**
 * Write the daemon and updater units, plus the resume unit for system services.
 * @returns Paths of the installed unit files
 */
export function installServices(
    config: SyncthingInitConfig,
    options: UnitOptions,
    unitDir: string = defaultUnitDir(config),
): string[] {
    fs.mkdirSync(unitDir, { recursive: true });

    const contents: Record<string, string> = {
        [DAEMON_UNIT]: generateDaemonUnit(config, options),
        [INIT_UNIT]: generateInitUnit(config, options),
        [RESUME_UNIT]: generateResumeUnit(),
    };
    return unitsFor(config).map((unit) => {
        const file = path.join(unitDir, unit);
        fs.writeFileSync(file, contents[unit], "utf-8");
        return file;
    });
}

/**
 * Remove the installed units.
 * @returns Paths of the unit files that existed and were removed
 */
export function uninstallServices(config: SyncthingInitConfig, unitDir: string = defaultUnitDir(config)): string[] {
    const removed: string[] = [];
    for (const unit of [DAEMON_UNIT, INIT_UNIT, RESUME_UNIT]) {
        const file = path.join(unitDir, unit);
        if (fs.existsSync(file)) {
            fs.unlinkSync(file);
            removed.push(file);
        }
    }
    return removed;
}

/**
 * Get instructions for enabling the installed units.
 */
export function getSystemdInstructions(config: SyncthingInitConfig): string {
    const ctl = config.systemService ? "systemctl" : "systemctl --user";
    const enable = config.systemService
        ? `${ctl} enable --now ${DAEMON_UNIT} ${INIT_UNIT}
  ${ctl} enable ${RESUME_UNIT}`
        : `${ctl} enable --now ${DAEMON_UNIT} ${INIT_UNIT}`;
    return `To enable the services:
  ${ctl} daemon-reload
  ${enable}

To re-apply the configuration later:
  ${ctl} restart ${INIT_UNIT}

To check service status:
  ${ctl} status ${DAEMON_UNIT} ${INIT_UNIT}`;
}
