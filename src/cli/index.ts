#!/usr/bin/env node
import { Command } from "commander";
import { initCommand } from "./commands/init.js";
import { applyCommand } from "./commands/apply.js";
import { planCommand } from "./commands/plan.js";
import { statusCommand } from "./commands/status.js";
import { installKeysCommand } from "./commands/install-keys.js";
import { installServiceCommand } from "./commands/install-service.js";
import { uninstallServiceCommand } from "./commands/uninstall-service.js";

const CONFIG_OPTION = "--config <dir>";
const CONFIG_HELP = "Directory containing .syncthing-init.yml (defaults to ~/.syncthing-init)";

const program = new Command();

program
    .name("syncthing-init")
    .description("Declaratively reconcile a running Syncthing daemon's configuration")
    .version("0.1.0");

program
    .command("init")
    .description("Create a .syncthing-init.yml configuration file")
    .option(CONFIG_OPTION, CONFIG_HELP)
    .action(initCommand);

program
    .command("apply")
    .description("Merge the declared settings into the daemon's config and restart it if required")
    .option(CONFIG_OPTION, CONFIG_HELP)
    .action((options: { config?: string }) => applyCommand(options));

program
    .command("plan")
    .description("Print the config 'apply' would submit, without submitting it")
    .option(CONFIG_OPTION, CONFIG_HELP)
    .action((options: { config?: string }) => planCommand(options));

program
    .command("status")
    .description("Show the declared devices and folders and whether the daemon is reachable")
    .option(CONFIG_OPTION, CONFIG_HELP)
    .action(statusCommand);

program
    .command("install-keys")
    .description("Copy the declared cert and key into the daemon's config directory")
    .option(CONFIG_OPTION, CONFIG_HELP)
    .action(installKeysCommand);

program
    .command("install-service")
    .description("Install systemd units for the daemon and for 'apply'")
    .option(CONFIG_OPTION, CONFIG_HELP)
    .action(installServiceCommand);

program
    .command("uninstall-service")
    .description("Remove the systemd units")
    .option(CONFIG_OPTION, CONFIG_HELP)
    .action(uninstallServiceCommand);

program.parseAsync().catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${message}`);
    process.exit(1);
});
