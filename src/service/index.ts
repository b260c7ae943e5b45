export { assertSystemdPlatform } from "./platform.js";
export {
    installServices,
    uninstallServices,
    getSystemdInstructions,
    generateDaemonUnit,
    generateInitUnit,
    generateResumeUnit,
    assertWorldReadable,
    defaultUnitDir,
    quoteUnitArg,
    DAEMON_UNIT,
    INIT_UNIT,
    RESUME_UNIT,
} from "./linux.js";
export type { UnitOptions } from "./linux.js";
export { installKeys } from "./keys.js";
export type { InstallKeysOptions } from "./keys.js";
