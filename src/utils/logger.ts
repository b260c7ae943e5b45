import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";

const DEFAULT_LOG_DIR = path.join(os.homedir(), ".syncthing-init", "logs");
const DEFAULT_MAX_LOG_SIZE_MB = 10;
const DEFAULT_MAX_LOG_FILES = 5;
const LOG_BASENAME = "syncthing-init";

export type LogLevel = "INFO" | "WARN" | "ERROR";

export interface LoggerOptions {
    logDir?: string;
    maxLogSizeMB?: number;
    maxLogFiles?: number;
    /** Echo every line to stdout/stderr as well (the journal picks it up under systemd) */
    console?: boolean;
}

export class Logger {
    private logDir: string;
    private logFile: string;
    private maxLogSize: number;
    private maxLogFiles: number;
    private echo: boolean;

    constructor(options: LoggerOptions = {}) {
        this.logDir = options.logDir ?? DEFAULT_LOG_DIR;
        this.maxLogSize = (options.maxLogSizeMB ?? DEFAULT_MAX_LOG_SIZE_MB) * 1024 * 1024;
        this.maxLogFiles = options.maxLogFiles ?? DEFAULT_MAX_LOG_FILES;
        this.echo = options.console ?? false;
        this.logFile = path.join(this.logDir, `${LOG_BASENAME}.log`);
        fs.mkdirSync(this.logDir, { recursive: true });
    }

    /**
     * Get the path to the current log file.
     */
    getLogFilePath(): string {
        return this.logFile;
    }

    info(message: string): void {
        this.write("INFO", message);
    }

    warn(message: string): void {
        this.write("WARN", message);
    }

    error(message: string): void {
        this.write("ERROR", message);
    }

    private write(level: LogLevel, message: string): void {
        const timestamp = new Date().toISOString();
        const line = `[${timestamp}] [${level}] ${message}\n`;

        this.rotateIfNeeded();
        fs.appendFileSync(this.logFile, line, "utf-8");

        if (this.echo) {
            if (level === "INFO") {
                process.stdout.write(`${message}\n`);
            } else {
                process.stderr.write(`${level}: ${message}\n`);
            }
        }
    }

    private rotateIfNeeded(): void {
        try {
            if (!fs.existsSync(this.logFile)) return;

            const stat = fs.statSync(this.logFile);
            if (stat.size < this.maxLogSize) return;

            // Shift numbered logs up by one, dropping the oldest
            for (let i = this.maxLogFiles - 1; i > 0; i--) {
                const from = path.join(this.logDir, `${LOG_BASENAME}.${i}.log`);
                const to = path.join(this.logDir, `${LOG_BASENAME}.${i + 1}.log`);
                if (fs.existsSync(from)) {
                    if (i + 1 >= this.maxLogFiles) {
                        fs.unlinkSync(from);
                    } else {
                        fs.renameSync(from, to);
                    }
                }
            }

            fs.renameSync(this.logFile, path.join(this.logDir, `${LOG_BASENAME}.1.log`));
        } catch {
            // If rotation fails, keep appending to the current log
        }
    }
}

/**
 * The part of a Logger that reconciliation code writes to.
 */
export type LogSink = Pick<Logger, "info" | "warn" | "error">;
