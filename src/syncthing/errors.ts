/**
 * The API key never became readable within the configured wait.
 */
export class CredentialTimeoutError extends Error {
    constructor(
        message: string,
        public readonly configXmlPath: string,
        public readonly waitedMs: number,
    ) {
        super(message);
        this.name = "CredentialTimeoutError";
    }
}

/**
 * A control API call failed for good: retries ran out, or the daemon
 * answered with an error that retrying cannot fix.
 */
export class TransportError extends Error {
    constructor(
        message: string,
        public readonly attempts: number,
        public readonly status?: number,
    ) {
        super(message);
        this.name = "TransportError";
    }
}

/**
 * The config was submitted but querying or triggering the restart failed.
 * The daemon keeps running with the new config and the old process state.
 */
export class RestartTriggerError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "RestartTriggerError";
    }
}
