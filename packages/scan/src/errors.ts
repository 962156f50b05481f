export class ScanError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Invalid configuration or request. Always escapes to the caller. */
export class ConfigError extends ScanError {
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
        this.issues = issues;
    }
}

/**
 * The audio source could not be read.
 *
 * `fatal` errors (file missing, unreadable or undecodable) abort a scan;
 * non-fatal ones only cost the chunk being loaded.
 */
export class AudioLoadError extends ScanError {
    readonly filePath: string;
    readonly fatal: boolean;

    constructor(filePath: string, message: string, options: { fatal?: boolean; cause?: unknown } = {}) {
        super(`${message} (${filePath})`, { cause: options.cause });
        this.filePath = filePath;
        this.fatal = options.fatal ?? true;
    }
}

/** The vocal separation model failed on one chunk. */
export class SeparationError extends ScanError {}

/** A collaborator observed the cancellation predicate mid-call. */
export class CancelledError extends ScanError {
    constructor(message = "cancelled") {
        super(message);
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
