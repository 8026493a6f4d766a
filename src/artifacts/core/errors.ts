/**
 * Error taxonomy for token resolution.
 * Per-artifact failures end up in the manifest, per-token failures in the
 * batch summary; only configuration errors stop a run.
 */

export class ArtifactError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** Network or HTTP failure while fetching one artifact */
export class DownloadError extends ArtifactError {
    constructor(
        public readonly url: string,
        public readonly status?: number,
        reason?: string,
    ) {
        super(
            status !== undefined
                ? `Download failed with HTTP ${status}: ${url}`
                : `Download failed: ${url}${reason ? ` (${reason})` : ''}`,
        );
    }
}

/** A document could not be projected or serialized to JSON */
export class SerializationError extends ArtifactError {}

export class ConfigurationError extends ArtifactError {
    constructor(
        public readonly variable: string,
        detail: string,
    ) {
        super(`Invalid configuration for ${variable}: ${detail}`);
    }
}

/** A request, argument or spreadsheet URL that cannot be used */
export class InvalidInputError extends ArtifactError {}

export class NotFoundError extends ArtifactError {}

export class RateLimitError extends ArtifactError {}

export class UpstreamError extends ArtifactError {
    constructor(
        message: string,
        public readonly status?: number,
    ) {
        super(message);
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
