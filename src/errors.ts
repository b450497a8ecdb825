export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigurationError";
    }
}

export type MissingResource = "bucket" | "object" | "version";

export class NotFoundError extends Error {
    readonly resource: MissingResource;
    readonly bucket: string;
    readonly key: string | undefined;

    constructor(message: string, resource: MissingResource, bucket: string, key?: string) {
        super(message);
        this.name = "NotFoundError";
        this.resource = resource;
        this.bucket = bucket;
        this.key = key;
    }
}

export class UploadConflictError extends Error {
    readonly bucket: string;
    readonly key: string;

    constructor(bucket: string, key: string) {
        super(`Object s3://${bucket}/${key} already exists and override is disabled`);
        this.name = "UploadConflictError";
        this.bucket = bucket;
        this.key = key;
    }
}

/**
 * Any failure reported by AWS that is not an expected "not found" answer.
 * The SDK error is kept as the cause.
 */
export class ProviderError extends Error {
    readonly code: string;
    readonly statusCode: number | undefined;

    constructor(message: string, code: string, statusCode?: number, cause?: unknown) {
        super(message, { cause });
        this.name = "ProviderError";
        this.code = code;
        this.statusCode = statusCode;
    }
}

export class InsufficientVersionsError extends Error {
    readonly bucket: string;
    readonly key: string;
    readonly found: number;

    constructor(bucket: string, key: string, found: number) {
        super(`Not enough versions found for object s3://${bucket}/${key} - found <${found}>`);
        this.name = "InsufficientVersionsError";
        this.bucket = bucket;
        this.key = key;
        this.found = found;
    }
}
