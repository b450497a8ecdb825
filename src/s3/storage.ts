import { ProviderError } from "../errors";

/**
 * Outcome of a read against the object store. A missing bucket or object is
 * an expected answer and not an error.
 */
export type Lookup<T> =
    | { status: "found"; value: T }
    | { status: "not-found" }
    | { status: "error"; error: ProviderError };

export interface BucketInfo {
    name: string;
}

export interface ObjectInfo {
    key: string;
    versionId: string | undefined;
}

export interface ObjectVersion {
    versionId: string;
    lastModified: Date | undefined;
}

export interface ListVersionsInput {
    bucket: string;
    prefix: string;
    maxKeys: number;
}

/**
 * The object store operations the uploader needs for a single region.
 * Mutating calls throw a ProviderError on failure.
 */
export interface ScriptStorage {
    headBucket(bucket: string): Promise<Lookup<BucketInfo>>;
    headObject(bucket: string, key: string): Promise<Lookup<ObjectInfo>>;
    createBucket(bucket: string, locationConstraint?: string): Promise<void>;
    enableVersioning(bucket: string): Promise<void>;
    putObject(bucket: string, key: string, body: Uint8Array): Promise<string | undefined>;
    listObjectVersions(input: ListVersionsInput): Promise<ObjectVersion[]>;
    getObjectVersion(bucket: string, key: string, versionId: string): Promise<Lookup<Uint8Array>>;
}

export type StorageFactory = (region: string) => Promise<ScriptStorage>;
