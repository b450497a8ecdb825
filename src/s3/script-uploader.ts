import { readFile } from "fs/promises";
import { basename } from "path";
import constants from "../constants";
import { InsufficientVersionsError, NotFoundError, ProviderError, UploadConflictError } from "../errors";
import { Logger } from "../logger";
import { UploadRequest } from "../upload-request";
import { ScriptStorage, StorageFactory } from "./storage";

export type UploadResult = "uploaded" | "skipped";

export interface RollbackResult {
    versionId: string;
    restored: boolean;
}

/**
 * Uploads a script to a bucket per region, or restores a previous version of
 * it. Regions are handled independently; every method works on one region.
 */
export class ScriptUploader {
    readonly request: UploadRequest;
    readonly homeRegion: string;
    _storageFor: StorageFactory;
    _storages = new Map<string, ScriptStorage>();
    _logger: Logger;

    constructor(request: UploadRequest, homeRegion: string, storageFor: StorageFactory, logger: Logger) {
        this.request = request;
        this.homeRegion = homeRegion;
        this._storageFor = storageFor;
        this._logger = logger;
    }

    objectKey(): string {
        return `${this.request.keyPath}/${basename(this.request.scriptPath)}`;
    }

    async _storage(region: string): Promise<ScriptStorage> {
        let storage = this._storages.get(region);
        if (!storage) {
            storage = await this._storageFor(region);
            this._storages.set(region, storage);
        }
        return storage;
    }

    /**
     * Returns the bucket to use in the region, creating it when missing and
     * creation is enabled. A missing bucket is otherwise left for the upload
     * to report.
     */
    async resolveBucket(customName: string | undefined, region: string): Promise<string> {
        const bucket = customName || `${region}${constants.S3.BUCKET_SUFFIX}`;
        const storage = await this._storage(region);
        const head = await storage.headBucket(bucket);
        if (head.status === "error") throw head.error;
        if (head.status === "not-found" && this.request.createIfNoBucket) {
            await this.createBucket(bucket, region);
        }
        return bucket;
    }

    async createBucket(bucket: string, region: string): Promise<void> {
        if (this.request.dryRun) {
            this._logger.warn(`Not creating bucket s3://${bucket} in <${region}>, dryrun is true`);
            return;
        }
        this._logger.info(`Creating bucket s3://${bucket} in <${region}>`);
        const storage = await this._storage(region);

        // the home region takes no location constraint
        const locationConstraint = region === this.homeRegion ? undefined : region;
        await storage.createBucket(bucket, locationConstraint);
        await storage.enableVersioning(bucket);
        this._logger.info(
            `Created ${bucket} bucket. Bucket versioning is enabled, please enable bucket logging manually.`
        );
    }

    async upload(region: string): Promise<UploadResult> {
        const key = this.objectKey();
        const bucket = await this.resolveBucket(this.request.bucket, region);
        const storage = await this._storage(region);

        const head = await storage.headObject(bucket, key);
        if (head.status === "error") throw head.error;
        const exists = head.status === "found";
        if (head.status === "found") {
            const version = head.value.versionId || "-";
            this._logger.warn(`Warning: ${key} already exist in bucket ${bucket} at version <${version}>`);
        }

        const { dryRun, override, scriptPath } = this.request;
        if (dryRun) {
            this._logger.warn(
                `Not uploading ${scriptPath} to bucket ${bucket}, object exists ${exists}, override is ${override}, dryrun is ${dryRun}`
            );
            return "skipped";
        }
        if (exists && !override) {
            throw new UploadConflictError(bucket, key);
        }

        const data = await readFile(scriptPath);
        await this._putObject(storage, bucket, key, data, scriptPath);
        return "uploaded";
    }

    async rollback(region: string, versionId?: string): Promise<RollbackResult> {
        const key = this.objectKey();
        const bucket = await this.resolveBucket(this.request.bucket, region);
        const storage = await this._storage(region);

        let target = versionId;
        if (!target) {
            this._logger.info(`Getting previous version of s3://${bucket}/${key}`);
            const head = await storage.headObject(bucket, key);
            if (head.status === "error") throw head.error;
            if (head.status === "not-found") {
                throw new NotFoundError(`No such object s3://${bucket}/${key}`, "object", bucket, key);
            }
            const versions = await storage.listObjectVersions({
                bucket,
                prefix: key,
                maxKeys: constants.S3.ROLLBACK_MAX_VERSIONS,
            });
            if (versions.length < 2) {
                throw new InsufficientVersionsError(bucket, key, versions.length);
            }

            // versions are listed newest first
            const previous = versions[1];
            target = previous.versionId;
            const date = previous.lastModified ? previous.lastModified.toISOString() : "-";
            this._logger.info(`Found Version ${target} from ${date}`);
        }

        const location = `s3://${bucket}/${key}#${target}`;
        this._logger.info(`Getting Object ${location}`);
        const object = await storage.getObjectVersion(bucket, key, target);
        if (object.status === "error") throw object.error;
        if (object.status === "not-found") {
            throw new NotFoundError(`No such object ${location}`, "version", bucket, key);
        }

        const data = object.value;
        this._logger.info(`Found Object with <${data.length}> bytes`);
        if (this.request.dryRun) {
            this._logger.warn(`Not restoring ${location} with content \n ${Buffer.from(data).toString("utf8")}`);
            return { versionId: target, restored: false };
        }
        this._logger.info(`Uploading Object ${location}`);
        await this._putObject(storage, bucket, key, data, location);
        return { versionId: target, restored: true };
    }

    async _putObject(storage: ScriptStorage, bucket: string, key: string, data: Uint8Array, source: string) {
        let versionId: string | undefined;
        try {
            versionId = await storage.putObject(bucket, key, data);
        } catch (err) {
            this._logger.error(`Couldn't upload ${source} to bucket s3://${bucket}/${key}`);
            if (err instanceof ProviderError && err.code === "NoSuchBucket") {
                throw new NotFoundError(`Bucket ${bucket} is not present`, "bucket", bucket, key);
            }
            throw err;
        }
        this._logger.info(`Successfully uploaded ${source} to s3://${bucket}/${key} - version <${versionId || "-"}>`);
    }
}
