import {
    BucketLocationConstraint,
    CreateBucketCommand,
    GetObjectCommand,
    HeadBucketCommand,
    HeadObjectCommand,
    ListObjectVersionsCommand,
    PutBucketVersioningCommand,
    PutObjectCommand,
    S3Client,
    S3ServiceException,
    waitUntilBucketExists,
} from "@aws-sdk/client-s3";
import constants from "../constants";
import { ConfigurationError, ProviderError } from "../errors";
import { AwsCredentials } from "../sts/sts-utils";
import { BucketInfo, ListVersionsInput, Lookup, ObjectInfo, ObjectVersion, ScriptStorage } from "./storage";

const NOT_FOUND_CODES = ["NotFound", "NoSuchKey", "NoSuchBucket", "NoSuchVersion"];
const BUCKET_WAIT_SECONDS = 60;

export const getClient = (region: string, credentials?: AwsCredentials): S3Client => {
    const client = new S3Client({
        region,
        credentials,
        followRegionRedirects: true,
    });
    return client;
};

export const isNotFound = (err: unknown): boolean => {
    if (!(err instanceof S3ServiceException)) return false;
    return NOT_FOUND_CODES.includes(err.name) || err.$metadata.httpStatusCode === 404;
};

export const toProviderError = (msg: string, err: unknown): ProviderError => {
    if (err instanceof ProviderError) return err;
    if (err instanceof S3ServiceException) {
        return new ProviderError(`${msg} - ${err.name}: ${err.message}`, err.name, err.$metadata.httpStatusCode, err);
    }
    if (err instanceof Error) {
        return new ProviderError(`${msg} - ${err.message}`, err.name, undefined, err);
    }
    return new ProviderError(msg, "Unknown", undefined, err);
};

const lookup = async <T>(msg: string, fn: () => Promise<T>): Promise<Lookup<T>> => {
    try {
        const value = await fn();
        return { status: "found", value };
    } catch (err) {
        if (isNotFound(err)) return { status: "not-found" };
        return { status: "error", error: toProviderError(msg, err) };
    }
};

const toLocationConstraint = (region: string): BucketLocationConstraint => {
    const constraint = Object.values(BucketLocationConstraint).find((c) => c === region);
    if (!constraint) throw new ConfigurationError(`Region <${region}> is not a valid bucket location`);
    return constraint;
};

/**
 * ScriptStorage backed by an S3 client bound to one region.
 */
export class AwsScriptStorage implements ScriptStorage {
    readonly client: S3Client;

    constructor(client: S3Client) {
        this.client = client;
    }

    async headBucket(bucket: string): Promise<Lookup<BucketInfo>> {
        return lookup(`Unable to check bucket <${bucket}>`, async (): Promise<BucketInfo> => {
            await this.client.send(new HeadBucketCommand({ Bucket: bucket }));
            return { name: bucket };
        });
    }

    async headObject(bucket: string, key: string): Promise<Lookup<ObjectInfo>> {
        return lookup(`Unable to check object s3://${bucket}/${key}`, async (): Promise<ObjectInfo> => {
            const response = await this.client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
            return {
                key,
                versionId: response.VersionId,
            };
        });
    }

    async createBucket(bucket: string, locationConstraint?: string): Promise<void> {
        const cmd = new CreateBucketCommand({
            Bucket: bucket,
            CreateBucketConfiguration: locationConstraint
                ? { LocationConstraint: toLocationConstraint(locationConstraint) }
                : undefined,
        });
        try {
            await this.client.send(cmd);
            await waitUntilBucketExists({ client: this.client, maxWaitTime: BUCKET_WAIT_SECONDS }, { Bucket: bucket });
        } catch (err) {
            throw toProviderError(`Unable to create bucket <${bucket}>`, err);
        }
    }

    async enableVersioning(bucket: string): Promise<void> {
        const cmd = new PutBucketVersioningCommand({
            Bucket: bucket,
            VersioningConfiguration: { Status: "Enabled" },
        });
        try {
            await this.client.send(cmd);
        } catch (err) {
            throw toProviderError(`Unable to enable versioning on bucket <${bucket}>`, err);
        }
    }

    async putObject(bucket: string, key: string, body: Uint8Array): Promise<string | undefined> {
        const cmd = new PutObjectCommand({
            Bucket: bucket,
            Key: key,
            Body: body,
            ACL: constants.S3.OBJECT_ACL,
        });
        try {
            const response = await this.client.send(cmd);
            return response.VersionId;
        } catch (err) {
            throw toProviderError(`Couldn't upload to bucket s3://${bucket}/${key}`, err);
        }
    }

    async listObjectVersions(input: ListVersionsInput): Promise<ObjectVersion[]> {
        const cmd = new ListObjectVersionsCommand({
            Bucket: input.bucket,
            Prefix: input.prefix,
            MaxKeys: input.maxKeys,
        });
        try {
            const response = await this.client.send(cmd);
            return (response.Versions || [])
                .filter((v) => v.Key === input.prefix && v.VersionId)
                .map((v): ObjectVersion => {
                    return {
                        versionId: v.VersionId || "",
                        lastModified: v.LastModified,
                    };
                });
        } catch (err) {
            throw toProviderError(`Unable to list versions of s3://${input.bucket}/${input.prefix}`, err);
        }
    }

    async getObjectVersion(bucket: string, key: string, versionId: string): Promise<Lookup<Uint8Array>> {
        return lookup(`Unable to get object s3://${bucket}/${key}#${versionId}`, async (): Promise<Uint8Array> => {
            const response = await this.client.send(
                new GetObjectCommand({ Bucket: bucket, Key: key, VersionId: versionId })
            );
            if (!response.Body) return new Uint8Array();
            return response.Body.transformToByteArray();
        });
    }
}
