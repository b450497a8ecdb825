import { AssumeRoleCommand, AssumeRoleCommandOutput, STSClient } from "@aws-sdk/client-sts";
import constants from "../constants";
import { ConfigurationError, ProviderError } from "../errors";

export interface AwsCredentials {
    accessKeyId: string;
    secretAccessKey: string;
    sessionToken?: string;
}

/**
 * A role to assume for uploads into one region, given on the command line as
 * `<region>,<endpoint>,<ARN>,<externalId>`.
 */
export interface StsCredentialSpec {
    region: string;
    endpoint: string;
    roleArn: string;
    externalId: string;
}

export const parseCredentialSpec = (value: string): StsCredentialSpec => {
    const parts = value.split(",").map((p) => p.trim());
    if (parts.length !== 4 || parts.some((p) => !p.length)) {
        throw new ConfigurationError(
            `Invalid credential <${value}> - expected <region>,<endpoint>,<ARN>,<externalId>`
        );
    }
    const [region, endpoint, roleArn, externalId] = parts;
    return { region, endpoint, roleArn, externalId };
};

export const readStaticCredentials = (env: NodeJS.ProcessEnv): AwsCredentials | undefined => {
    const accessKeyId = env.AWS_ACCESS_KEY_ID;
    const secretAccessKey = env.AWS_SECRET_ACCESS_KEY;
    if (!accessKeyId && !secretAccessKey) return undefined;
    if (!accessKeyId || !secretAccessKey) {
        throw new ConfigurationError("Both AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY must be set");
    }
    const sessionToken = env.AWS_SESSION_TOKEN;
    return sessionToken ? { accessKeyId, secretAccessKey, sessionToken } : { accessKeyId, secretAccessKey };
};

export const getStsClient = (spec: StsCredentialSpec, credentials?: AwsCredentials): STSClient => {
    const client = new STSClient({
        region: spec.region,
        endpoint: spec.endpoint,
        credentials,
    });
    return client;
};

export const assumeRole = async (client: STSClient, spec: StsCredentialSpec): Promise<AwsCredentials> => {
    const cmd = new AssumeRoleCommand({
        RoleArn: spec.roleArn,
        ExternalId: spec.externalId,
        RoleSessionName: constants.STS.ROLE_SESSION_NAME,
    });
    let response: AssumeRoleCommandOutput;
    try {
        response = await client.send(cmd);
    } catch (err) {
        const code = err instanceof Error ? err.name : "Unknown";
        throw new ProviderError(`Unable to assume role <${spec.roleArn}> in <${spec.region}>`, code, undefined, err);
    }
    const creds = response.Credentials;
    if (!creds || !creds.AccessKeyId || !creds.SecretAccessKey) {
        throw new ProviderError(`No credentials returned assuming role <${spec.roleArn}>`, "NoCredentials");
    }
    return {
        accessKeyId: creds.AccessKeyId,
        secretAccessKey: creds.SecretAccessKey,
        sessionToken: creds.SessionToken,
    };
};

export type CredentialResolver = (region: string) => Promise<AwsCredentials | undefined>;

/**
 * Picks the credentials for a region: an assumed role when a credential spec
 * names the region, the static credentials otherwise. Roles are assumed once.
 */
export const createCredentialResolver = (
    specs: readonly StsCredentialSpec[],
    fallback: AwsCredentials | undefined,
    assume: (spec: StsCredentialSpec) => Promise<AwsCredentials>
): CredentialResolver => {
    const assumed = new Map<string, AwsCredentials>();
    return async (region: string) => {
        const spec = specs.find((s) => s.region === region);
        if (!spec) return fallback;
        let creds = assumed.get(region);
        if (!creds) {
            creds = await assume(spec);
            assumed.set(region, creds);
        }
        return creds;
    };
};
