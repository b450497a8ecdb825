import { DescribeRegionsCommand, DescribeRegionsCommandOutput, EC2Client } from "@aws-sdk/client-ec2";
import { ProviderError } from "../errors";
import { AwsCredentials } from "../sts/sts-utils";

export const getEc2Client = (region: string, credentials?: AwsCredentials): EC2Client => {
    const client = new EC2Client({
        region,
        credentials,
    });
    return client;
};

/**
 * Lists the regions enabled for the account in the partition of the client's
 * region.
 */
export const listRegions = async (client: EC2Client): Promise<string[]> => {
    const cmd = new DescribeRegionsCommand({});
    let response: DescribeRegionsCommandOutput;
    try {
        response = await client.send(cmd);
    } catch (err) {
        const code = err instanceof Error ? err.name : "Unknown";
        throw new ProviderError("Unable to list AWS regions", code, undefined, err);
    }
    return (response.Regions || []).map((r) => r.RegionName).filter((name): name is string => !!name);
};
