import constants from "./constants";
import { ConfigurationError } from "./errors";

export type Partition = keyof typeof constants.PARTITIONS;

export const PARTITIONS = Object.keys(constants.PARTITIONS);

export const isPartition = (value: string): value is Partition => {
    return Object.prototype.hasOwnProperty.call(constants.PARTITIONS, value);
};

export const parsePartition = (value: string): Partition => {
    if (!isPartition(value)) {
        throw new ConfigurationError(`Unsupported partition <${value}> - must be one of ${PARTITIONS.join(", ")}`);
    }
    return value;
};

/**
 * Returns the main region of the partition, used for account wide calls such
 * as listing regions.
 */
export const getHomeRegion = (partition: string): string => {
    return constants.PARTITIONS[parsePartition(partition)];
};

export const splitList = (value: string): string[] => {
    return value
        .split(",")
        .map((s) => s.trim())
        .filter((s) => s.length > 0);
};

/**
 * Resolves the regions to process. "all" asks the provider for every region
 * and removes the unsupported ones, anything else is taken as a comma
 * separated list as-is.
 */
export const resolveRegions = async (
    selector: string,
    unsupported: readonly string[],
    listRegions: () => Promise<string[]>
): Promise<Set<string>> => {
    if (selector.trim() !== "all") {
        return new Set(splitList(selector));
    }
    const skip = new Set(unsupported);
    const regions = await listRegions();
    return new Set(regions.filter((r) => !skip.has(r)));
};
