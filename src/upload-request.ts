import commandLineArgs from "command-line-args";
import commandLineUsage from "command-line-usage";
import constants from "./constants";
import { ConfigurationError } from "./errors";
import { Partition, PARTITIONS, parsePartition, splitList } from "./partition";
import { parseCredentialSpec, StsCredentialSpec } from "./sts/sts-utils";

export interface UploadRequest {
    readonly scriptPath: string;
    readonly keyPath: string;
    readonly bucket: string | undefined;
    readonly partition: Partition;
    readonly regions: string;
    readonly unsupportedRegions: readonly string[];
    readonly credentials: readonly StsCredentialSpec[];
    readonly dryRun: boolean;
    readonly override: boolean;
    readonly rollback: boolean;
    readonly versionId: string | undefined;
    readonly createIfNoBucket: boolean;
}

const USAGE_HEADER = "Upload scripts to S3";

export const cmdOpts: commandLineUsage.OptionDefinition[] = [
    {
        name: "help",
        type: Boolean,
        description: "Shows this help",
    },
    {
        name: "partition",
        type: String,
        alias: "p",
        description: `Partition to upload into (one of ${PARTITIONS.join(", ")}) - required`,
    },
    {
        name: "regions",
        type: String,
        alias: "r",
        description: `Regions to upload to - "all" or a comma separated list of regions - required`,
    },
    {
        name: "credential",
        type: String,
        multiple: true,
        description:
            "STS credential endpoint, in the format <region>,<endpoint>,<ARN>,<externalId>. Could be specified multiple times",
    },
    {
        name: "script",
        type: String,
        alias: "s",
        description: "Script to upload - required",
    },
    {
        name: "bucket",
        type: String,
        alias: "b",
        description: `Buckets to upload to, defaults to [region]${constants.S3.BUCKET_SUFFIX}, comma separated list`,
    },
    {
        name: "dryrun",
        type: Boolean,
        defaultValue: false,
        description: "Doesn't push anything to S3, just outputs",
    },
    {
        name: "override",
        type: Boolean,
        defaultValue: false,
        description: "If set will over-write existing AWS object",
    },
    {
        name: "rollback",
        type: Boolean,
        defaultValue: false,
        description: "Rolls back to previous version",
    },
    {
        name: "versionid",
        type: String,
        description: "(Optional) Version Id if rolling back",
    },
    {
        name: "createifnobucket",
        type: Boolean,
        defaultValue: false,
        description: "Create S3 bucket if it does not exist",
    },
    {
        name: "unsupportedregions",
        type: String,
        defaultValue: "",
        description: "Unsupported regions, comma separated",
    },
];

const optionalString = (options: commandLineArgs.CommandLineOptions, name: string): string | undefined => {
    const value: unknown = options[name];
    return typeof value === "string" && value.length ? value : undefined;
};

const requiredString = (options: commandLineArgs.CommandLineOptions, name: string): string => {
    const value = optionalString(options, name);
    if (!value) throw new ConfigurationError(`Must specify --${name}`);
    return value;
};

const stringList = (options: commandLineArgs.CommandLineOptions, name: string): string[] => {
    const value: unknown = options[name];
    if (!Array.isArray(value)) return [];
    return value.filter((v): v is string => typeof v === "string");
};

export const parseUploadRequest = (options: commandLineArgs.CommandLineOptions): UploadRequest => {
    const partition = parsePartition(requiredString(options, "partition"));
    const regions = requiredString(options, "regions");
    const scriptPath = requiredString(options, "script");
    const versionId = optionalString(options, "versionid");
    const rollback = options["rollback"] === true;
    if (versionId && !rollback) {
        throw new ConfigurationError("--versionid can only be used with --rollback");
    }

    return {
        scriptPath,
        keyPath: constants.S3.KEY_PATH,
        bucket: optionalString(options, "bucket"),
        partition,
        regions,
        unsupportedRegions: splitList(optionalString(options, "unsupportedregions") || ""),
        credentials: stringList(options, "credential").map(parseCredentialSpec),
        dryRun: options["dryrun"] === true,
        override: options["override"] === true,
        rollback,
        versionId,
        createIfNoBucket: options["createifnobucket"] === true,
    };
};

export const usage = (): string => {
    return commandLineUsage([
        {
            header: USAGE_HEADER,
            content: `Uploads a script to scripts/<name> in a bucket per region, or rolls it back to its previous version.`,
        },
        {
            header: "Options",
            optionList: cmdOpts,
        },
    ]);
};

export const cliErrorAndExit = (msg: string): never => {
    console.log(`ERROR: ${msg}. Use --help for options.`);
    return process.exit(1);
};

export const cliCheckHelp = (options: commandLineArgs.CommandLineOptions) => {
    if (options.help) {
        console.log(usage());
        process.exit(0);
    }
};
