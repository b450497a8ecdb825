import commandLineArgs from "command-line-args";
import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../src/errors";
import { cmdOpts, parseUploadRequest, usage } from "../src/upload-request";

const parse = (...argv: string[]) => parseUploadRequest(commandLineArgs(cmdOpts, { argv }));

describe("parseUploadRequest", () => {
    it("applies the defaults", () => {
        const request = parse("--partition", "commercial", "--regions", "us-east-1,us-west-2", "--script", "foo.sh");

        expect(request).toEqual({
            scriptPath: "foo.sh",
            keyPath: "scripts",
            bucket: undefined,
            partition: "commercial",
            regions: "us-east-1,us-west-2",
            unsupportedRegions: [],
            credentials: [],
            dryRun: false,
            override: false,
            rollback: false,
            versionId: undefined,
            createIfNoBucket: false,
        });
    });

    it("reads every flag", () => {
        const request = parse(
            "--partition",
            "china",
            "--regions",
            "all",
            "--script",
            "scripts/bar.sh",
            "--bucket",
            "my-scripts",
            "--dryrun",
            "--override",
            "--rollback",
            "--versionid",
            "abc123",
            "--createifnobucket",
            "--unsupportedregions",
            "cn-northwest-1, cn-south-1",
            "--credential",
            "cn-north-1,https://sts.cn-north-1.amazonaws.com.cn,arn:aws-cn:iam::000000000000:role/uploader,test-external-id"
        );

        expect(request).toMatchObject({
            scriptPath: "scripts/bar.sh",
            bucket: "my-scripts",
            partition: "china",
            regions: "all",
            unsupportedRegions: ["cn-northwest-1", "cn-south-1"],
            dryRun: true,
            override: true,
            rollback: true,
            versionId: "abc123",
            createIfNoBucket: true,
        });
        expect(request.credentials).toEqual([
            {
                region: "cn-north-1",
                endpoint: "https://sts.cn-north-1.amazonaws.com.cn",
                roleArn: "arn:aws-cn:iam::000000000000:role/uploader",
                externalId: "test-external-id",
            },
        ]);
    });

    it("accepts repeated credentials", () => {
        const request = parse(
            "--partition",
            "commercial",
            "--regions",
            "all",
            "--script",
            "foo.sh",
            "--credential",
            "eu-south-1,https://sts.eu-south-1.amazonaws.com,arn:aws:iam::000000000000:role/a,ext-a",
            "--credential",
            "ap-east-1,https://sts.ap-east-1.amazonaws.com,arn:aws:iam::000000000000:role/b,ext-b"
        );

        expect(request.credentials.map((c) => c.region)).toEqual(["eu-south-1", "ap-east-1"]);
    });

    it("requires partition, regions and script", () => {
        expect(() => parse("--regions", "all", "--script", "foo.sh")).toThrow("Must specify --partition");
        expect(() => parse("--partition", "commercial", "--script", "foo.sh")).toThrow("Must specify --regions");
        expect(() => parse("--partition", "commercial", "--regions", "all")).toThrow("Must specify --script");
    });

    it("rejects an unknown partition", () => {
        expect(() => parse("--partition", "moon", "--regions", "all", "--script", "foo.sh")).toThrow(
            ConfigurationError
        );
    });

    it("rejects a version id without rollback", () => {
        expect(() =>
            parse("--partition", "commercial", "--regions", "all", "--script", "foo.sh", "--versionid", "abc123")
        ).toThrow("--versionid can only be used with --rollback");
    });
});

describe("usage", () => {
    it("lists the options under the tool's header", () => {
        const text = usage();

        expect(text).toContain("Upload scripts to S3");
        expect(text).toContain("--partition");
        expect(text).toContain("--createifnobucket");
        expect(text).toContain("Unsupported regions, comma separated");
    });
});
