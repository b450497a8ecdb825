import { describe, expect, it, vi } from "vitest";
import { ConfigurationError } from "../src/errors";
import { getHomeRegion, parsePartition, resolveRegions, splitList } from "../src/partition";

describe("getHomeRegion", () => {
    it("maps each partition to its main region", () => {
        expect(getHomeRegion("commercial")).toBe("us-east-1");
        expect(getHomeRegion("govcloud")).toBe("us-gov-west-1");
        expect(getHomeRegion("china")).toBe("cn-north-1");
    });

    it("rejects an unknown partition", () => {
        expect(() => getHomeRegion("moon")).toThrow(ConfigurationError);
        expect(() => parsePartition("toString")).toThrow(
            "Unsupported partition <toString> - must be one of commercial, govcloud, china"
        );
    });
});

describe("splitList", () => {
    it("trims entries and drops empty ones", () => {
        expect(splitList(" us-east-1, ,eu-west-1,")).toEqual(["us-east-1", "eu-west-1"]);
        expect(splitList("")).toEqual([]);
    });
});

describe("resolveRegions", () => {
    it("takes an explicit list verbatim", async () => {
        const listRegions = vi.fn(async () => ["us-east-1"]);

        const regions = await resolveRegions("us-east-1,us-west-2,us-east-1", ["us-west-2"], listRegions);

        expect([...regions]).toEqual(["us-east-1", "us-west-2"]);
        expect(listRegions).not.toHaveBeenCalled();
    });

    it("lists every region and removes the unsupported ones for all", async () => {
        const listRegions = vi.fn(async () => ["us-east-1", "us-west-2", "ap-east-1", "eu-west-1"]);

        const regions = await resolveRegions("all", ["ap-east-1", "me-south-1"], listRegions);

        expect([...regions]).toEqual(["us-east-1", "us-west-2", "eu-west-1"]);
        expect(listRegions).toHaveBeenCalledTimes(1);
    });
});
