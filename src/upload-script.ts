#!/usr/bin/env node
import { config as dotenv_config } from "dotenv";
dotenv_config();
import parseCmd from "command-line-args";
import { stat } from "fs/promises";
import { getEc2Client, listRegions } from "./ec2/ec2-utils";
import { ConfigurationError } from "./errors";
import { createConsoleLogger, Logger } from "./logger";
import { getHomeRegion, resolveRegions } from "./partition";
import { AwsScriptStorage, getClient } from "./s3/s3-utils";
import { ScriptUploader } from "./s3/script-uploader";
import { assumeRole, createCredentialResolver, getStsClient, readStaticCredentials } from "./sts/sts-utils";
import { cliCheckHelp, cliErrorAndExit, cmdOpts, parseUploadRequest, UploadRequest } from "./upload-request";
import { processRegions } from "./upload-regions";

const options = parseCmd(cmdOpts);
cliCheckHelp(options);

let request: UploadRequest;
try {
    request = parseUploadRequest(options);
} catch (err) {
    request = cliErrorAndExit(err instanceof Error ? err.message : String(err));
}

/**
 * Sets up credentials, regions and the uploader, then processes the regions.
 * Returns the number of regions that failed.
 */
const main = async (request: UploadRequest, logger: Logger): Promise<number> => {
    try {
        // ensure we have file
        await stat(request.scriptPath);
    } catch (err) {
        throw new ConfigurationError(`There is no file at ${request.scriptPath}`);
    }

    const homeRegion = getHomeRegion(request.partition);
    const staticCredentials = readStaticCredentials(process.env);
    const credentialsFor = createCredentialResolver(request.credentials, staticCredentials, (spec) =>
        assumeRole(getStsClient(spec, staticCredentials), spec)
    );

    const regions = await resolveRegions(request.regions, request.unsupportedRegions, async () =>
        listRegions(getEc2Client(homeRegion, await credentialsFor(homeRegion)))
    );
    logger.info(`Processing <${regions.size}> region(s) in partition <${request.partition}>`);

    const uploader = new ScriptUploader(
        request,
        homeRegion,
        async (region) => new AwsScriptStorage(getClient(region, await credentialsFor(region))),
        logger
    );

    return processRegions(uploader, regions, request, logger);
};

const logger = createConsoleLogger("upload-script");
main(request, logger)
    .then((failed) => {
        if (failed) {
            logger.error(`<${failed}> region(s) failed`);
            process.exitCode = 1;
        }
    })
    .catch((err) => {
        logger.error(err instanceof Error ? err.message : String(err), err);
        process.exitCode = 1;
    });
