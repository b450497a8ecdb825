import { Logger } from "./logger";
import { ScriptUploader } from "./s3/script-uploader";
import { UploadRequest } from "./upload-request";

/**
 * Runs the upload, or the rollback, for each region in turn. A failure stops
 * only its own region. Returns the number of regions that failed.
 */
export const processRegions = async (
    uploader: ScriptUploader,
    regions: Iterable<string>,
    request: UploadRequest,
    logger: Logger
): Promise<number> => {
    let failed = 0;
    for (const region of regions) {
        try {
            if (request.rollback) {
                const result = await uploader.rollback(region, request.versionId);
                logger.info(`Rollback in <${region}> to version <${result.versionId}> - restored <${result.restored}>`);
            } else {
                const result = await uploader.upload(region);
                logger.info(`Upload in <${region}> - ${result}`);
            }
        } catch (err) {
            failed++;
            logger.error(`Processing of <${region}> failed - ${err instanceof Error ? err.message : String(err)}`);
        }
    }
    return failed;
};
