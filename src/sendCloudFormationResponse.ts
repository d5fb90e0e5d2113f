import * as awslambda from "aws-lambda";
import * as https from "https";
import log = require("loglevel");

/**
 * Report the outcome of a custom resource event to the CloudFormation stack
 * waiting on it.  Rejects when the callback URL does not accept the report.
 */
export async function sendCloudFormationResponse(evt: awslambda.CloudFormationCustomResourceEvent, ctx: awslambda.Context, success: boolean, data?: { [key: string]: string }, reason?: string): Promise<void> {
    const body = JSON.stringify(getCloudFormationResponseBody(evt, ctx, success, data, reason));
    const responseUrl = new URL(evt.ResponseURL);

    log.info("reporting", success ? "SUCCESS" : "FAILED", "for", evt.RequestType, evt.LogicalResourceId);

    const statusCode = await new Promise<number | undefined>((resolve, reject) => {
        const request = https.request({
            hostname: responseUrl.hostname,
            path: responseUrl.pathname + responseUrl.search,
            method: "PUT",
            headers: {
                // CloudFormation's presigned URL is signed without a content type.
                "content-type": "",
                "content-length": Buffer.byteLength(body)
            }
        }, response => {
            response.resume();
            response.on("end", () => resolve(response.statusCode));
        });
        request.on("error", reject);
        request.end(body);
    });

    if (statusCode == null || statusCode >= 400) {
        throw new Error(`CloudFormation rejected the ${evt.RequestType} report with status ${statusCode}`);
    }
}

export function getCloudFormationResponseBody(evt: awslambda.CloudFormationCustomResourceEvent, ctx: awslambda.Context, success: boolean, data?: { [key: string]: string }, reason?: string) {
    return {
        StackId: evt.StackId,
        RequestId: evt.RequestId,
        LogicalResourceId: evt.LogicalResourceId,
        PhysicalResourceId: ctx.logStreamName,
        Status: success ? "SUCCESS" : "FAILED",
        Reason: reason || `See details in CloudWatch Log: ${ctx.logStreamName}`,
        Data: data
    };
}
