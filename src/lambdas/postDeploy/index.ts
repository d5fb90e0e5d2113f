import * as awslambda from "aws-lambda";
import {sendCloudFormationResponse} from "../../sendCloudFormationResponse";
import {createHasOneProductDiscountRequirementRule} from "../rest/createHasOneProductDiscountRequirementRule";
import {handlePluginLifecycleEvent} from "./handlePluginLifecycleEvent";
import {applySchema} from "./applySchema";
import log = require("loglevel");

// Wrapping console.log instead of binding (default behaviour for loglevel)
// Otherwise all log calls are prefixed with the requestId from the first
// request the lambda received (AWS modifies log calls, loglevel binds to the
// version of console.log that exists when it is initialized).
// See https://github.com/pimterry/loglevel/blob/master/lib/loglevel.js
// tslint:disable-next-line:no-console
log.methodFactory = () => (...args) => console.log(...args);

log.setLevel(log.levels.DEBUG);

/**
 * Handles a CloudFormationEvent and installs or uninstalls the discount rule.
 */
export async function handler(evt: awslambda.CloudFormationCustomResourceEvent, ctx: awslambda.Context): Promise<void> {
    try {
        const {rule} = createHasOneProductDiscountRequirementRule();
        await handlePluginLifecycleEvent(evt, rule, () => applySchema(ctx));
        return sendCloudFormationResponse(evt, ctx, true, {});
    } catch (err) {
        log.error("error handling CloudFormation event", err);
        return sendCloudFormationResponse(evt, ctx, false, undefined, err instanceof Error ? err.message : String(err));
    }
}
