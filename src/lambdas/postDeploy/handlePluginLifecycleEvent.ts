import * as awslambda from "aws-lambda";
import {DiscountRequirementRule} from "../rest/discountRules/DiscountRequirementRule";
import log = require("loglevel");

/**
 * Install the rule when the stack is created or updated and uninstall it when
 * the stack is deleted.  The database is prepared before installing.
 */
export async function handlePluginLifecycleEvent(evt: awslambda.CloudFormationCustomResourceEvent, rule: DiscountRequirementRule, prepareDatabase: () => Promise<void>): Promise<void> {
    switch (evt.RequestType) {
        case "Create":
        case "Update":
            log.info(`${evt.RequestType}: installing ${rule.systemName}`);
            await prepareDatabase();
            await rule.install();
            return;
        case "Delete":
            log.info(`Delete: uninstalling ${rule.systemName}`);
            await rule.uninstall();
            return;
    }
}
