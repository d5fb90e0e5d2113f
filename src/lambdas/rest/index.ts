import * as cassava from "cassava";
import * as logPrefix from "loglevel-plugin-prefix";
import {installRestRoutes} from "./installRestRoutes";
import {createHasOneProductDiscountRequirementRule} from "./createHasOneProductDiscountRequirementRule";
import log = require("loglevel");

// Prefix log messages with the level.
logPrefix.reg(log);
logPrefix.apply(log, {
    format: (level) => {
        return `[${level}]`;
    },
});

// Set the log level when running in Lambda.
log.setLevel(log.levels.INFO);

const router = new cassava.Router();

router.route(new cassava.routes.LoggingRoute({
    logFunction: log.info
}));

installRestRoutes(router, createHasOneProductDiscountRequirementRule());

export const handler = router.getLambdaHandler();
