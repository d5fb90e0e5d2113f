import * as cassava from "cassava";
import {installDiscountRulesRest} from "./discountRules/discountRules";
import {HasOneProductDiscountRequirementRule} from "./discountRules/hasOneProduct/HasOneProductDiscountRequirementRule";
import {ConventionalRoutingHelper} from "../../services/routing/ConventionalRoutingHelper";

export interface RestRouteDependencies {
    rule: HasOneProductDiscountRequirementRule;
    routingHelper: ConventionalRoutingHelper;
}

/**
 * Install all the rest api routes.
 */
export function installRestRoutes(router: cassava.Router, dependencies: RestRouteDependencies): void {
    router.route("/v1/healthCheck")
        .method("GET")
        .handler(async () => ({
            body: {}
        }));

    installDiscountRulesRest(router, dependencies);
}
