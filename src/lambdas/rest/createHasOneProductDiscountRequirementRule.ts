import {HasOneProductDiscountRequirementRule} from "./discountRules/hasOneProduct/HasOneProductDiscountRequirementRule";
import {ConventionalRoutingHelper} from "../../services/routing/ConventionalRoutingHelper";
import {KnexSettingStore} from "../../services/settings/KnexSettingStore";
import {KnexDiscountRequirementStore} from "../../services/discountRequirements/KnexDiscountRequirementStore";
import {KnexLocaleResourceStore} from "../../services/localization/KnexLocaleResourceStore";

/**
 * Wire the rule to the database backed stores, configured from env vars.
 */
export function createHasOneProductDiscountRequirementRule(): { rule: HasOneProductDiscountRequirementRule, routingHelper: ConventionalRoutingHelper } {
    const routingHelper = new ConventionalRoutingHelper(process.env["ADMIN_BASE_PATH"] || "/Admin");
    const rule = new HasOneProductDiscountRequirementRule({
        settingStore: new KnexSettingStore(),
        discountRequirementStore: new KnexDiscountRequirementStore(),
        localeResourceStore: new KnexLocaleResourceStore(),
        routingHelper,
        cartOptions: {
            cartsSharedBetweenStores: process.env["CARTS_SHARED_BETWEEN_STORES"] === "true"
        }
    });
    return {rule, routingHelper};
}
