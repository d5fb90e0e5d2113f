import * as cassava from "cassava";
import {
    DiscountRequirementValidationRequest,
    DiscountRequirementValidationResult
} from "../../../../model/DiscountRequirementValidation";
import {DiscountRequirement} from "../../../../model/DiscountRequirement";
import {DiscountRequirementRule} from "../DiscountRequirementRule";
import {ArgumentNullError} from "../ArgumentNullError";
import {SettingStore} from "../../../../services/settings/SettingStore";
import {DiscountRequirementStore} from "../../../../services/discountRequirements/DiscountRequirementStore";
import {LocaleResourceStore} from "../../../../services/localization/LocaleResourceStore";
import {RoutingHelper} from "../../../../services/routing/RoutingHelper";
import {MetricsLogger} from "../../../../utils/metricsLogger";
import {HasOneProductDefaults} from "./hasOneProductDefaults";
import {getRestrictedProductsFromCache} from "./getRestrictedProductsFromCache";
import {restrictedProductMatchesCartLine} from "./restrictedProducts";
import {GroupShoppingCartOptions, groupShoppingCartByProduct} from "./groupShoppingCartByProduct";
import log = require("loglevel");

export interface HasOneProductDiscountRequirementRuleParams {
    settingStore: SettingStore;
    discountRequirementStore: DiscountRequirementStore;
    localeResourceStore: LocaleResourceStore;
    routingHelper: RoutingHelper;
    cartOptions?: GroupShoppingCartOptions;
}

export interface HasOneProductConfiguration {
    discountId: number;
    discountRequirementId: number | null;
    restrictedProductIds: string;
}

/**
 * Passes when the customer's cart has at least one of the restricted products.
 *
 * The restricted products are configured per discount requirement as a comma-separated
 * list in one of three forms:
 * 1. product identifiers: `77, 123, 156`
 * 2. product identifiers with quantities, `{Product ID}:{Quantity}`: `77:1, 123:2, 156:3`
 * 3. product identifiers with quantity ranges, `{Product ID}:{Min quantity}-{Max quantity}`: `77:1-3, 123:2-5, 156:3-8`
 */
export class HasOneProductDiscountRequirementRule implements DiscountRequirementRule {

    readonly systemName = HasOneProductDefaults.systemName;

    private readonly settingStore: SettingStore;
    private readonly discountRequirementStore: DiscountRequirementStore;
    private readonly localeResourceStore: LocaleResourceStore;
    private readonly routingHelper: RoutingHelper;
    private readonly cartOptions: GroupShoppingCartOptions;

    constructor(params: HasOneProductDiscountRequirementRuleParams) {
        this.settingStore = params.settingStore;
        this.discountRequirementStore = params.discountRequirementStore;
        this.localeResourceStore = params.localeResourceStore;
        this.routingHelper = params.routingHelper;
        this.cartOptions = params.cartOptions ?? {};
    }

    async checkRequirement(request: DiscountRequirementValidationRequest | null | undefined): Promise<DiscountRequirementValidationResult> {
        if (request == null) {
            throw new ArgumentNullError("request");
        }

        const result = await this.evaluate(request);
        MetricsLogger.discountRequirementCheck(this.systemName, result.isValid);
        return result;
    }

    getConfigurationUrl(discountId: number, discountRequirementId?: number | null): string {
        const url = this.routingHelper.buildActionUrl(HasOneProductDefaults.configureActionName, HasOneProductDefaults.controllerName, {
            discountId,
            discountRequirementId
        });
        return url.replace(/^\//, "");
    }

    async install(): Promise<void> {
        for (const resourceName of Object.keys(HasOneProductDefaults.localeResources)) {
            await this.localeResourceStore.addOrUpdateLocaleResource(resourceName, HasOneProductDefaults.localeResources[resourceName]);
        }
        log.info("installed", this.systemName);
    }

    async uninstall(): Promise<void> {
        const discountRequirements = (await this.discountRequirementStore.getAllDiscountRequirements())
            .filter(discountRequirement => discountRequirement.ruleSystemName === this.systemName);
        for (const discountRequirement of discountRequirements) {
            await this.discountRequirementStore.deleteDiscountRequirement(discountRequirement);
        }
        MetricsLogger.discountRequirementsDeleted(this.systemName, discountRequirements.length);

        for (const resourceName of Object.keys(HasOneProductDefaults.localeResources)) {
            await this.localeResourceStore.deleteLocaleResource(resourceName);
        }
        log.info("uninstalled", this.systemName);
    }

    async getConfiguration(discountId: number, discountRequirementId?: number | null): Promise<HasOneProductConfiguration> {
        if (discountRequirementId == null) {
            return {
                discountId,
                discountRequirementId: null,
                restrictedProductIds: ""
            };
        }

        const discountRequirement = await this.getOwnDiscountRequirement(discountId, discountRequirementId);
        return {
            discountId,
            discountRequirementId: discountRequirement.id,
            restrictedProductIds: await this.settingStore.getSettingByKey(HasOneProductDefaults.getSettingsKey(discountRequirement.id)) ?? ""
        };
    }

    /**
     * Save the restricted product list, creating the discount requirement if no id is given.
     * @returns the id of the discount requirement the list was saved for
     */
    async saveConfiguration(discountId: number, discountRequirementId: number | null | undefined, restrictedProductIds: string): Promise<number> {
        if (discountRequirementId != null) {
            const discountRequirement = await this.getOwnDiscountRequirement(discountId, discountRequirementId);
            await this.settingStore.setSetting(HasOneProductDefaults.getSettingsKey(discountRequirement.id), restrictedProductIds);
            return discountRequirement.id;
        }

        const discountRequirement = await this.discountRequirementStore.insertDiscountRequirement({
            discountId,
            ruleSystemName: this.systemName
        });
        try {
            await this.settingStore.setSetting(HasOneProductDefaults.getSettingsKey(discountRequirement.id), restrictedProductIds);
        } catch (err) {
            // A requirement without a setting restricts nothing.
            log.error("error saving restricted products for new discount requirement", discountRequirement.id, "; deleting it", err);
            await this.discountRequirementStore.deleteDiscountRequirement(discountRequirement);
            throw err;
        }
        log.info("created discount requirement", discountRequirement.id, "for discount", discountId);
        return discountRequirement.id;
    }

    private async evaluate(request: DiscountRequirementValidationRequest): Promise<DiscountRequirementValidationResult> {
        const restrictedProductIds = await this.settingStore.getSettingByKey(HasOneProductDefaults.getSettingsKey(request.discountRequirementId));
        if (restrictedProductIds == null || restrictedProductIds.trim() === "") {
            // Nothing is restricted.
            return DiscountRequirementValidationResult.valid();
        }

        if (!request.customer) {
            return DiscountRequirementValidationResult.invalid();
        }

        const restrictedProducts = getRestrictedProductsFromCache(restrictedProductIds);
        if (restrictedProducts.length === 0) {
            return DiscountRequirementValidationResult.invalid();
        }

        const cart = groupShoppingCartByProduct(request.customer.shoppingCartItems, request.store.id, this.cartOptions);

        for (const restrictedProduct of restrictedProducts) {
            if (!restrictedProduct.parsed) {
                if (restrictedProduct.abortsEvaluation) {
                    log.warn(`discount requirement ${request.discountRequirementId} has malformed restricted product '${restrictedProduct.token}'; failing the requirement`);
                    MetricsLogger.discountRequirementAborted(this.systemName);
                    return DiscountRequirementValidationResult.invalid();
                }
                log.debug(`discount requirement ${request.discountRequirementId} skipping malformed restricted product '${restrictedProduct.token}'`);
                continue;
            }

            if (cart.some(line => restrictedProductMatchesCartLine(restrictedProduct.restrictedProduct, line))) {
                log.debug(`discount requirement ${request.discountRequirementId} matched`, restrictedProduct.restrictedProduct);
                return DiscountRequirementValidationResult.valid();
            }
        }

        return DiscountRequirementValidationResult.invalid();
    }

    private async getOwnDiscountRequirement(discountId: number, discountRequirementId: number): Promise<DiscountRequirement> {
        const discountRequirement = await this.discountRequirementStore.getDiscountRequirementById(discountRequirementId);
        if (!discountRequirement || discountRequirement.discountId !== discountId || discountRequirement.ruleSystemName !== this.systemName) {
            throw new cassava.RestError(cassava.httpStatusCode.clientError.NOT_FOUND, `Could not find discount requirement with id '${discountRequirementId}' for discount '${discountId}'.`, {
                messageCode: "DiscountRequirementNotFound"
            });
        }
        return discountRequirement;
    }
}
