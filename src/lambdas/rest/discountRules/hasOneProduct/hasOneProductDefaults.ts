export namespace HasOneProductDefaults {

    export const systemName = "DiscountRequirement.HasOneProduct";

    export const controllerName = "DiscountRulesHasOneProduct";

    export const configureActionName = "Configure";

    /**
     * Key of the setting holding the restricted product list of a discount requirement.
     */
    export function getSettingsKey(discountRequirementId: number): string {
        return `DiscountRequirement.HasOneProduct-${discountRequirementId}`;
    }

    /**
     * The strings of the configuration screen.
     */
    export const localeResources: { [resourceName: string]: string } = {
        "Plugins.DiscountRules.HasOneProduct.Fields.Products": "Restricted products [and quantity range]",
        "Plugins.DiscountRules.HasOneProduct.Fields.Products.Hint": "The comma-separated list of product identifiers (e.g. 77, 123, 156). You can find a product ID on its details page. You can also specify the comma-separated list of product identifiers with quantities ({Product ID}:{Quantity}. for example, 77:1, 123:2, 156:3). And you can also specify the comma-separated list of product identifiers with quantity range ({Product ID}:{Min quantity}-{Max quantity}. for example, 77:1-3, 123:2-5, 156:3-8).",
        "Plugins.DiscountRules.HasOneProduct.Fields.Products.AddNew": "Add product",
        "Plugins.DiscountRules.HasOneProduct.Fields.Products.Choose": "Choose"
    };
}
