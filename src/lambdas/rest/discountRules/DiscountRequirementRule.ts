import {
    DiscountRequirementValidationRequest,
    DiscountRequirementValidationResult
} from "../../../model/DiscountRequirementValidation";

/**
 * A pluggable requirement that must pass for a discount to apply.
 */
export interface DiscountRequirementRule {

    readonly systemName: string;

    checkRequirement(request: DiscountRequirementValidationRequest | null | undefined): Promise<DiscountRequirementValidationResult>;

    /**
     * Path of the admin screen that configures this rule, without a leading slash.
     */
    getConfigurationUrl(discountId: number, discountRequirementId?: number | null): string;

    install(): Promise<void>;

    uninstall(): Promise<void>;

}
