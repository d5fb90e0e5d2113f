export interface DiscountRequirement {
    id: number;
    discountId: number;
    ruleSystemName: string;
}

export interface DbDiscountRequirement {
    id: number;
    discountId: number;
    discountRequirementRuleSystemName: string;
}

export namespace DbDiscountRequirement {
    export function toDiscountRequirement(r: DbDiscountRequirement): DiscountRequirement {
        return {
            id: r.id,
            discountId: r.discountId,
            ruleSystemName: r.discountRequirementRuleSystemName
        };
    }
}

export namespace DiscountRequirement {
    export function toDbDiscountRequirement(r: Omit<DiscountRequirement, "id">): Omit<DbDiscountRequirement, "id"> {
        return {
            discountId: r.discountId,
            discountRequirementRuleSystemName: r.ruleSystemName
        };
    }
}
