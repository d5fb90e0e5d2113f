import {ShoppingCartItem} from "./ShoppingCart";

export interface Customer {
    id: number;
    shoppingCartItems: ShoppingCartItem[];
}

export interface Store {
    id: number;
}

export interface DiscountRequirementValidationRequest {
    discountRequirementId: number;
    customer: Customer | null;
    store: Store;
}

export interface DiscountRequirementValidationResult {
    isValid: boolean;
}

export namespace DiscountRequirementValidationResult {
    export function invalid(): DiscountRequirementValidationResult {
        return {isValid: false};
    }

    export function valid(): DiscountRequirementValidationResult {
        return {isValid: true};
    }
}
