import {RestrictedProduct, RestrictedProductParseResult} from "../../../../model/RestrictedProduct";
import {ShoppingCartLine} from "../../../../model/ShoppingCart";

const int32Min = -2147483648;
const int32Max = 2147483647;

/**
 * Split the stored restricted product list into trimmed, non-empty tokens.
 * eg: "77, 123:2,, 156:3-8" => ["77", "123:2", "156:3-8"]
 */
export function splitRestrictedProducts(restrictedProductIds: string): string[] {
    return restrictedProductIds
        .split(",")
        .map(token => token.trim())
        .filter(token => token.length > 0);
}

/**
 * Parse a single token of the restricted product list.
 *
 * A malformed plain product id is skipped by the caller.  A malformed quantity
 * or quantity range fails the whole evaluation.
 */
export function parseRestrictedProduct(token: string): RestrictedProductParseResult {
    if (!token.includes(":")) {
        const productId = parseInteger(token);
        if (productId == null) {
            return {parsed: false, token, abortsEvaluation: false};
        }
        return {parsed: true, restrictedProduct: {type: "any", productId}};
    }

    const [productIdPart, quantityPart] = token.split(":");
    const productId = parseInteger(productIdPart);

    if (quantityPart.includes("-")) {
        const [minQuantityPart, maxQuantityPart] = quantityPart.split("-");
        const minQuantity = parseInteger(minQuantityPart);
        const maxQuantity = parseInteger(maxQuantityPart);
        if (productId == null || minQuantity == null || maxQuantity == null) {
            return {parsed: false, token, abortsEvaluation: true};
        }
        return {parsed: true, restrictedProduct: {type: "quantityRange", productId, minQuantity, maxQuantity}};
    }

    const quantity = parseInteger(quantityPart);
    if (productId == null || quantity == null) {
        return {parsed: false, token, abortsEvaluation: true};
    }
    return {parsed: true, restrictedProduct: {type: "exactQuantity", productId, quantity}};
}

export function restrictedProductMatchesCartLine(restrictedProduct: RestrictedProduct, line: ShoppingCartLine): boolean {
    if (line.productId !== restrictedProduct.productId) {
        return false;
    }
    switch (restrictedProduct.type) {
        case "any":
            return true;
        case "exactQuantity":
            return line.totalQuantity === restrictedProduct.quantity;
        case "quantityRange":
            return restrictedProduct.minQuantity <= line.totalQuantity && line.totalQuantity <= restrictedProduct.maxQuantity;
    }
}

/**
 * Parse a signed 32-bit decimal integer, allowing surrounding whitespace.
 * Returns null for anything else (including undefined, when a split came up short).
 */
export function parseInteger(s: string | undefined): number | null {
    if (s == null || !/^\s*[+-]?\d+\s*$/.test(s)) {
        return null;
    }
    const value = parseInt(s, 10);
    if (value < int32Min || value > int32Max) {
        return null;
    }
    return value;
}
