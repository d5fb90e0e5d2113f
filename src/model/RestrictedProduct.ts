/**
 * One entry of a restricted product list.
 *
 * - `any`: the product in any quantity, written `77`
 * - `exactQuantity`: exactly `quantity` units, written `77:2`
 * - `quantityRange`: between `minQuantity` and `maxQuantity` units inclusive, written `77:1-3`
 */
export type RestrictedProduct =
    { type: "any", productId: number }
    | { type: "exactQuantity", productId: number, quantity: number }
    | { type: "quantityRange", productId: number, minQuantity: number, maxQuantity: number };

export type RestrictedProductParseResult =
    { parsed: true, restrictedProduct: RestrictedProduct }
    | { parsed: false, token: string, abortsEvaluation: boolean };
