import {LRUCache} from "lru-cache";
import {RestrictedProductParseResult} from "../../../../model/RestrictedProduct";
import {parseRestrictedProduct, splitRestrictedProducts} from "./restrictedProducts";

const defaultCacheSize = 100;
let cache: LRUCache<string, RestrictedProductParseResult[]> | null = null;

/**
 * Parse a restricted product list, reusing the result for a list seen recently.
 * The parse results are shared so they must not be modified.
 */
export function getRestrictedProductsFromCache(restrictedProductIds: string): readonly RestrictedProductParseResult[] {
    if (!cache) {
        cache = new LRUCache<string, RestrictedProductParseResult[]>({
            max: getCacheSize(process.env["RESTRICTED_PRODUCTS_CACHE_SIZE"])
        });
    }

    let restrictedProducts = cache.get(restrictedProductIds);
    if (restrictedProducts === undefined) {
        restrictedProducts = splitRestrictedProducts(restrictedProductIds).map(parseRestrictedProduct);
        cache.set(restrictedProductIds, restrictedProducts);
    }
    return restrictedProducts;
}

export function getCacheSize(configuredSize: string | undefined): number {
    const size = parseInt(configuredSize ?? "", 10);
    return size >= 1 ? size : defaultCacheSize;
}
