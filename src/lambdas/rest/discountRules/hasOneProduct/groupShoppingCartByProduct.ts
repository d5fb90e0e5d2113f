import {ShoppingCartItem, ShoppingCartLine, ShoppingCartType} from "../../../../model/ShoppingCart";

export interface GroupShoppingCartOptions {
    /**
     * When carts are shared between stores items from every store count.
     */
    cartsSharedBetweenStores?: boolean;
}

/**
 * Group the shopping cart (not the wishlist) items of a store by product.
 * The same product can appear on several items with distinct attributes so
 * the quantities are summed.  Lines are in order of first appearance.
 */
export function groupShoppingCartByProduct(items: ShoppingCartItem[], storeId: number, options: GroupShoppingCartOptions = {}): ShoppingCartLine[] {
    const lines = new Map<number, ShoppingCartLine>();
    for (const item of items) {
        if (item.shoppingCartType !== ShoppingCartType.ShoppingCart) {
            continue;
        }
        if (!options.cartsSharedBetweenStores && item.storeId !== storeId) {
            continue;
        }

        const line = lines.get(item.productId);
        if (line) {
            line.totalQuantity += item.quantity;
        } else {
            lines.set(item.productId, {productId: item.productId, totalQuantity: item.quantity});
        }
    }
    return Array.from(lines.values());
}
