export enum ShoppingCartType {
    ShoppingCart = "shoppingCart",
    Wishlist = "wishlist"
}

export interface ShoppingCartItem {
    productId: number;
    quantity: number;
    storeId: number;
    shoppingCartType: ShoppingCartType;
}

/**
 * All the items of one product in a cart, quantities summed.
 */
export interface ShoppingCartLine {
    productId: number;
    totalQuantity: number;
}
