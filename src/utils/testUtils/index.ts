import * as cassava from "cassava";
import * as chai from "chai";
import {ParsedProxyResponse} from "./ParsedProxyResponse";
import {HasOneProductDiscountRequirementRule} from "../../lambdas/rest/discountRules/hasOneProduct/HasOneProductDiscountRequirementRule";
import {GroupShoppingCartOptions} from "../../lambdas/rest/discountRules/hasOneProduct/groupShoppingCartByProduct";
import {ConventionalRoutingHelper} from "../../services/routing/ConventionalRoutingHelper";
import {MockSettingStore} from "../../services/settings/MockSettingStore";
import {MockDiscountRequirementStore} from "../../services/discountRequirements/MockDiscountRequirementStore";
import {MockLocaleResourceStore} from "../../services/localization/MockLocaleResourceStore";
import {ShoppingCartItem, ShoppingCartType} from "../../model/ShoppingCart";

export interface TestRule {
    rule: HasOneProductDiscountRequirementRule;
    routingHelper: ConventionalRoutingHelper;
    settingStore: MockSettingStore;
    discountRequirementStore: MockDiscountRequirementStore;
    localeResourceStore: MockLocaleResourceStore;
}

/**
 * A rule backed by in-memory stores.
 */
export function createTestRule(cartOptions?: GroupShoppingCartOptions): TestRule {
    const routingHelper = new ConventionalRoutingHelper();
    const settingStore = new MockSettingStore();
    const discountRequirementStore = new MockDiscountRequirementStore();
    const localeResourceStore = new MockLocaleResourceStore();
    const rule = new HasOneProductDiscountRequirementRule({
        settingStore,
        discountRequirementStore,
        localeResourceStore,
        routingHelper,
        cartOptions
    });
    return {rule, routingHelper, settingStore, discountRequirementStore, localeResourceStore};
}

export function cartItem(productId: number, quantity: number, options: Partial<ShoppingCartItem> = {}): ShoppingCartItem {
    return {
        productId,
        quantity,
        storeId: 1,
        shoppingCartType: ShoppingCartType.ShoppingCart,
        ...options
    };
}

/**
 * Make a request to the router and parse the JSON response.
 */
export async function testRequest<T>(router: cassava.Router, url: string, method: string, body?: unknown): Promise<ParsedProxyResponse<T>> {
    const resp = await cassava.testing.testRouter(router, cassava.testing.createTestProxyEvent(url, method, {
        body: body !== undefined ? JSON.stringify(body) : undefined
    }));

    chai.assert.equal(resp.headers["Content-Type"], "application/json");

    return {
        statusCode: resp.statusCode,
        headers: resp.headers,
        body: resp.body && JSON.parse(resp.body) || undefined,
        bodyRaw: resp.body
    };
}

/**
 * Await the promise and return the error it rejected with.  Fails if it
 * resolves or rejects with something other than an `errorType`.
 */
export async function getRejection<T>(promise: Promise<unknown>, errorType: new (...args: never[]) => T): Promise<T> {
    try {
        await promise;
    } catch (err) {
        if (err instanceof errorType) {
            return err;
        }
        return chai.assert.fail(`expected a ${errorType.name} but got ${err}`);
    }
    return chai.assert.fail("expected the promise to reject");
}
