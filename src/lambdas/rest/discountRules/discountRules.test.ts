import * as cassava from "cassava";
import * as chai from "chai";
import * as testUtils from "../../../utils/testUtils";
import {cartItem, createTestRule, TestRule} from "../../../utils/testUtils";
import {installRestRoutes} from "../installRestRoutes";
import {ShoppingCartType} from "../../../model/ShoppingCart";

describe("/v1/discountRules/hasOneProduct", () => {

    let router: cassava.Router;
    let testRule: TestRule;

    beforeEach(() => {
        testRule = createTestRule();
        router = new cassava.Router();
        installRestRoutes(router, testRule);
    });

    it("answers the health check", async () => {
        const resp = await testUtils.testRequest<{}>(router, "/v1/healthCheck", "GET");
        chai.assert.equal(resp.statusCode, 200);
        chai.assert.deepEqual(resp.body, {});
    });

    describe("POST /v1/discountRules/hasOneProduct/checkRequirement", () => {
        const url = "/v1/discountRules/hasOneProduct/checkRequirement";

        beforeEach(() => {
            testRule.settingStore.settings.set("DiscountRequirement.HasOneProduct-7", "77, 123:2, 156:3-8");
        });

        it("is valid when the cart has a restricted product", async () => {
            const resp = await testUtils.testRequest<{ isValid: boolean }>(router, url, "POST", {
                discountRequirementId: 7,
                store: {id: 1},
                customer: {
                    id: 3,
                    shoppingCartItems: [cartItem(156, 2), cartItem(156, 1)]
                }
            });
            chai.assert.equal(resp.statusCode, 200, `body=${resp.bodyRaw}`);
            chai.assert.deepEqual(resp.body, {isValid: true});
        });

        it("is invalid when the cart only has the product on the wishlist", async () => {
            const resp = await testUtils.testRequest<{ isValid: boolean }>(router, url, "POST", {
                discountRequirementId: 7,
                store: {id: 1},
                customer: {
                    id: 3,
                    shoppingCartItems: [cartItem(77, 1, {shoppingCartType: ShoppingCartType.Wishlist})]
                }
            });
            chai.assert.equal(resp.statusCode, 200, `body=${resp.bodyRaw}`);
            chai.assert.deepEqual(resp.body, {isValid: false});
        });

        it("is invalid without a customer", async () => {
            const resp = await testUtils.testRequest<{ isValid: boolean }>(router, url, "POST", {
                discountRequirementId: 7,
                store: {id: 1},
                customer: null
            });
            chai.assert.equal(resp.statusCode, 200, `body=${resp.bodyRaw}`);
            chai.assert.deepEqual(resp.body, {isValid: false});
        });

        it("is valid for a discount requirement without restricted products", async () => {
            const resp = await testUtils.testRequest<{ isValid: boolean }>(router, url, "POST", {
                discountRequirementId: 8,
                store: {id: 1}
            });
            chai.assert.equal(resp.statusCode, 200, `body=${resp.bodyRaw}`);
            chai.assert.deepEqual(resp.body, {isValid: true});
        });

        it("422s without a body", async () => {
            const resp = await testUtils.testRequest<{ messageCode: string }>(router, url, "POST");
            chai.assert.equal(resp.statusCode, 422, `body=${resp.bodyRaw}`);
            chai.assert.equal(resp.body.messageCode, "InvalidBody");
        });

        it("422s without a store", async () => {
            const resp = await testUtils.testRequest<unknown>(router, url, "POST", {
                discountRequirementId: 7
            });
            chai.assert.equal(resp.statusCode, 422, `body=${resp.bodyRaw}`);
        });

        it("422s on an unknown shopping cart type", async () => {
            const resp = await testUtils.testRequest<unknown>(router, url, "POST", {
                discountRequirementId: 7,
                store: {id: 1},
                customer: {
                    id: 3,
                    shoppingCartItems: [{productId: 77, quantity: 1, storeId: 1, shoppingCartType: "savedForLater"}]
                }
            });
            chai.assert.equal(resp.statusCode, 422, `body=${resp.bodyRaw}`);
        });
    });

    describe("GET /v1/discountRules/hasOneProduct/configurationUrl", () => {
        it("returns the configure url", async () => {
            const resp = await testUtils.testRequest<{ url: string }>(router, "/v1/discountRules/hasOneProduct/configurationUrl?discountId=1&discountRequirementId=2", "GET");
            chai.assert.equal(resp.statusCode, 200, `body=${resp.bodyRaw}`);
            chai.assert.deepEqual(resp.body, {url: "Admin/DiscountRulesHasOneProduct/Configure?discountId=1&discountRequirementId=2"});
        });

        it("returns the configure url for a new discount requirement", async () => {
            const resp = await testUtils.testRequest<{ url: string }>(router, "/v1/discountRules/hasOneProduct/configurationUrl?discountId=1", "GET");
            chai.assert.equal(resp.statusCode, 200, `body=${resp.bodyRaw}`);
            chai.assert.deepEqual(resp.body, {url: "Admin/DiscountRulesHasOneProduct/Configure?discountId=1"});
        });

        it("422s without a discountId", async () => {
            const resp = await testUtils.testRequest<{ messageCode: string }>(router, "/v1/discountRules/hasOneProduct/configurationUrl", "GET");
            chai.assert.equal(resp.statusCode, 422, `body=${resp.bodyRaw}`);
            chai.assert.equal(resp.body.messageCode, "MissingQueryParameter");
        });

        it("422s on a discountId that isn't a number", async () => {
            const resp = await testUtils.testRequest<{ messageCode: string }>(router, "/v1/discountRules/hasOneProduct/configurationUrl?discountId=abc", "GET");
            chai.assert.equal(resp.statusCode, 422, `body=${resp.bodyRaw}`);
            chai.assert.equal(resp.body.messageCode, "InvalidQueryParameter");
        });
    });

    describe("/Admin/DiscountRulesHasOneProduct/Configure", () => {
        const url = "/Admin/DiscountRulesHasOneProduct/Configure";

        it("creates a discount requirement and reads it back", async () => {
            const createResp = await testUtils.testRequest<{ result: boolean, discountRequirementId: number }>(router, url, "POST", {
                discountId: 4,
                restrictedProductIds: "77, 123:2"
            });
            chai.assert.equal(createResp.statusCode, 200, `body=${createResp.bodyRaw}`);
            chai.assert.deepEqual(createResp.body, {result: true, discountRequirementId: 1});

            const getResp = await testUtils.testRequest<unknown>(router, `${url}?discountId=4&discountRequirementId=1`, "GET");
            chai.assert.equal(getResp.statusCode, 200, `body=${getResp.bodyRaw}`);
            chai.assert.deepEqual(getResp.body, {
                discountId: 4,
                discountRequirementId: 1,
                restrictedProductIds: "77, 123:2"
            });
        });

        it("updates an existing discount requirement", async () => {
            await testUtils.testRequest<unknown>(router, url, "POST", {
                discountId: 4,
                restrictedProductIds: "77"
            });
            const updateResp = await testUtils.testRequest<{ result: boolean, discountRequirementId: number }>(router, url, "POST", {
                discountId: 4,
                discountRequirementId: 1,
                restrictedProductIds: "156:3-8"
            });
            chai.assert.equal(updateResp.statusCode, 200, `body=${updateResp.bodyRaw}`);
            chai.assert.deepEqual(updateResp.body, {result: true, discountRequirementId: 1});
            chai.assert.equal(testRule.settingStore.settings.get("DiscountRequirement.HasOneProduct-1"), "156:3-8");
        });

        it("returns an empty configuration for a new discount requirement", async () => {
            const resp = await testUtils.testRequest<unknown>(router, `${url}?discountId=4`, "GET");
            chai.assert.equal(resp.statusCode, 200, `body=${resp.bodyRaw}`);
            chai.assert.deepEqual(resp.body, {
                discountId: 4,
                discountRequirementId: null,
                restrictedProductIds: ""
            });
        });

        it("404s on an unknown discount requirement", async () => {
            const resp = await testUtils.testRequest<{ messageCode: string }>(router, `${url}?discountId=4&discountRequirementId=99`, "GET");
            chai.assert.equal(resp.statusCode, 404, `body=${resp.bodyRaw}`);
            chai.assert.equal(resp.body.messageCode, "DiscountRequirementNotFound");
        });

        it("422s without restrictedProductIds", async () => {
            const resp = await testUtils.testRequest<unknown>(router, url, "POST", {
                discountId: 4
            });
            chai.assert.equal(resp.statusCode, 422, `body=${resp.bodyRaw}`);
        });
    });
});
