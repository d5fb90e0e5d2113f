import * as chai from "chai";
import {
    parseInteger,
    parseRestrictedProduct,
    restrictedProductMatchesCartLine,
    splitRestrictedProducts
} from "./restrictedProducts";

describe("restrictedProducts", () => {
    describe("splitRestrictedProducts()", () => {
        it("trims tokens and drops empty ones", () => {
            chai.assert.deepEqual(splitRestrictedProducts(" 77, 123:2,, ,156:3-8 ,"), ["77", "123:2", "156:3-8"]);
        });

        it("returns an empty list for separators only", () => {
            chai.assert.deepEqual(splitRestrictedProducts(" , ,"), []);
        });
    });

    describe("parseInteger()", () => {
        it("parses signed integers with surrounding whitespace", () => {
            chai.assert.equal(parseInteger("77"), 77);
            chai.assert.equal(parseInteger(" 12 "), 12);
            chai.assert.equal(parseInteger("+3"), 3);
            chai.assert.equal(parseInteger("-4"), -4);
        });

        it("rejects anything else", () => {
            chai.assert.isNull(parseInteger(""));
            chai.assert.isNull(parseInteger("abc"));
            chai.assert.isNull(parseInteger("1.5"));
            chai.assert.isNull(parseInteger("12abc"));
            chai.assert.isNull(parseInteger("1 2"));
            chai.assert.isNull(parseInteger(undefined));
        });

        it("rejects values outside of 32 bits", () => {
            chai.assert.equal(parseInteger("2147483647"), 2147483647);
            chai.assert.equal(parseInteger("-2147483648"), -2147483648);
            chai.assert.isNull(parseInteger("2147483648"));
            chai.assert.isNull(parseInteger("-2147483649"));
        });
    });

    describe("parseRestrictedProduct()", () => {
        it("parses a product id", () => {
            chai.assert.deepEqual(parseRestrictedProduct("77"), {
                parsed: true,
                restrictedProduct: {type: "any", productId: 77}
            });
        });

        it("parses a product id with a quantity", () => {
            chai.assert.deepEqual(parseRestrictedProduct("123:2"), {
                parsed: true,
                restrictedProduct: {type: "exactQuantity", productId: 123, quantity: 2}
            });
        });

        it("parses a product id with a quantity range", () => {
            chai.assert.deepEqual(parseRestrictedProduct("156:3-8"), {
                parsed: true,
                restrictedProduct: {type: "quantityRange", productId: 156, minQuantity: 3, maxQuantity: 8}
            });
        });

        it("allows whitespace around the separators", () => {
            chai.assert.deepEqual(parseRestrictedProduct("156 : 3 - 8"), {
                parsed: true,
                restrictedProduct: {type: "quantityRange", productId: 156, minQuantity: 3, maxQuantity: 8}
            });
        });

        it("keeps a reversed range as written", () => {
            chai.assert.deepEqual(parseRestrictedProduct("10:8-3"), {
                parsed: true,
                restrictedProduct: {type: "quantityRange", productId: 10, minQuantity: 8, maxQuantity: 3}
            });
        });

        it("reads a negative product id with a quantity as an exact quantity", () => {
            chai.assert.deepEqual(parseRestrictedProduct("-5:3"), {
                parsed: true,
                restrictedProduct: {type: "exactQuantity", productId: -5, quantity: 3}
            });
        });

        it("skips a malformed product id", () => {
            chai.assert.deepEqual(parseRestrictedProduct("abc"), {parsed: false, token: "abc", abortsEvaluation: false});
        });

        it("aborts on a malformed quantity", () => {
            chai.assert.deepEqual(parseRestrictedProduct("77:abc"), {parsed: false, token: "77:abc", abortsEvaluation: true});
            chai.assert.deepEqual(parseRestrictedProduct("x:2"), {parsed: false, token: "x:2", abortsEvaluation: true});
            chai.assert.deepEqual(parseRestrictedProduct("77:"), {parsed: false, token: "77:", abortsEvaluation: true});
        });

        it("aborts on a malformed quantity range", () => {
            chai.assert.deepEqual(parseRestrictedProduct("77:1-"), {parsed: false, token: "77:1-", abortsEvaluation: true});
            chai.assert.deepEqual(parseRestrictedProduct("77:-3"), {parsed: false, token: "77:-3", abortsEvaluation: true});
            chai.assert.deepEqual(parseRestrictedProduct("77:a-3"), {parsed: false, token: "77:a-3", abortsEvaluation: true});
        });
    });

    describe("restrictedProductMatchesCartLine()", () => {
        it("matches any quantity of the product", () => {
            chai.assert.isTrue(restrictedProductMatchesCartLine({type: "any", productId: 77}, {productId: 77, totalQuantity: 9}));
            chai.assert.isFalse(restrictedProductMatchesCartLine({type: "any", productId: 77}, {productId: 78, totalQuantity: 9}));
        });

        it("matches an exact quantity", () => {
            const restrictedProduct = {type: "exactQuantity", productId: 123, quantity: 2} as const;
            chai.assert.isTrue(restrictedProductMatchesCartLine(restrictedProduct, {productId: 123, totalQuantity: 2}));
            chai.assert.isFalse(restrictedProductMatchesCartLine(restrictedProduct, {productId: 123, totalQuantity: 3}));
            chai.assert.isFalse(restrictedProductMatchesCartLine(restrictedProduct, {productId: 124, totalQuantity: 2}));
        });

        it("matches a quantity range inclusively", () => {
            const restrictedProduct = {type: "quantityRange", productId: 156, minQuantity: 3, maxQuantity: 8} as const;
            chai.assert.isFalse(restrictedProductMatchesCartLine(restrictedProduct, {productId: 156, totalQuantity: 2}));
            chai.assert.isTrue(restrictedProductMatchesCartLine(restrictedProduct, {productId: 156, totalQuantity: 3}));
            chai.assert.isTrue(restrictedProductMatchesCartLine(restrictedProduct, {productId: 156, totalQuantity: 8}));
            chai.assert.isFalse(restrictedProductMatchesCartLine(restrictedProduct, {productId: 156, totalQuantity: 9}));
        });

        it("never matches a reversed range", () => {
            const restrictedProduct = {type: "quantityRange", productId: 10, minQuantity: 8, maxQuantity: 3} as const;
            for (let totalQuantity = 0; totalQuantity <= 10; totalQuantity++) {
                chai.assert.isFalse(restrictedProductMatchesCartLine(restrictedProduct, {productId: 10, totalQuantity}));
            }
        });
    });
});
