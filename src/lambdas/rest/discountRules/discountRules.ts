import * as cassava from "cassava";
import * as jsonschema from "jsonschema";
import {DiscountRequirementValidationRequest} from "../../../model/DiscountRequirementValidation";
import {ShoppingCartType} from "../../../model/ShoppingCart";
import {HasOneProductDiscountRequirementRule} from "./hasOneProduct/HasOneProductDiscountRequirementRule";
import {HasOneProductDefaults} from "./hasOneProduct/hasOneProductDefaults";
import {ConventionalRoutingHelper} from "../../../services/routing/ConventionalRoutingHelper";

export interface DiscountRulesRestParams {
    rule: HasOneProductDiscountRequirementRule;
    routingHelper: ConventionalRoutingHelper;
}

export function installDiscountRulesRest(router: cassava.Router, params: DiscountRulesRestParams): void {
    const {rule, routingHelper} = params;

    router.route("/v1/discountRules/hasOneProduct/checkRequirement")
        .method("POST")
        .handler(async evt => {
            requireBody(evt);
            evt.validateBody(checkRequirementSchema);

            const request: DiscountRequirementValidationRequest = {
                discountRequirementId: evt.body.discountRequirementId,
                customer: evt.body.customer ?? null,
                store: evt.body.store
            };
            return {
                body: await rule.checkRequirement(request)
            };
        });

    router.route("/v1/discountRules/hasOneProduct/configurationUrl")
        .method("GET")
        .handler(async evt => {
            const discountId = getIdQueryParameter(evt, "discountId", true);
            const discountRequirementId = getIdQueryParameter(evt, "discountRequirementId", false);
            return {
                body: {
                    url: rule.getConfigurationUrl(discountId, discountRequirementId)
                }
            };
        });

    const configurePath = routingHelper.getActionPath(HasOneProductDefaults.configureActionName, HasOneProductDefaults.controllerName);

    router.route(configurePath)
        .method("GET")
        .handler(async evt => {
            const discountId = getIdQueryParameter(evt, "discountId", true);
            const discountRequirementId = getIdQueryParameter(evt, "discountRequirementId", false);
            return {
                body: await rule.getConfiguration(discountId, discountRequirementId)
            };
        });

    router.route(configurePath)
        .method("POST")
        .handler(async evt => {
            requireBody(evt);
            evt.validateBody(configureSchema);

            const discountRequirementId = await rule.saveConfiguration(evt.body.discountId, evt.body.discountRequirementId, evt.body.restrictedProductIds);
            return {
                body: {
                    result: true,
                    discountRequirementId
                }
            };
        });
}

function requireBody(evt: cassava.RouterEvent): void {
    if (evt.body == null || typeof evt.body !== "object") {
        throw new cassava.RestError(cassava.httpStatusCode.clientError.UNPROCESSABLE_ENTITY, "The body must be a JSON object.", {
            messageCode: "InvalidBody"
        });
    }
}

function getIdQueryParameter(evt: cassava.RouterEvent, name: string, required: true): number;
function getIdQueryParameter(evt: cassava.RouterEvent, name: string, required: false): number | null;
function getIdQueryParameter(evt: cassava.RouterEvent, name: string, required: boolean): number | null {
    const value = (evt.queryStringParameters || {})[name];
    if (value == null || value === "") {
        if (required) {
            throw new cassava.RestError(cassava.httpStatusCode.clientError.UNPROCESSABLE_ENTITY, `Query parameter '${name}' is required.`, {
                messageCode: "MissingQueryParameter"
            });
        }
        return null;
    }
    if (!/^\d+$/.test(value)) {
        throw new cassava.RestError(cassava.httpStatusCode.clientError.UNPROCESSABLE_ENTITY, `Query parameter '${name}' must be a positive integer.`, {
            messageCode: "InvalidQueryParameter"
        });
    }
    return +value;
}

const idSchema: jsonschema.Schema = {
    type: "integer",
    minimum: 0
};

const shoppingCartItemSchema: jsonschema.Schema = {
    type: "object",
    properties: {
        productId: {
            type: "integer"
        },
        quantity: {
            type: "integer"
        },
        storeId: idSchema,
        shoppingCartType: {
            type: "string",
            enum: [ShoppingCartType.ShoppingCart, ShoppingCartType.Wishlist]
        }
    },
    required: ["productId", "quantity", "storeId", "shoppingCartType"]
};

const checkRequirementSchema: jsonschema.Schema = {
    type: "object",
    properties: {
        discountRequirementId: idSchema,
        customer: {
            type: ["object", "null"],
            properties: {
                id: idSchema,
                shoppingCartItems: {
                    type: "array",
                    items: shoppingCartItemSchema
                }
            },
            required: ["id", "shoppingCartItems"]
        },
        store: {
            type: "object",
            properties: {
                id: idSchema
            },
            required: ["id"]
        }
    },
    required: ["discountRequirementId", "store"]
};

const configureSchema: jsonschema.Schema = {
    type: "object",
    properties: {
        discountId: idSchema,
        discountRequirementId: {
            type: ["integer", "null"],
            minimum: 0
        },
        restrictedProductIds: {
            type: "string",
            maxLength: 65535
        }
    },
    required: ["discountId", "restrictedProductIds"]
};
