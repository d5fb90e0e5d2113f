import {RouteValues, RoutingHelper} from "./RoutingHelper";

/**
 * Builds `{basePath}/{controller}/{action}` with the route values that are
 * set as the query string.
 */
export class ConventionalRoutingHelper implements RoutingHelper {

    readonly basePath: string;

    constructor(basePath: string = "/Admin") {
        this.basePath = basePath.replace(/\/+$/, "");
    }

    getActionPath(action: string, controller: string): string {
        return `${this.basePath}/${controller}/${action}`;
    }

    buildActionUrl(action: string, controller: string, routeValues: RouteValues): string {
        const query = new URLSearchParams();
        for (const key of Object.keys(routeValues)) {
            const value = routeValues[key];
            if (value != null) {
                query.append(key, String(value));
            }
        }

        const queryString = query.toString();
        return this.getActionPath(action, controller) + (queryString ? `?${queryString}` : "");
    }
}
