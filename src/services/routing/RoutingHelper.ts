export type RouteValues = { [key: string]: string | number | null | undefined };

export interface RoutingHelper {

    /**
     * Build the path to an action of a controller with the given route values.
     */
    buildActionUrl(action: string, controller: string, routeValues: RouteValues): string;

}
