import { Route, Stop } from './commons';
import { ConnectivityGraph, routePath } from './connectivity';

export interface StopCountResult {
    route: Route;
    count: number;
}

export interface ConnectingStop {
    stop: Stop;
    routes: Route[];
}

export const routeNames = (graph: ConnectivityGraph): string[] =>
    graph.routes.map(route => route.name);

export const stopCount = (graph: ConnectivityGraph, routeId: string): number =>
    graph.stopsByRoute.get(routeId)?.size ?? 0;

// Strict comparison keeps the first route in fetch order on ties.
const pickByStopCount = (
    graph: ConnectivityGraph,
    better: (candidate: number, current: number) => boolean
): StopCountResult | undefined => {
    let best: StopCountResult | undefined;
    for (const route of graph.routes) {
        const count = stopCount(graph, route.id);
        if (!best || better(count, best.count)) {
            best = { route, count };
        }
    }
    return best;
};

export const mostStops = (graph: ConnectivityGraph): StopCountResult | undefined =>
    pickByStopCount(graph, (candidate, current) => candidate > current);

export const fewestStops = (graph: ConnectivityGraph): StopCountResult | undefined =>
    pickByStopCount(graph, (candidate, current) => candidate < current);

const routeById = (graph: ConnectivityGraph): Map<string, Route> =>
    new Map(graph.routes.map(route => [route.id, route]));

/**
 * Stops served by two or more routes, in the order they were first seen.
 */
export const connectingStops = (graph: ConnectivityGraph): ConnectingStop[] => {
    const routesIndex = routeById(graph);
    const result: ConnectingStop[] = [];

    for (const [stopId, routeIds] of graph.routesByStop) {
        if (routeIds.size < 2) continue;
        const stop = graph.stops.get(stopId);
        if (!stop) continue;
        const routes = [...routeIds].flatMap(routeId => {
            const route = routesIndex.get(routeId);
            return route ? [route] : [];
        });
        result.push({ stop, routes });
    }
    return result;
};

export const connectedRoute = (graph: ConnectivityGraph, from: string, to: string): Route[] => {
    const routesIndex = routeById(graph);
    return routePath(graph, from, to).flatMap(routeId => {
        const route = routesIndex.get(routeId);
        return route ? [route] : [];
    });
};
