import { Route, RouteStops, Stop } from './commons';
import { NoConnectionFound, StopRole, UnknownStop } from './errors';

export interface ConnectivityGraph {
    routes: Route[];
    stops: Map<string, Stop>;
    stopsByRoute: Map<string, Set<string>>;
    routesByStop: Map<string, Set<string>>;
    adjacency: Map<string, Set<string>>;
}

/**
 * Indexes the fetched network by stop and derives route adjacency
 * (two routes are adjacent when they share at least one stop).
 *
 * Every set keeps insertion order: routes in fetch order, stops in the
 * order each route lists them.
 */
export const buildConnectivityGraph = (network: RouteStops[]): ConnectivityGraph => {
    const routes: Route[] = [];
    const stops = new Map<string, Stop>();
    const stopsByRoute = new Map<string, Set<string>>();
    const routesByStop = new Map<string, Set<string>>();
    const adjacency = new Map<string, Set<string>>();

    for (const { route, stops: routeStops } of network) {
        if (!stopsByRoute.has(route.id)) routes.push(route);
        const served = stopsByRoute.get(route.id) ?? new Set<string>();
        stopsByRoute.set(route.id, served);
        if (!adjacency.has(route.id)) adjacency.set(route.id, new Set());

        for (const stop of routeStops) {
            served.add(stop.id);
            if (!stops.has(stop.id)) stops.set(stop.id, stop);

            const serving = routesByStop.get(stop.id) ?? new Set<string>();
            serving.add(route.id);
            routesByStop.set(stop.id, serving);
        }
    }

    for (const route of routes) {
        const neighbours = adjacency.get(route.id) ?? new Set<string>();
        for (const stopId of stopsByRoute.get(route.id) ?? []) {
            for (const other of routesByStop.get(stopId) ?? []) {
                if (other !== route.id) neighbours.add(other);
            }
        }
        adjacency.set(route.id, neighbours);
    }

    return { routes, stops, stopsByRoute, routesByStop, adjacency };
};

/**
 * Finds a stop by id, falling back to a case-insensitive name match.
 */
export const resolveStop = (graph: ConnectivityGraph, ref: string): Stop | undefined => {
    const trimmed = ref.trim();
    const byId = graph.stops.get(trimmed);
    if (byId) return byId;

    const wanted = trimmed.toLowerCase();
    for (const stop of graph.stops.values()) {
        if (stop.name.toLowerCase() === wanted) return stop;
    }
    return undefined;
};

const servingRoutes = (graph: ConnectivityGraph, ref: string, role: StopRole): Set<string> => {
    const stop = resolveStop(graph, ref);
    const serving = stop ? graph.routesByStop.get(stop.id) : undefined;
    if (!serving) {
        throw new UnknownStop(ref, role);
    }
    return serving;
};

/**
 * Shortest sequence of route ids linking a route serving `from` to a route
 * serving `to`, where consecutive routes share a stop.
 *
 * Among equally short paths the first one found in breadth-first order wins.
 */
export const routePath = (graph: ConnectivityGraph, from: string, to: string): string[] => {
    const startRoutes = servingRoutes(graph, from, 'origin');
    const endRoutes = servingRoutes(graph, to, 'destination');

    for (const routeId of startRoutes) {
        if (endRoutes.has(routeId)) return [routeId];
    }

    const visited = new Set<string>(startRoutes);
    const queue: string[][] = [...startRoutes].map(routeId => [routeId]);

    for (let head = 0; head < queue.length; head++) {
        const path = queue[head];
        const last = path[path.length - 1];

        for (const next of graph.adjacency.get(last) ?? []) {
            if (visited.has(next) || path.includes(next)) continue;
            const extended = [...path, next];
            if (endRoutes.has(next)) return extended;
            visited.add(next);
            queue.push(extended);
        }
    }

    throw new NoConnectionFound(from, to);
};
