import {
    connectedRoute,
    connectingStops,
    fewestStops,
    mostStops,
    routeNames,
    stopCount,
} from '../analysis';
import { RouteStops } from '../commons';
import { buildConnectivityGraph } from '../connectivity';

const line = (id: string, name: string, stopIds: string[]): RouteStops => ({
    route: { id, name },
    stops: stopIds.map(stopId => ({ id: stopId, name: `Stop ${stopId}` })),
});

describe('stop counts', () => {
    const graph = buildConnectivityGraph([
        line('route1', 'Route 1', ['stop1', 'stop2']),
        line('route2', 'Route 2', ['stop1', 'stop2', 'stop3']),
    ]);

    test('mostStops', () => {
        expect(mostStops(graph)).toEqual({ route: { id: 'route2', name: 'Route 2' }, count: 3 });
    });

    test('fewestStops', () => {
        expect(fewestStops(graph)).toEqual({ route: { id: 'route1', name: 'Route 1' }, count: 2 });
    });

    test('counts each stop once', () => {
        const repeated = buildConnectivityGraph([line('loop', 'Loop', ['a', 'b', 'a'])]);
        expect(stopCount(repeated, 'loop')).toBe(2);
    });

    test('unknown and empty routes count zero', () => {
        const withEmpty = buildConnectivityGraph([line('r', 'R', ['a']), line('empty', 'Empty', [])]);
        expect(stopCount(withEmpty, 'empty')).toBe(0);
        expect(stopCount(withEmpty, 'missing')).toBe(0);
        expect(fewestStops(withEmpty)).toEqual({ route: { id: 'empty', name: 'Empty' }, count: 0 });
    });

    test('ties go to the first route fetched', () => {
        const tied = buildConnectivityGraph([
            line('a', 'A', ['1', '2']),
            line('b', 'B', ['3', '4']),
            line('c', 'C', ['5']),
            line('d', 'D', ['6']),
        ]);
        expect(mostStops(tied)?.route.id).toBe('a');
        expect(fewestStops(tied)?.route.id).toBe('c');
    });

    test('no routes', () => {
        const empty = buildConnectivityGraph([]);
        expect(mostStops(empty)).toBeUndefined();
        expect(fewestStops(empty)).toBeUndefined();
    });
});

describe('network queries', () => {
    const graph = buildConnectivityGraph([
        line('Red', 'Red Line', ['1', '2', '3']),
        line('Blue', 'Blue Line', ['3', '4', '5']),
        line('Green', 'Green Line', ['5', '6']),
    ]);

    test('routeNames keeps fetch order', () => {
        expect(routeNames(graph)).toEqual(['Red Line', 'Blue Line', 'Green Line']);
    });

    test('connectingStops lists stops served by two or more routes', () => {
        const stops = connectingStops(graph);
        expect(stops.map(({ stop }) => stop.id)).toEqual(['3', '5']);
        expect(stops[0].routes.map(route => route.id)).toEqual(['Red', 'Blue']);
        expect(stops[1].routes.map(route => route.id)).toEqual(['Blue', 'Green']);
    });

    test('connectedRoute maps the path to routes', () => {
        expect(connectedRoute(graph, 'Stop 1', 'Stop 6').map(route => route.name))
            .toEqual(['Red Line', 'Blue Line', 'Green Line']);
    });
});
