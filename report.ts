import { Route } from './commons';
import { ConnectingStop, StopCountResult } from './analysis';
import { FetchFailure, NoConnectionFound, UnknownStop } from './errors';

const pluralize = (count: number, word: string): string =>
    `${count} ${word}${count !== 1 ? 's' : ''}`;

export const formatRouteNames = (names: string[]): string =>
    `Subway routes: ${names.join(', ')}`;

export const formatStopCount = (label: string, result: StopCountResult | undefined): string => {
    if (!result) return `${label}: none`;
    return `${label}: ${result.route.name} (${pluralize(result.count, 'stop')})`;
};

export const formatConnectingStops = (stops: ConnectingStop[]): string => {
    const lines = stops.map(({ stop, routes }) =>
        `  ${stop.name}: ${routes.map(route => route.name).join(', ')}`
    );
    return ['Stops connecting multiple routes:', ...lines].join('\n');
};

export const formatConnectedRoute = (from: string, to: string, routes: Route[]): string =>
    `${from} to ${to}: ${routes.map(route => route.name).join(' -> ')}`;

export const describeError = (error: unknown): string => {
    if (error instanceof UnknownStop) {
        return `Unknown stop: no ${error.role} stop named "${error.stop}".`;
    }
    if (error instanceof NoConnectionFound) {
        return `No path exists between "${error.from}" and "${error.to}".`;
    }
    if (error instanceof FetchFailure) {
        return `MBTA request failed: ${error.message}`;
    }
    return error instanceof Error ? error.message : String(error);
};
