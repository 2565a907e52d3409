#!/usr/bin/env node
import promptSync from 'prompt-sync';
import {
    connectedRoute,
    connectingStops,
    fewestStops,
    mostStops,
    routeNames,
} from './analysis';
import { loadConfig } from './config';
import { buildConnectivityGraph, ConnectivityGraph } from './connectivity';
import { NoConnectionFound, UnknownStop } from './errors';
import MbtaClient from './mbta-client';
import {
    describeError,
    formatConnectedRoute,
    formatConnectingStops,
    formatRouteNames,
    formatStopCount,
} from './report';

const prompt = promptSync({ sigint: true });

const askStop = (question: string): string => {
    while (true) {
        const input = (prompt(question) ?? '').trim();
        if (input) return input;
        console.log("Please enter a stop name or id.");
    }
};

// Query errors are reported and the caller carries on; anything else is fatal.
export const printConnectedRoute = (graph: ConnectivityGraph, from: string, to: string): boolean => {
    try {
        console.log(formatConnectedRoute(from, to, connectedRoute(graph, from, to)));
        return true;
    } catch (error) {
        if (error instanceof UnknownStop || error instanceof NoConnectionFound) {
            console.log(describeError(error));
            return false;
        }
        throw error;
    }
};

const defaultClient = (): MbtaClient => new MbtaClient(loadConfig());

export const main = async (args: string[], createClient: () => MbtaClient = defaultClient): Promise<void> => {
    const client = createClient();
    const graph = buildConnectivityGraph(await client.fetchNetwork());

    console.log(formatRouteNames(routeNames(graph)));
    console.log(formatStopCount("Route with the most stops", mostStops(graph)));
    console.log(formatStopCount("Route with the fewest stops", fewestStops(graph)));
    console.log(formatConnectingStops(connectingStops(graph)));

    if (args.length >= 2) {
        if (!printConnectedRoute(graph, args[0], args[1])) process.exitCode = 1;
        return;
    }

    while (true) {
        const from = askStop("Which stop are you starting from? ");
        const to = askStop("Which stop are you travelling to? ");
        printConnectedRoute(graph, from, to);

        const replay = (prompt('Would you like to search again? (y/n) ') ?? "").toLowerCase();
        if (replay !== 'y' && replay !== 'yes') break;
    }
};

// Fetch and config failures end the run with exit code 1.
export const run = (args: string[], createClient: () => MbtaClient = defaultClient): Promise<void> =>
    main(args, createClient).catch(error => {
        console.error(describeError(error));
        process.exitCode = 1;
    });

if (require.main === module) {
    void run(process.argv.slice(2));
}
