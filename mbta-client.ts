import fetch from 'node-fetch';
import { z } from 'zod';
import { Route, RouteStops, RoutesResponseSchema, Stop, StopsResponseSchema } from './commons';
import { MbtaConfig } from './config';
import { FetchFailure } from './errors';

export interface FetchResponse {
    ok: boolean;
    status: number;
    statusText: string;
    json(): Promise<unknown>;
}

export type FetchLike = (
    url: string,
    init?: { method?: string; headers?: Record<string, string> }
) => Promise<FetchResponse>;

/**
 * Thin client over the MBTA v3 REST API.
 *
 * Requests are issued one at a time and never retried; any failure surfaces
 * as a {@link FetchFailure}.
 */
export default class MbtaClient {
    private readonly config: MbtaConfig;
    private readonly fetchImpl: FetchLike;

    constructor(config: MbtaConfig, fetchImpl: FetchLike = fetch) {
        this.config = config;
        this.fetchImpl = fetchImpl;
    }

    urlFor(path: string): string {
        return `${this.config.baseUrl}${path.replace(/^\/+/, '')}`;
    }

    async getRequest(path: string): Promise<unknown> {
        const url = this.urlFor(path);
        const credentials = Buffer.from(`${this.config.username}:${this.config.apiKey}`).toString('base64');

        let response: FetchResponse;
        try {
            response = await this.fetchImpl(url, {
                method: 'GET',
                headers: {
                    Accept: 'application/vnd.api+json',
                    Authorization: `Basic ${credentials}`,
                    'x-api-key': this.config.apiKey,
                },
            });
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new FetchFailure(`Failed to fetch data from ${url}: ${message}`, url);
        }

        if (!response.ok) {
            throw new FetchFailure(
                `Failed to fetch data from ${url} with status ${response.status} ${response.statusText}`.trimEnd(),
                url,
                response.status
            );
        }

        try {
            return await response.json();
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new FetchFailure(`Malformed JSON from ${url}: ${message}`, url, response.status);
        }
    }

    async fetchRoutes(): Promise<Route[]> {
        const path = `routes?filter[type]=${this.config.routeTypes.join(',')}`;
        const body = await this.getResource(path, RoutesResponseSchema);
        const routes = body.data.map(resource => ({ id: resource.id, name: resource.attributes.long_name }));
        console.log(`Fetched ${routes.length} routes`);
        return routes;
    }

    async fetchStopsForRoute(routeId: string): Promise<Stop[]> {
        const path = `stops?filter[route]=${encodeURIComponent(routeId)}`;
        const body = await this.getResource(path, StopsResponseSchema);
        const stops = body.data.map(resource => ({ id: resource.id, name: resource.attributes.name }));
        console.log(`Fetched ${stops.length} stops for route ${routeId}`);
        return stops;
    }

    // Sequential on purpose: one stops request per route, in route order.
    async fetchNetwork(): Promise<RouteStops[]> {
        const routes = await this.fetchRoutes();
        const network: RouteStops[] = [];
        for (const route of routes) {
            const stops = await this.fetchStopsForRoute(route.id);
            network.push({ route, stops });
        }
        return network;
    }

    private async getResource<T>(path: string, schema: z.ZodType<T>): Promise<T> {
        const payload = await this.getRequest(path);
        const result = schema.safeParse(payload);
        if (!result.success) {
            const url = this.urlFor(path);
            const issues = result.error.issues
                .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
                .join('; ');
            throw new FetchFailure(`Unexpected response shape from ${url}: ${issues}`, url);
        }
        return result.data;
    }
}
