import { z } from "zod";

export interface Route {
    id: string;
    name: string;
}

export interface Stop {
    id: string;
    name: string;
}

export interface RouteStops {
    route: Route;
    stops: Stop[];
}

// MBTA v3 responses are JSON:API documents; only the fields read below are checked.
export const RouteResourceSchema = z.object({
    id: z.string(),
    attributes: z.object({
        long_name: z.string(),
    }),
});

export const StopResourceSchema = z.object({
    id: z.string(),
    attributes: z.object({
        name: z.string(),
    }),
});

export const RoutesResponseSchema = z.object({
    data: z.array(RouteResourceSchema),
});

export const StopsResponseSchema = z.object({
    data: z.array(StopResourceSchema),
});
