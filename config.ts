const DEFAULT_API_URL = 'https://api-v3.mbta.com/';
// 0 = light rail, 1 = heavy rail
const DEFAULT_ROUTE_TYPES = ['0', '1'];

export interface MbtaConfig {
    apiKey: string;
    username: string;
    baseUrl: string;
    routeTypes: string[];
}

export const getEnv = (value: string | undefined, fallback: string): string => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : fallback;
};

export const getEnvArray = (value: string | undefined, fallback: string[], separator = ','): string[] => {
    if (!value) return fallback;
    const items = value.split(separator).map(item => item.trim()).filter(item => item.length > 0);
    return items.length > 0 ? items : fallback;
};

/**
 * Reads MBTA credentials and endpoint settings from the environment.
 * Throws when `MBTA_API_KEY` is missing.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): MbtaConfig => {
    const apiKey = getEnv(env.MBTA_API_KEY, '');
    if (!apiKey) {
        throw new Error('[config] Environment variable `MBTA_API_KEY` is not set.');
    }

    const baseUrl = getEnv(env.MBTA_API_URL, DEFAULT_API_URL).replace(/\/+$/, '') + '/';

    return {
        apiKey,
        username: getEnv(env.MBTA_USERNAME, ''),
        baseUrl,
        routeTypes: getEnvArray(env.MBTA_ROUTE_TYPES, DEFAULT_ROUTE_TYPES),
    };
};
