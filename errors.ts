// Failure of an MBTA API request: network, HTTP status or response shape
export class FetchFailure extends Error {
    url: string;
    status?: number;

    constructor(message: string, url: string, status?: number) {
        super(message);
        this.name = "FetchFailure";
        this.url = url;
        this.status = status;
    }
}

export type StopRole = "origin" | "destination";

export class UnknownStop extends Error {
    stop: string;
    role: StopRole;

    constructor(stop: string, role: StopRole) {
        super(`Unknown ${role} stop "${stop}"`);
        this.name = "UnknownStop";
        this.stop = stop;
        this.role = role;
    }
}

export class NoConnectionFound extends Error {
    from: string;
    to: string;

    constructor(from: string, to: string) {
        super(`No route connection found between "${from}" and "${to}"`);
        this.name = "NoConnectionFound";
        this.from = from;
        this.to = to;
    }
}
