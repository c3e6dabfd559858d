export type TransitErrorKind =
    | "InvalidSymbol"
    | "UnknownGeometryKind"
    | "TruncatedBlock"
    | "MissingTable"
    | "CityNotFound"
    | "RouteTimingMissing";

export class TransitDataError extends Error {
    readonly kind: TransitErrorKind;

    constructor(kind: TransitErrorKind, message: string) {
        super(message);
        this.name = "TransitDataError";
        this.kind = kind;
    }
}

export class InvalidSymbolError extends TransitDataError {
    readonly symbol: string;

    constructor(symbol: string) {
        super("InvalidSymbol", `invalid codec symbol ${JSON.stringify(symbol)}`);
        this.name = "InvalidSymbolError";
        this.symbol = symbol;
    }
}

export class UnknownGeometryKindError extends TransitDataError {
    readonly selector: string;

    constructor(selector: string) {
        super("UnknownGeometryKind", `unknown geometry kind ${JSON.stringify(selector)}`);
        this.name = "UnknownGeometryKindError";
        this.selector = selector;
    }
}

export class MissingTableError extends TransitDataError {
    readonly path: string;

    constructor(path: string) {
        super("MissingTable", `archive table missing: ${path}`);
        this.name = "MissingTableError";
        this.path = path;
    }
}

export class CityNotFoundError extends TransitDataError {
    readonly city: string;

    constructor(city: string) {
        super("CityNotFound", `city not found: ${city}`);
        this.name = "CityNotFoundError";
        this.city = city;
    }
}

export const isTransitDataError = (err: unknown, kind?: TransitErrorKind): err is TransitDataError =>
    err instanceof TransitDataError && (kind === undefined || err.kind === kind);
