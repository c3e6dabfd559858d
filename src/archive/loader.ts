import { gcj02ToWgs84 } from "../geo/coordinates";
import { stationPositionFromGeometry } from "../geo/provider_geometry";
import { logger } from "../logger";
import { buildHopPositions, buildRouteTrips } from "../trips/reconstruct";
import type {
    CityGraph,
    Coordinate,
    DaysOfWeek,
    FareMatrix,
    Holiday,
    Line,
    LoadWarning,
    LoadWarningKind,
    LocalizedNames,
    Route,
    Schedule,
    Station,
} from "../types";
import { openBundle, type ArchiveBundle } from "./bundle";
import { FIELD_DELIMITER, UNO_DELIMITER, field, readRecords, toFloat, toInt } from "./records";

export type LoadOptions = {
    cityCode: string;
    version: string;
    // station code -> encoded provider geometry, overriding the table position
    stationGeometries?: ReadonlyMap<string, string>;
};

// Lines are filled in place while loading; the graph exposes them read-only.
type LineDraft = Omit<Line, "stationPaths"> & { stationPaths: Map<string, Coordinate[]> };

type LoadContext = {
    bundle: ArchiveBundle;
    cityCode: string;
    warnings: LoadWarning[];
    stations: Station[];
    lines: LineDraft[];
    routes: Route[];
    stationByCode: Map<string, number>;
    lineByCode: Map<string, number>;
    routeByCode: Map<string, number>;
};

const STATION_TAG = "MS";
const LINE_TAGS = new Map<string, Line["kind"]>([
    ["ML", "metro"],
    ["WL", "walking"],
]);
const ROUTE_TAGS = new Map<string, Route["kind"]>([
    ["MW", "metro"],
    ["WW", "connector"],
]);

const warn = (ctx: LoadContext, kind: LoadWarningKind, table: string, detail: string) => {
    ctx.warnings.push({ kind, table, detail });
    logger.warn({ city: ctx.cityCode, kind, table, detail }, "archive data warning");
};

const entityAt = <T>(items: readonly T[], index: number | undefined): T | undefined =>
    index === undefined ? undefined : items[index];

const readNames = (record: readonly string[]): LocalizedNames => ({
    english: field(record, 2),
    simplified: field(record, 3),
    traditional: field(record, 4),
    japanese: field(record, 5),
    short: field(record, 7),
});

const stationIndexFrom = (ctx: LoadContext, table: string, owner: string, token: string): number | null => {
    if (!token.trim()) return null;
    const idx = toInt(token);
    if (idx < 0 || idx >= ctx.stations.length) {
        warn(ctx, "DanglingReference", table, `${owner}: station index ${token.trim()} out of range`);
        return null;
    }
    return idx;
};

// Step 1: stations, lines and routes from the combined entity table.
function readEntities(ctx: LoadContext, stationGeometries?: ReadonlyMap<string, string>) {
    for (const record of readRecords(ctx.bundle.table("uno"), UNO_DELIMITER)) {
        if (record.length < 2) continue;
        const code = field(record, 0);
        const tag = field(record, 1);

        if (tag === STATION_TAG) {
            const tablePosition: Coordinate = gcj02ToWgs84({
                lat: toFloat(record[8]),
                lng: toFloat(record[9]),
            });
            const encoded = stationGeometries?.get(code);
            const index = ctx.stations.length;
            ctx.stations.push({
                code,
                index,
                names: { ...readNames(record), englishShort: field(record, 6) },
                position: (encoded ? stationPositionFromGeometry(encoded) : undefined) ?? tablePosition,
                mapX: toInt(record[10]),
                mapY: toInt(record[11]),
            });
            ctx.stationByCode.set(code, index);
            continue;
        }

        const lineKind = LINE_TAGS.get(tag);
        if (lineKind) {
            const index = ctx.lines.length;
            ctx.lines.push({
                code,
                index,
                kind: lineKind,
                names: readNames(record),
                color: field(record, 12),
                stationIndices: [],
                stationPaths: new Map(),
            });
            ctx.lineByCode.set(code, index);
            continue;
        }

        const routeKind = ROUTE_TAGS.get(tag);
        if (routeKind) {
            const index = ctx.routes.length;
            ctx.routes.push({
                code,
                index,
                kind: routeKind,
                names: readNames(record),
                stationIndices: [],
                lineIndex: null,
                idxWithinLine: 0,
                hopPositionByStation: new Map(),
                scheduleCodes: [],
                trips: [],
                segmentation: null,
            });
            ctx.routeByCode.set(code, index);
        }
    }
}

// Step 2: line membership.
function readLineStations(ctx: LoadContext) {
    for (const record of readRecords(ctx.bundle.table("line"), FIELD_DELIMITER)) {
        const code = field(record, 0);
        const line = entityAt(ctx.lines, ctx.lineByCode.get(code));
        if (!line) {
            warn(ctx, "DanglingReference", "line", `unknown line ${code}`);
            continue;
        }
        line.stationIndices = [];
        for (const token of record.slice(1)) {
            const idx = stationIndexFrom(ctx, "line", code, token);
            if (idx !== null) line.stationIndices.push(idx);
        }
    }
}

// Step 3: route stations, owning line and hop ranks.
function readRouteStations(ctx: LoadContext) {
    const routesPerLine = new Map<number, number>();
    for (const record of readRecords(ctx.bundle.table("way"), FIELD_DELIMITER)) {
        const code = field(record, 0);
        const route = entityAt(ctx.routes, ctx.routeByCode.get(code));
        if (!route) {
            warn(ctx, "DanglingReference", "way", `unknown route ${code}`);
            continue;
        }

        route.stationIndices = [];
        for (const token of record.slice(3)) {
            const idx = stationIndexFrom(ctx, "way", code, token);
            if (idx !== null) route.stationIndices.push(idx);
        }
        route.hopPositionByStation = buildHopPositions(route.stationIndices);

        const lineIndex = toInt(record[1]);
        if (lineIndex < 0 || lineIndex >= ctx.lines.length) {
            warn(ctx, "DanglingReference", "way", `${code}: line ordinal ${field(record, 1)} out of range`);
            route.lineIndex = null;
            continue;
        }
        const seen = routesPerLine.get(lineIndex) ?? 0;
        route.lineIndex = lineIndex;
        route.idxWithinLine = seen;
        routesPerLine.set(lineIndex, seen + 1);
    }
}

const parsePriceTable = (text: string): number[][] =>
    readRecords(text, FIELD_DELIMITER).map((record) => record.map((cell) => toInt(cell)));

const squarePrices = (rows: readonly number[][], size: number): number[][] =>
    Array.from({ length: size }, (_, from) => Array.from({ length: size }, (_, to) => rows[from]?.[to] ?? 0));

// Step 4: fare matrices.
function readFares(ctx: LoadContext): FareMatrix[] {
    const fares: FareMatrix[] = [];
    for (const record of readRecords(ctx.bundle.table("fare"), FIELD_DELIMITER)) {
        const routeCodes = field(record, 1)
            .split("|")
            .map((code) => code.trim())
            .filter(Boolean);

        const stationIndices: number[] = [];
        const explicitCodes = field(record, 4);
        if (explicitCodes) {
            for (const code of explicitCodes.split("|")) {
                const idx = ctx.stationByCode.get(code.trim());
                if (idx === undefined) {
                    warn(ctx, "DanglingReference", "fare", `unknown station ${code.trim()}`);
                    continue;
                }
                stationIndices.push(idx);
            }
        } else {
            const firstRoute = routeCodes[0];
            const route = firstRoute === undefined ? undefined : entityAt(ctx.routes, ctx.routeByCode.get(firstRoute));
            if (route) {
                stationIndices.push(...route.stationIndices);
            } else {
                warn(ctx, "DanglingReference", "fare", `unknown route ${firstRoute ?? "(none)"}`);
            }
        }

        const matrixFile = field(record, 3);
        const size = stationIndices.length;
        const prices = matrixFile
            ? squarePrices(parsePriceTable(ctx.bundle.tableByFile(matrixFile)), size)
            : squarePrices([], size).map((row) => row.fill(toInt(record[2])));

        fares.push({ routeCodes, stationIndices, prices });
    }
    return fares;
}

// Step 5: public holidays, one YYYYMMDD per line.
function readHolidays(ctx: LoadContext): Holiday[] {
    const holidays: Holiday[] = [];
    for (const line of ctx.bundle.table("holiday").split(/\r?\n/)) {
        const value = line.trim();
        if (value.length < 8) continue;
        holidays.push({
            year: toInt(value.slice(0, 4)),
            month: toInt(value.slice(4, 6)),
            day: toInt(value.slice(6, 8)),
        });
    }
    return holidays;
}

const runsOn = (record: readonly string[], idx: number) => field(record, idx).startsWith("1");

// Step 6: service patterns and their assignment to routes.
function readSchedules(ctx: LoadContext): Schedule[] {
    const byCode = new Map<string, Schedule>();
    for (const record of readRecords(ctx.bundle.table("schedule"), UNO_DELIMITER)) {
        const code = field(record, 0);
        if (!code) continue;
        const days: DaysOfWeek = [
            runsOn(record, 1),
            runsOn(record, 2),
            runsOn(record, 3),
            runsOn(record, 4),
            runsOn(record, 5),
            runsOn(record, 6),
            runsOn(record, 7),
        ];
        byCode.set(code, { code, days, holidays: runsOn(record, 9) });
    }

    for (const record of readRecords(ctx.bundle.table("wayschedule"), FIELD_DELIMITER)) {
        const code = field(record, 0);
        const route = entityAt(ctx.routes, ctx.routeByCode.get(code));
        if (!route) {
            warn(ctx, "DanglingReference", "wayschedule", `unknown route ${code}`);
            continue;
        }
        route.scheduleCodes = [];
        for (const token of record.slice(2)) {
            const scheduleCode = token.trim();
            if (!scheduleCode) continue;
            if (!byCode.has(scheduleCode)) {
                warn(ctx, "UnknownSchedule", "wayschedule", `${code}: unknown schedule ${scheduleCode}`);
                continue;
            }
            route.scheduleCodes.push(scheduleCode);
        }
    }

    return [...byCode.values()];
}

// Step 7: one timing table per route, named after the route code.
function readTrips(ctx: LoadContext) {
    for (const route of ctx.routes) {
        const text = ctx.bundle.optionalTable(route.code);
        if (text === null) {
            warn(ctx, "RouteTimingMissing", route.code, `${route.code}: no timing table`);
            continue;
        }
        const result = buildRouteTrips(
            {
                code: route.code,
                stationIndices: route.stationIndices,
                hopPositionByStation: route.hopPositionByStation,
                scheduleCount: route.scheduleCodes.length,
            },
            text,
        );
        route.trips = result.tripsBySchedule;
        route.segmentation = result.strategy;
    }
}

// Step 8: per-line polylines between adjacent stations.
function readStationPaths(ctx: LoadContext) {
    const points: Coordinate[] = readRecords(ctx.bundle.table("path_latlng"), FIELD_DELIMITER).map((record) =>
        gcj02ToWgs84({ lat: toFloat(record[0]), lng: toFloat(record[1]) }),
    );

    for (const record of readRecords(ctx.bundle.table("path_rail"), FIELD_DELIMITER)) {
        const lineCode = field(record, 0);
        const line = entityAt(ctx.lines, ctx.lineByCode.get(lineCode));
        if (!line) {
            warn(ctx, "DanglingReference", "path_rail", `unknown line ${lineCode}`);
            continue;
        }
        const first = toInt(record[3]);
        const last = toInt(record[4]);
        line.stationPaths.set(`${field(record, 1)}_${field(record, 2)}`, points.slice(first, last + 1));
    }
}

const rejectMutation = () => {
    throw new TypeError("city graph is read-only");
};

// Object.freeze leaves a Map's entries writable, so its mutators are shadowed too.
const deepFreeze = <T>(value: T): T => {
    if (!value || typeof value !== "object" || Object.isFrozen(value)) return value;
    if (value instanceof Map) {
        for (const method of ["set", "delete", "clear"]) {
            Object.defineProperty(value, method, { value: rejectMutation });
        }
        Object.freeze(value);
        for (const nested of value.values()) deepFreeze(nested);
        return value;
    }
    Object.freeze(value);
    for (const nested of Object.values(value)) deepFreeze(nested);
    return value;
};

export function buildCityGraph(bundle: ArchiveBundle, options: LoadOptions): CityGraph {
    const ctx: LoadContext = {
        bundle,
        cityCode: options.cityCode,
        warnings: [],
        stations: [],
        lines: [],
        routes: [],
        stationByCode: new Map(),
        lineByCode: new Map(),
        routeByCode: new Map(),
    };

    readEntities(ctx, options.stationGeometries);
    readLineStations(ctx);
    readRouteStations(ctx);
    const fares = readFares(ctx);
    const holidays = readHolidays(ctx);
    const schedules = readSchedules(ctx);
    readTrips(ctx);
    readStationPaths(ctx);

    return deepFreeze({
        cityCode: options.cityCode,
        version: options.version,
        stations: ctx.stations,
        lines: ctx.lines,
        routes: ctx.routes,
        schedules,
        holidays,
        fares,
        stationByCode: ctx.stationByCode,
        warnings: ctx.warnings,
    });
}

export function loadCityGraph(bytes: Buffer, options: LoadOptions): CityGraph {
    return buildCityGraph(openBundle(bytes, options.version), options);
}
