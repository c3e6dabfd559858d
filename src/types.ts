// Shared domain types for a loaded city archive.

export type Coordinate = {
    lat: number;
    lng: number;
};

export type ProjectedPoint = {
    x: number;
    y: number;
};

export type LocalizedNames = {
    english: string;
    simplified: string;
    traditional: string;
    japanese: string;
    short: string;
};

export type Station = {
    code: string;
    index: number;
    names: LocalizedNames & { englishShort: string };
    position: Coordinate;
    mapX: number;
    mapY: number;
};

export type LineKind = "metro" | "walking";

export type Line = {
    code: string;
    index: number;
    kind: LineKind;
    names: LocalizedNames;
    color: string;
    stationIndices: number[];
    // "{fromCode}_{toCode}" -> polyline between adjacent stations
    stationPaths: ReadonlyMap<string, readonly Coordinate[]>;
};

export type RouteKind = "metro" | "connector";

export type SegmentationStrategy = "fixed-count" | "boundary-detection";

export type StationVisit = {
    stationIndex: number;
    minute: number;
};

export type Trip = {
    visits: StationVisit[];
};

export type Route = {
    code: string;
    index: number;
    kind: RouteKind;
    names: LocalizedNames;
    stationIndices: number[];
    lineIndex: number | null;
    idxWithinLine: number;
    // departure station index -> position of its hop in the route's timing table
    hopPositionByStation: ReadonlyMap<number, number>;
    scheduleCodes: string[];
    // one trip list per assigned schedule slot
    trips: Trip[][];
    segmentation: SegmentationStrategy | null;
};

export type DaysOfWeek = [boolean, boolean, boolean, boolean, boolean, boolean, boolean];

export type Schedule = {
    code: string;
    days: DaysOfWeek;
    holidays: boolean;
};

export type Holiday = {
    year: number;
    month: number;
    day: number;
};

export type FareMatrix = {
    routeCodes: string[];
    stationIndices: number[];
    // prices[from][to], square over stationIndices
    prices: number[][];
};

export type LoadWarningKind = "RouteTimingMissing" | "DanglingReference" | "UnknownSchedule";

export type LoadWarning = {
    kind: LoadWarningKind;
    table: string;
    detail: string;
};

export type CityGraph = {
    cityCode: string;
    version: string;
    stations: readonly Station[];
    lines: readonly Line[];
    routes: readonly Route[];
    schedules: readonly Schedule[];
    holidays: readonly Holiday[];
    fares: readonly FareMatrix[];
    stationByCode: ReadonlyMap<string, number>;
    warnings: readonly LoadWarning[];
};
