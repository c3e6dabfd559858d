import type { CityGraph, Coordinate, Route, Schedule, Station, Trip } from "../types";

export type AgencyInfo = {
    id: string;
    name: string;
    url: string;
    timezone: string;
    lang: string;
    currency: string;
};

export const STOP_COLUMNS = ["stop_id", "stop_name", "stop_lat", "stop_lon", "zone_id", "stop_timezone"] as const;
export const AGENCY_COLUMNS = ["agency_id", "agency_name", "agency_url", "agency_timezone", "agency_lang"] as const;
export const ROUTE_COLUMNS = [
    "route_id",
    "agency_id",
    "route_short_name",
    "route_long_name",
    "route_type",
    "route_color",
] as const;
export const CALENDAR_COLUMNS = [
    "service_id",
    "monday",
    "tuesday",
    "wednesday",
    "thursday",
    "friday",
    "saturday",
    "sunday",
    "start_date",
    "end_date",
] as const;
export const CALENDAR_DATE_COLUMNS = ["service_id", "date", "exception_type"] as const;
export const TRIP_COLUMNS = ["route_id", "service_id", "trip_id", "trip_headsign", "direction_id", "shape_id"] as const;
export const SHAPE_COLUMNS = ["shape_id", "shape_pt_lat", "shape_pt_lon", "shape_pt_sequence"] as const;
export const STOP_TIME_COLUMNS = [
    "trip_id",
    "arrival_time",
    "departure_time",
    "stop_id",
    "stop_sequence",
    "timepoint",
] as const;
export const FARE_RULE_COLUMNS = ["fare_id", "route_id", "origin_id", "destination_id", "contains_id"] as const;
export const FARE_ATTRIBUTE_COLUMNS = [
    "fare_id",
    "price",
    "currency_type",
    "payment_method",
    "transfers",
    "agency_id",
    "transfer_duration",
] as const;

type Row<Columns extends readonly string[]> = Record<Columns[number], string>;

export type StopRow = Row<typeof STOP_COLUMNS>;
export type AgencyRow = Row<typeof AGENCY_COLUMNS>;
export type RouteRow = Row<typeof ROUTE_COLUMNS>;
export type CalendarRow = Row<typeof CALENDAR_COLUMNS>;
export type CalendarDateRow = Row<typeof CALENDAR_DATE_COLUMNS>;
export type TripRow = Row<typeof TRIP_COLUMNS>;
export type ShapeRow = Row<typeof SHAPE_COLUMNS>;
export type StopTimeRow = Row<typeof STOP_TIME_COLUMNS>;
export type FareRuleRow = Row<typeof FARE_RULE_COLUMNS>;
export type FareAttributeRow = Row<typeof FARE_ATTRIBUTE_COLUMNS>;

export type CitySchedule = {
    stops: StopRow[];
    agency: AgencyRow[];
    routes: RouteRow[];
    calendar: CalendarRow[];
    calendarDates: CalendarDateRow[];
    trips: TripRow[];
    shapes: ShapeRow[];
    stopTimes: StopTimeRow[];
    fareRules: FareRuleRow[];
    fareAttributes: FareAttributeRow[];
};

const SERVICE_START = "20000101";
const SERVICE_END = "99991231";
const ROUTE_TYPE_METRO = "1";

type ScheduledTrips = {
    scheduleCode: string;
    trips: Trip[];
};

const pad2 = (value: number) => String(value).padStart(2, "0");

// Minutes past service-day midnight; hours run past 23 for after-midnight trips.
export const formatMinuteOfDay = (minute: number) => `${pad2(Math.floor(minute / 60))}:${pad2(minute % 60)}:00`;

const zoneId = (station: Station) => `zone_${station.code}`;
const shapeId = (route: Route) => `shape_${route.code}`;
const tripId = (route: Route, scheduleCode: string, idx: number) => `${route.code}_trip_${scheduleCode}_${idx}`;
const flag = (value: boolean) => (value ? "1" : "0");

const stationAt = (graph: CityGraph, idx: number | undefined) =>
    idx === undefined ? undefined : graph.stations[idx];

const firstMinute = (trip: Trip) => trip.visits[0]?.minute ?? 0;

/**
 * Trip lists paired with their schedule, sorted by first departure. Slots
 * with no assigned schedule code are dropped.
 */
function scheduledTrips(route: Route): ScheduledTrips[] {
    const out: ScheduledTrips[] = [];
    route.trips.forEach((trips, slot) => {
        const scheduleCode = route.scheduleCodes[slot];
        if (scheduleCode === undefined || trips.length === 0) return;
        out.push({
            scheduleCode,
            trips: [...trips].sort((a, b) => firstMinute(a) - firstMinute(b)),
        });
    });
    return out;
}

function buildStops(graph: CityGraph, agency: AgencyInfo): StopRow[] {
    return graph.stations.map((station) => ({
        stop_id: station.code,
        stop_name: station.names.english,
        stop_lat: String(station.position.lat),
        stop_lon: String(station.position.lng),
        zone_id: zoneId(station),
        stop_timezone: agency.timezone,
    }));
}

function buildCalendar(schedules: readonly Schedule[]): CalendarRow[] {
    return schedules
        .filter((schedule) => schedule.holidays || schedule.days.some(Boolean))
        .map((schedule) => ({
            service_id: schedule.code,
            monday: flag(schedule.days[0]),
            tuesday: flag(schedule.days[1]),
            wednesday: flag(schedule.days[2]),
            thursday: flag(schedule.days[3]),
            friday: flag(schedule.days[4]),
            saturday: flag(schedule.days[5]),
            sunday: flag(schedule.days[6]),
            start_date: SERVICE_START,
            end_date: SERVICE_END,
        }));
}

function buildCalendarDates(graph: CityGraph): CalendarDateRow[] {
    const rows: CalendarDateRow[] = [];
    for (const schedule of graph.schedules) {
        for (const holiday of graph.holidays) {
            rows.push({
                service_id: schedule.code,
                date: `${holiday.year}${pad2(holiday.month)}${pad2(holiday.day)}`,
                exception_type: schedule.holidays ? "1" : "2",
            });
        }
    }
    return rows;
}

// Adjacent station pairs stitched from the line's polylines, reversed when
// only the opposite direction is stored.
function routeShape(graph: CityGraph, route: Route): Coordinate[] {
    const line = route.lineIndex === null ? undefined : graph.lines[route.lineIndex];
    if (!line) return [];

    const points: Coordinate[] = [];
    for (let i = 0; i + 1 < route.stationIndices.length; i++) {
        const from = stationAt(graph, route.stationIndices[i]);
        const to = stationAt(graph, route.stationIndices[i + 1]);
        if (!from || !to) continue;

        const forward = line.stationPaths.get(`${from.code}_${to.code}`);
        if (forward) {
            points.push(...forward);
            continue;
        }
        const backward = line.stationPaths.get(`${to.code}_${from.code}`);
        if (backward) points.push(...[...backward].reverse());
    }
    return points;
}

function buildFares(graph: CityGraph, agency: AgencyInfo): Pick<CitySchedule, "fareRules" | "fareAttributes"> {
    const fareRules: FareRuleRow[] = [];
    const fareAttributes: FareAttributeRow[] = [];
    const seen = new Set<string>();

    for (const fare of graph.fares) {
        fare.stationIndices.forEach((fromIdx, x) => {
            fare.stationIndices.forEach((toIdx, y) => {
                const from = graph.stations[fromIdx];
                const to = graph.stations[toIdx];
                if (!from || !to) return;

                const fareId = `fare_${from.code}_${to.code}`;
                if (seen.has(fareId)) return;
                seen.add(fareId);

                fareRules.push({
                    fare_id: fareId,
                    route_id: "",
                    origin_id: zoneId(from),
                    destination_id: zoneId(to),
                    contains_id: "",
                });
                fareAttributes.push({
                    fare_id: fareId,
                    price: String(fare.prices[x]?.[y] ?? 0),
                    currency_type: agency.currency,
                    payment_method: "1",
                    transfers: "0",
                    agency_id: agency.id,
                    transfer_duration: "",
                });
            });
        });
    }

    return { fareRules, fareAttributes };
}

export function buildCitySchedule(graph: CityGraph, agency: AgencyInfo): CitySchedule {
    const schedule: CitySchedule = {
        stops: buildStops(graph, agency),
        agency: [
            {
                agency_id: agency.id,
                agency_name: agency.name,
                agency_url: agency.url,
                agency_timezone: agency.timezone,
                agency_lang: agency.lang,
            },
        ],
        routes: [],
        calendar: buildCalendar(graph.schedules),
        calendarDates: buildCalendarDates(graph),
        trips: [],
        shapes: [],
        stopTimes: [],
        ...buildFares(graph, agency),
    };

    for (const route of graph.routes) {
        const served = scheduledTrips(route);
        if (served.length === 0) continue;

        const line = route.lineIndex === null ? undefined : graph.lines[route.lineIndex];
        schedule.routes.push({
            route_id: route.code,
            agency_id: agency.id,
            route_short_name: route.names.short,
            route_long_name: route.names.english,
            route_type: ROUTE_TYPE_METRO,
            route_color: (line?.color ?? "").replace(/^#/, ""),
        });

        const shape = routeShape(graph, route);
        shape.forEach((point, idx) => {
            schedule.shapes.push({
                shape_id: shapeId(route),
                shape_pt_lat: String(point.lat),
                shape_pt_lon: String(point.lng),
                shape_pt_sequence: String(idx),
            });
        });

        const terminal = stationAt(graph, route.stationIndices[route.stationIndices.length - 1]);
        for (const { scheduleCode, trips } of served) {
            trips.forEach((trip, idx) => {
                const id = tripId(route, scheduleCode, idx);
                schedule.trips.push({
                    route_id: route.code,
                    service_id: scheduleCode,
                    trip_id: id,
                    trip_headsign: terminal?.names.english ?? "",
                    direction_id: String(route.idxWithinLine % 2),
                    shape_id: shape.length > 0 ? shapeId(route) : "",
                });
                trip.visits.forEach((visit, sequence) => {
                    const station = graph.stations[visit.stationIndex];
                    if (!station) return;
                    const time = formatMinuteOfDay(visit.minute);
                    schedule.stopTimes.push({
                        trip_id: id,
                        arrival_time: time,
                        departure_time: time,
                        stop_id: station.code,
                        stop_sequence: String(sequence),
                        timepoint: "1",
                    });
                });
            });
        }
    }

    return schedule;
}
