import type { SegmentationStrategy, StationVisit, Trip } from "../types";
import { parseTimingRecords, segmentTimings, type HopTable } from "./timings";

export type RouteTimingContext = {
    code: string;
    stationIndices: readonly number[];
    hopPositionByStation: ReadonlyMap<number, number>;
    scheduleCount: number;
};

export type RouteTrips = {
    strategy: SegmentationStrategy;
    tripsBySchedule: Trip[][];
};

type TripDraft = {
    visits: StationVisit[];
    open: boolean;
};

const EMPTY_HOP: HopTable = new Map();

/**
 * Timing tables list hops by departure station index, not by position along
 * the route: every station but the terminal, sorted ascending, gets a rank.
 */
export function buildHopPositions(stationIndices: readonly number[]): Map<number, number> {
    const departures = [...stationIndices.slice(0, -1)].sort((a, b) => a - b);
    return new Map(departures.map((stationIndex, position): [number, number] => [stationIndex, position]));
}

/**
 * Chains per-hop records into trips for one schedule. A record extends a
 * trip when its departure equals an arrival the trip reached on the previous
 * hop; anything else starts a new trip. Each trip is extended at most once
 * per hop, and a trip that was not extended on a hop stays closed.
 */
export function reconstructTrips(hops: readonly HopTable[], route: RouteTimingContext): Trip[] {
    const stations = route.stationIndices;
    const drafts: TripDraft[] = [];
    // arrival minute at the current station -> draft index
    let continuation = new Map<number, number>();

    for (let hop = 0; hop < stations.length - 1; hop++) {
        const from = stations[hop];
        const to = stations[hop + 1];
        if (from === undefined || to === undefined) break;

        const position = route.hopPositionByStation.get(from);
        const table = (position === undefined ? undefined : hops[position]) ?? EMPTY_HOP;

        const wasOpen = drafts.map((draft) => draft.open);
        for (const draft of drafts) draft.open = false;

        const previous = continuation;
        continuation = new Map();

        for (const [arrival, departure] of table) {
            const draftIdx = previous.get(departure);
            if (draftIdx !== undefined) {
                const draft = drafts[draftIdx];
                if (draft && wasOpen[draftIdx] && !draft.open) {
                    draft.visits.push({ stationIndex: to, minute: arrival });
                    draft.open = true;
                    continuation.set(arrival, draftIdx);
                    continue;
                }
            }

            drafts.push({
                visits: [
                    { stationIndex: from, minute: departure },
                    { stationIndex: to, minute: arrival },
                ],
                open: true,
            });
            continuation.set(arrival, drafts.length - 1);
        }
    }

    return drafts.map((draft) => ({ visits: draft.visits }));
}

export function buildRouteTrips(route: RouteTimingContext, timingText: string): RouteTrips {
    const records = parseTimingRecords(timingText);
    const { strategy, schedules } = segmentTimings(records, route.stationIndices.length, route.scheduleCount);
    return {
        strategy,
        tripsBySchedule: schedules.map((hops) => reconstructTrips(hops, route)),
    };
}
