import { FIELD_DELIMITER, readRecords, toInt } from "../archive/records";
import type { SegmentationStrategy } from "../types";

export type TimingRecord = {
    departMinute: number;
    nextArrivalMinute: number;
};

// arrival minute at the next station -> departure minute at this station
export type HopTable = Map<number, number>;

export type SegmentedTimings = {
    strategy: SegmentationStrategy;
    // schedules[slot][hopPosition]
    schedules: HopTable[][];
};

// Records with a negative minute are dropped; they cannot be service times.
export function parseTimingRecords(text: string): TimingRecord[] {
    return readRecords(text, FIELD_DELIMITER)
        .map((record) => ({
            departMinute: toInt(record[0]),
            nextArrivalMinute: toInt(record[1]),
        }))
        .filter((record) => record.departMinute >= 0 && record.nextArrivalMinute >= 0);
}

// One record per hop, hops in position order, schedules back to back.
function segmentFixedCount(records: readonly TimingRecord[], hopCount: number, scheduleCount: number): HopTable[][] {
    const schedules: HopTable[][] = [];
    let cursor = 0;
    for (let slot = 0; slot < scheduleCount; slot++) {
        const hops: HopTable[] = [];
        for (let hop = 0; hop < hopCount; hop++) {
            const record = records[cursor];
            cursor += 1;
            const table: HopTable = new Map();
            if (record) table.set(record.nextArrivalMinute, record.departMinute);
            hops.push(table);
        }
        schedules.push(hops);
    }
    return schedules;
}

// A departure earlier than the previous one starts a new hop; once every hop
// of a schedule is filled it starts a new schedule instead.
function segmentByBoundaries(records: readonly TimingRecord[], hopCount: number): HopTable[][] {
    const schedules: HopTable[][] = [];
    let current: HopTable = new Map();
    let hops: HopTable[] = [current];
    let lastDepart = 0;

    for (const record of records) {
        if (record.departMinute < lastDepart) {
            current = new Map();
            if (hops.length === hopCount) {
                schedules.push(hops);
                hops = [current];
            } else {
                hops.push(current);
            }
        }
        current.set(record.nextArrivalMinute, record.departMinute);
        lastDepart = record.departMinute;
    }

    if (records.length > 0) schedules.push(hops);
    return schedules;
}

export function segmentTimings(
    records: readonly TimingRecord[],
    stationCount: number,
    scheduleCount: number,
): SegmentedTimings {
    const hopCount = stationCount - 1;
    if (records.length === hopCount * scheduleCount) {
        return { strategy: "fixed-count", schedules: segmentFixedCount(records, hopCount, scheduleCount) };
    }
    return { strategy: "boundary-detection", schedules: segmentByBoundaries(records, hopCount) };
}
