import { parseTimingRecords, segmentTimings } from "./timings";

const records = (pairs: Array<[number, number]>) =>
    pairs.map(([departMinute, nextArrivalMinute]) => ({ departMinute, nextArrivalMinute }));

describe("parseTimingRecords", () => {
    it("reads departure and next-arrival minutes, skipping blank lines", () => {
        expect(parseTimingRecords("480,485\r\n\r\n490,495\n")).toEqual(records([[480, 485], [490, 495]]));
    });

    it("turns malformed numbers into 0", () => {
        expect(parseTimingRecords("abc,490\n500")).toEqual(records([[0, 490], [500, 0]]));
    });

    it("drops records with a negative minute", () => {
        expect(parseTimingRecords("480,485\n-5,490\n500,-1\n510,515")).toEqual(records([[480, 485], [510, 515]]));
    });
});

describe("segmentTimings", () => {
    it("uses one record per hop when the count matches exactly", () => {
        const result = segmentTimings(records([[1, 2], [3, 4], [5, 6], [7, 8]]), 3, 2);
        expect(result.strategy).toBe("fixed-count");
        expect(result.schedules).toEqual([
            [new Map([[2, 1]]), new Map([[4, 3]])],
            [new Map([[6, 5]]), new Map([[8, 7]])],
        ]);
    });

    it("splits hops and schedules on decreasing departures", () => {
        const result = segmentTimings(
            records([
                [360, 363],
                [370, 373],
                [363, 366],
                [373, 376],
                [300, 303],
                [330, 333],
                [303, 306],
                [333, 336],
            ]),
            3,
            2,
        );
        expect(result.strategy).toBe("boundary-detection");
        expect(result.schedules).toEqual([
            [
                new Map([
                    [363, 360],
                    [373, 370],
                ]),
                new Map([
                    [366, 363],
                    [376, 373],
                ]),
            ],
            [
                new Map([
                    [303, 300],
                    [333, 330],
                ]),
                new Map([
                    [306, 303],
                    [336, 333],
                ]),
            ],
        ]);
    });

    it("keeps the last departure for a repeated arrival", () => {
        const result = segmentTimings(records([[480, 485], [482, 485]]), 2, 1);
        expect(result.strategy).toBe("boundary-detection");
        expect(result.schedules).toEqual([[new Map([[485, 482]])]]);
    });

    it("yields no schedules for an empty table that does not match the count", () => {
        expect(segmentTimings([], 3, 2)).toEqual({ strategy: "boundary-detection", schedules: [] });
    });
});
