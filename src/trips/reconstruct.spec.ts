import { buildHopPositions, buildRouteTrips, reconstructTrips, type RouteTimingContext } from "./reconstruct";

const routeOver = (stationIndices: number[], scheduleCount = 1): RouteTimingContext => ({
    code: "XXMW01",
    stationIndices,
    hopPositionByStation: buildHopPositions(stationIndices),
    scheduleCount,
});

const trip = (...visits: Array<[number, number]>) => ({
    visits: visits.map(([stationIndex, minute]) => ({ stationIndex, minute })),
});

describe("buildHopPositions", () => {
    it("ranks every station but the terminal by index", () => {
        expect(buildHopPositions([3, 2, 1, 0])).toEqual(
            new Map([
                [1, 0],
                [2, 1],
                [3, 2],
            ]),
        );
        expect(buildHopPositions([4, 9, 6])).toEqual(
            new Map([
                [4, 0],
                [9, 1],
            ]),
        );
    });

    it("is empty for a single-station route", () => {
        expect(buildHopPositions([5]).size).toBe(0);
    });
});

describe("reconstructTrips", () => {
    it("extends a trip at most once per hop", () => {
        const hops = [
            new Map([[485, 480]]),
            new Map([
                [490, 485],
                [492, 485],
            ]),
        ];
        expect(reconstructTrips(hops, routeOver([0, 1, 2]))).toEqual([trip([0, 480], [1, 485], [2, 490]), trip([1, 485], [2, 492])]);
    });

    it("does not resume a trip that skipped a hop", () => {
        const hops = [
            new Map([
                [485, 480],
                [495, 490],
            ]),
            new Map([[490, 485]]),
            new Map([
                [500, 495],
                [495, 490],
            ]),
        ];
        expect(reconstructTrips(hops, routeOver([0, 1, 2, 3]))).toEqual([
            trip([0, 480], [1, 485], [2, 490], [3, 495]),
            trip([0, 490], [1, 495]),
            trip([2, 495], [3, 500]),
        ]);
    });

    it("treats a missing hop table as empty", () => {
        expect(reconstructTrips([new Map([[485, 480]])], routeOver([0, 1, 2]))).toEqual([trip([0, 480], [1, 485])]);
    });

    it("reads hop tables by departure-station rank on reversed routes", () => {
        const hops = [new Map([[409, 406]]), new Map([[406, 403]]), new Map([[403, 400]])];
        expect(reconstructTrips(hops, routeOver([3, 2, 1, 0]))).toEqual([trip([3, 400], [2, 403], [1, 406], [0, 409])]);
    });

    it("returns nothing for a route with fewer than two stations", () => {
        expect(reconstructTrips([new Map([[485, 480]])], routeOver([0]))).toEqual([]);
    });
});

describe("buildRouteTrips", () => {
    it("turns a single record into a two-visit trip", () => {
        expect(buildRouteTrips(routeOver([0, 1]), "480,485\n")).toEqual({
            strategy: "fixed-count",
            tripsBySchedule: [[trip([0, 480], [1, 485])]],
        });
    });

    it("chains records across hops and starts new trips where the chain breaks", () => {
        const result = buildRouteTrips(routeOver([0, 1, 2]), "480,485\n490,495\n485,490\n493,498\n");
        expect(result.strategy).toBe("boundary-detection");
        expect(result.tripsBySchedule).toEqual([
            [trip([0, 480], [1, 485], [2, 490]), trip([0, 490], [1, 495]), trip([1, 493], [2, 498])],
        ]);
    });

    it("builds one trip per first-hop record on a fixed-count reversed route", () => {
        const result = buildRouteTrips(routeOver([3, 2, 1, 0]), "406,409\r\n403,406\r\n400,403\r\n");
        expect(result).toEqual({
            strategy: "fixed-count",
            tripsBySchedule: [[trip([3, 400], [2, 403], [1, 406], [0, 409])]],
        });
    });
});
