import { MissingTableError } from "../errors";
import { gcj02ToWgs84, providerMercatorToWgs84 } from "../geo/coordinates";
import { FIXTURE_VERSION, buildArchive, sampleArchive, sampleTables } from "../test_support/archive_fixture";
import { absoluteBlock } from "../test_support/encoding";
import { loadCityGraph } from "./loader";

const load = (bytes = sampleArchive(), stationGeometries?: ReadonlyMap<string, string>) =>
    loadCityGraph(bytes, { cityCode: "xx", version: FIXTURE_VERSION, stationGeometries });

const visits = (...pairs: Array<[number, number]>) => ({
    visits: pairs.map(([stationIndex, minute]) => ({ stationIndex, minute })),
});

describe("loadCityGraph", () => {
    it("numbers stations contiguously in file order", () => {
        const graph = load();
        expect(graph.stations.map((station) => [station.index, station.code])).toEqual([
            [0, "XXS001"],
            [1, "XXS002"],
            [2, "XXS003"],
            [3, "XXS004"],
        ]);
        expect(graph.stationByCode.get("XXS003")).toBe(2);
    });

    it("reads station names and converts positions to WGS-84", () => {
        const [alpha] = load().stations;
        expect(alpha?.names).toEqual({
            english: "Alpha",
            simplified: "阿尔法",
            traditional: "阿爾法",
            japanese: "アルファ",
            englishShort: "ALP",
            short: "A",
        });
        expect(alpha?.position).toEqual(gcj02ToWgs84({ lat: 39.9, lng: 116.4 }));
        expect([alpha?.mapX, alpha?.mapY]).toEqual([10, 20]);
    });

    it("prefers a supplied station geometry over the table position", () => {
        const geometries = new Map([["XXS002", `.${absoluteBlock(1295816097, 482592377)}`]]);
        const graph = load(sampleArchive(), geometries);
        expect(graph.stations[1]?.position).toEqual(providerMercatorToWgs84({ x: 12958160.97, y: 4825923.77 }));
        expect(graph.stations[0]?.position).toEqual(gcj02ToWgs84({ lat: 39.9, lng: 116.4 }));
    });

    it("resolves line membership and kinds", () => {
        const graph = load();
        expect(graph.lines.map((line) => [line.code, line.kind, line.color, line.stationIndices])).toEqual([
            ["XXML01", "metro", "#C23A30", [0, 1, 2, 3]],
            ["XXWL01", "walking", "#888888", [1, 2]],
        ]);
    });

    it("links routes to their line and numbers directions within it", () => {
        const graph = load();
        expect(
            graph.routes.map((route) => [route.code, route.kind, route.stationIndices, route.lineIndex, route.idxWithinLine]),
        ).toEqual([
            ["XXMW01A", "metro", [0, 1, 2, 3], 0, 0],
            ["XXMW01B", "metro", [3, 2, 1, 0], 0, 1],
            ["XXWW01", "connector", [1, 2], 1, 0],
        ]);
        expect(graph.routes[1]?.hopPositionByStation).toEqual(
            new Map([
                [1, 0],
                [2, 1],
                [3, 2],
            ]),
        );
    });

    it("reconstructs trips per assigned schedule", () => {
        const [forward, reverse, connector] = load().routes;
        expect(forward?.scheduleCodes).toEqual(["WD", "WE"]);
        expect(forward?.segmentation).toBe("boundary-detection");
        expect(forward?.trips).toEqual([
            [visits([0, 360], [1, 363], [2, 366], [3, 369]), visits([0, 370], [1, 373], [2, 376], [3, 379])],
            [visits([0, 300], [1, 303], [2, 306], [3, 309]), visits([0, 330], [1, 333], [2, 336], [3, 339])],
        ]);
        expect(reverse?.segmentation).toBe("fixed-count");
        expect(reverse?.trips).toEqual([[visits([3, 400], [2, 403], [1, 406], [0, 409])]]);
        expect(connector?.trips).toEqual([]);
        expect(connector?.segmentation).toBeNull();
    });

    it("reports a route without a timing table as a warning", () => {
        expect(load().warnings).toEqual([
            { kind: "RouteTimingMissing", table: "XXWW01", detail: "XXWW01: no timing table" },
        ]);
    });

    it("reads schedules and holidays", () => {
        const graph = load();
        expect(graph.schedules).toEqual([
            { code: "WD", days: [true, true, true, true, true, false, false], holidays: false },
            { code: "WE", days: [false, false, false, false, false, true, true], holidays: true },
        ]);
        expect(graph.holidays).toEqual([
            { year: 2025, month: 1, day: 1 },
            { year: 2025, month: 10, day: 1 },
        ]);
    });

    it("builds fare matrices from external tables and fixed prices", () => {
        expect(load().fares).toEqual([
            {
                routeCodes: ["XXMW01A", "XXMW01B"],
                stationIndices: [0, 1, 2, 3],
                prices: [
                    [3, 3, 4, 5],
                    [3, 3, 3, 4],
                    [4, 3, 3, 3],
                    [5, 4, 3, 3],
                ],
            },
            {
                routeCodes: ["XXWW01"],
                stationIndices: [1, 2],
                prices: [
                    [2, 2],
                    [2, 2],
                ],
            },
        ]);
    });

    it("squares ragged fare matrices to the station count", () => {
        const tables = { ...sampleTables(), fare_matrix: "1,2,3,4,5\r\n6,7\r\n8" };
        expect(load(buildArchive(tables)).fares[0]?.prices).toEqual([
            [1, 2, 3, 4],
            [6, 7, 0, 0],
            [8, 0, 0, 0],
            [0, 0, 0, 0],
        ]);
    });

    it("slices line polylines between adjacent stations", () => {
        const paths = load().lines[0]?.stationPaths;
        expect([...(paths?.keys() ?? [])]).toEqual(["XXS001_XXS002", "XXS002_XXS003", "XXS003_XXS004"]);
        expect(paths?.get("XXS001_XXS002")).toEqual([
            gcj02ToWgs84({ lat: 39.9, lng: 116.4 }),
            gcj02ToWgs84({ lat: 39.905, lng: 116.405 }),
            gcj02ToWgs84({ lat: 39.91, lng: 116.41 }),
        ]);
    });

    it("skips dangling references with a warning", () => {
        const tables = {
            ...sampleTables(),
            line: "XXML01,0,1,9\r\nXXML99,0",
            wayschedule: "XXMW01A,0,WD,WE\r\nXXMW01B,0,WD,NOPE\r\nXXWW01,0,WD",
        };
        const graph = load(buildArchive(tables));
        expect(graph.lines[0]?.stationIndices).toEqual([0, 1]);
        expect(graph.routes[1]?.scheduleCodes).toEqual(["WD"]);
        expect(graph.warnings.filter((warning) => warning.kind !== "RouteTimingMissing")).toEqual([
            { kind: "DanglingReference", table: "line", detail: "XXML01: station index 9 out of range" },
            { kind: "DanglingReference", table: "line", detail: "unknown line XXML99" },
            { kind: "UnknownSchedule", table: "wayschedule", detail: "XXMW01B: unknown schedule NOPE" },
        ]);
    });

    it("turns unparsable coordinates into 0", () => {
        const tables = { ...sampleTables() };
        tables.uno = (tables.uno ?? "").replace("39.9000<,>116.4000", "abc<,>");
        expect(load(buildArchive(tables)).stations[0]?.position).toEqual({ lat: 0, lng: 0 });
    });

    it("fails with MissingTable when a required table is absent", () => {
        const tables = sampleTables();
        delete tables.fare;
        expect(() => load(buildArchive(tables))).toThrow(MissingTableError);
        expect(() => load(buildArchive(tables))).toThrow(`archive table missing: ${FIXTURE_VERSION}/fare.csv`);
    });

    it("fails with MissingTable when a referenced fare matrix is absent", () => {
        const tables = { ...sampleTables(), fare: "F1,XXMW01A,0,missing.csv," };
        expect(() => load(buildArchive(tables))).toThrow(`archive table missing: ${FIXTURE_VERSION}/missing.csv`);
    });

    it("assigns identical indices when the same bytes load twice", () => {
        const bytes = sampleArchive();
        expect(load(bytes)).toEqual(load(bytes));
    });

    it("freezes the loaded graph", () => {
        const graph = load();
        expect(Object.isFrozen(graph)).toBe(true);
        expect(Object.isFrozen(graph.stations)).toBe(true);
        expect(Object.isFrozen(graph.routes[0]?.trips[0])).toBe(true);
    });

    it("rejects changes through the graph's maps", () => {
        const graph = load();
        const paths = graph.lines[0]?.stationPaths;
        if (!paths) throw new Error("expected line paths");
        const mutate = (map: ReadonlyMap<unknown, unknown>, method: string, ...args: unknown[]) =>
            Reflect.apply(Reflect.get(map, method), map, args);

        expect(() => mutate(paths, "set", "XXS001_XXS002", [])).toThrow("city graph is read-only");
        expect(() => mutate(paths, "clear")).toThrow(TypeError);
        expect(() => mutate(graph.stationByCode, "set", "XXS001", 3)).toThrow(TypeError);
        expect(() => mutate(graph.routes[1]?.hopPositionByStation ?? new Map(), "delete", 1)).toThrow(TypeError);
        expect(Object.isFrozen(paths.get("XXS002_XXS003"))).toBe(true);

        expect(paths.get("XXS001_XXS002")).toHaveLength(3);
        expect(graph.stationByCode.get("XXS001")).toBe(0);
    });
});
