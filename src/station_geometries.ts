import { readFile } from "node:fs/promises";

export type StationGeometries = ReadonlyMap<string, ReadonlyMap<string, string>>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * `{ [cityCode]: { [stationCode]: encodedGeometry } }`, as exported from the
 * provider's place search. Non-string encodings are dropped.
 */
export function parseStationGeometries(raw: unknown): StationGeometries {
    if (!isRecord(raw)) throw new Error("station geometries must be a JSON object");

    const byCity = new Map<string, Map<string, string>>();
    for (const [city, stations] of Object.entries(raw)) {
        if (!isRecord(stations)) continue;
        const byStation = new Map<string, string>();
        for (const [station, encoded] of Object.entries(stations)) {
            if (typeof encoded === "string" && encoded) byStation.set(station, encoded);
        }
        byCity.set(city, byStation);
    }
    return byCity;
}

export async function readStationGeometries(file: string): Promise<StationGeometries> {
    const text = await readFile(file, "utf8");
    return parseStationGeometries(JSON.parse(text));
}
