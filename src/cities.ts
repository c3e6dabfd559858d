import fs from "node:fs";
import path from "node:path";
import { appConfig, type AppConfig } from "./config";
import type { AgencyInfo } from "./export/schedule_rows";
import { logger } from "./logger";

export type CityInfo = {
    code: string;
    englishName: string;
};

const CANDIDATE_PATHS = [
    path.resolve(__dirname, "../data/cities.json"),
    path.resolve(__dirname, "../../data/cities.json"),
];

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === "object" && value !== null && !Array.isArray(value);

export function parseCityTable(raw: unknown): Map<string, CityInfo> {
    if (!Array.isArray(raw)) throw new Error("city table must be a JSON array");

    const cities = new Map<string, CityInfo>();
    for (const entry of raw) {
        if (!isRecord(entry)) continue;
        const { code, englishName } = entry;
        if (typeof code !== "string" || !code.trim()) continue;
        if (cities.has(code)) continue;
        cities.set(code, {
            code,
            englishName: typeof englishName === "string" ? englishName : code,
        });
    }
    return cities;
}

let cityTable: Map<string, CityInfo> | null = null;

const loadCityTable = (): Map<string, CityInfo> => {
    if (cityTable) return cityTable;
    const file = CANDIDATE_PATHS.find((candidate) => fs.existsSync(candidate));
    if (!file) {
        logger.warn({ candidates: CANDIDATE_PATHS }, "city table not found; using codes as names");
        cityTable = new Map();
        return cityTable;
    }
    cityTable = parseCityTable(JSON.parse(fs.readFileSync(file, "utf8")));
    return cityTable;
};

export const cityInfo = (code: string): CityInfo | undefined => loadCityTable().get(code);

export function resolveAgency(code: string, config: Pick<AppConfig, "agency"> = appConfig): AgencyInfo {
    const info = cityInfo(code);
    return {
        id: code,
        name: `${config.agency.namePrefix} ${info?.englishName ?? code}`,
        url: config.agency.url,
        timezone: config.agency.timezone,
        lang: config.agency.lang,
        currency: config.agency.currency,
    };
}
