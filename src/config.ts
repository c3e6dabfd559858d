const parseNumber = (value: string | undefined, fallback: number): number => {
    if (!value) return fallback;
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
    return parsed;
};

const parseList = (value: string | undefined): string[] =>
    (value ?? "")
        .split(",")
        .map((item) => item.trim())
        .filter(Boolean);

const DEFAULT_ARCHIVE_BASE_URL = "https://metroman.oss-cn-hangzhou.aliyuncs.com/app/metromanandroid/v202005";

export const appConfig = Object.freeze({
    archive: {
        baseUrl: (process.env.ARCHIVE_BASE_URL ?? DEFAULT_ARCHIVE_BASE_URL).replace(/\/+$/, ""),
        fetchTimeoutMs: parseNumber(process.env.ARCHIVE_FETCH_TIMEOUT_MS, 30_000),
        fetchConcurrency: Math.floor(parseNumber(process.env.ARCHIVE_FETCH_CONCURRENCY, 4)),
        cacheTtlSeconds: parseNumber(process.env.ARCHIVE_CACHE_TTL_SEC, 86_400),
    },
    agency: {
        namePrefix: process.env.AGENCY_NAME_PREFIX ?? "Transit Bundle",
        url: process.env.AGENCY_URL ?? "https://example.com",
        timezone: process.env.AGENCY_TIMEZONE ?? "Asia/Shanghai",
        lang: process.env.AGENCY_LANG ?? "zh",
        currency: process.env.FARE_CURRENCY ?? "CNY",
    },
    server: {
        host: process.env.HOST ?? "0.0.0.0",
        port: parseNumber(process.env.PORT, 8080),
    },
    adminToken: process.env.ADMIN_TOKEN ?? "",
    stationGeometriesPath: process.env.STATION_GEOMETRIES_PATH ?? "",
    preloadCities: parseList(process.env.PRELOAD_CITIES),
});

export type AppConfig = typeof appConfig;
