import { ddTraceMiddleware } from "./tracer";
import "dotenv/config";
import { serve } from "@hono/node-server";
import { cors } from "hono/cors";
import { createApp } from "./app";
import { closeCache, initCache, redisArchiveCache } from "./cache";
import { resolveAgency } from "./cities";
import { appConfig } from "./config";
import { startDb } from "./db/db";
import { createDbLoadRunStore } from "./db/load_runs";
import { createHttpArchiveSource } from "./fetch/archive_source";
import { fetchVersionCatalog } from "./fetch/version_catalog";
import { logger } from "./logger";
import { metrics } from "./metrics";
import { createCityRegistry } from "./registry";
import { readStationGeometries } from "./station_geometries";

async function main() {
    await initCache();

    const { sql, db } = startDb();
    const { archive } = appConfig;

    const catalog = await fetchVersionCatalog(archive.baseUrl, { timeoutMs: archive.fetchTimeoutMs });
    logger.info({ cities: catalog.cities.length }, "version catalog loaded");

    const runs = createDbLoadRunStore(db);
    const registry = createCityRegistry({
        catalog,
        source: createHttpArchiveSource({
            baseUrl: archive.baseUrl,
            timeoutMs: archive.fetchTimeoutMs,
            cache: redisArchiveCache,
            cacheTtlSeconds: archive.cacheTtlSeconds,
        }),
        runs,
        metrics,
        stationGeometries: appConfig.stationGeometriesPath
            ? await readStationGeometries(appConfig.stationGeometriesPath)
            : undefined,
    });

    if (appConfig.preloadCities.length > 0) {
        const outcomes = await registry.loadCities(appConfig.preloadCities, archive.fetchConcurrency);
        const failed = outcomes.filter((outcome) => !outcome.ok).map((outcome) => outcome.city);
        logger.info({ loaded: outcomes.length - failed.length, failed }, "preload finished");
    }

    const allowedOrigins = (process.env.CORS_ORIGINS ?? "")
        .split(",")
        .map((origin) => origin.trim())
        .filter(Boolean);

    const app = createApp(
        {
            registry,
            runs,
            resolveAgency: (code) => resolveAgency(code),
            adminToken: appConfig.adminToken,
            checkDb: async () => {
                await sql`select 1`;
            },
        },
        [
            ddTraceMiddleware,
            cors({
                origin: (origin) => {
                    if (!origin) return "";
                    return allowedOrigins.includes(origin) ? origin : "";
                },
                allowMethods: ["GET", "POST", "OPTIONS"],
                allowHeaders: ["Content-Type", "X-Admin-Token"],
            }),
        ],
    );

    const server = serve({ fetch: app.fetch, hostname: appConfig.server.host, port: appConfig.server.port }, (info) => {
        logger.info({ url: `http://${info.address}:${info.port}` }, "server listening");
    });

    const shutdown = (signal: string) => {
        logger.info({ signal }, "shutting down");
        server.close();
        Promise.all([closeCache(), sql.end()])
            .then(() => process.exit(0))
            .catch((err) => {
                logger.error({ err }, "shutdown failed");
                process.exit(1);
            });
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
}

main().catch((err) => {
    logger.error({ err }, "server failed to start");
    process.exit(1);
});
