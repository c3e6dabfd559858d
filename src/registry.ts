import { loadCityGraph } from "./archive/loader";
import type { LoadRunStore } from "./db/load_runs";
import { CityNotFoundError } from "./errors";
import type { ArchiveSource } from "./fetch/archive_source";
import type { VersionCatalog } from "./fetch/version_catalog";
import { logger } from "./logger";
import type { MetricsSink } from "./metrics";
import type { StationGeometries } from "./station_geometries";
import type { CityGraph } from "./types";

export type CityLoadOutcome =
    | { city: string; ok: true; graph: CityGraph }
    | { city: string; ok: false; error: string };

export type LoadedCitySummary = {
    code: string;
    version: string;
    loadedAt: string;
};

export type CityRegistry = {
    loadCity(code: string): Promise<CityGraph>;
    loadCities(codes: readonly string[], concurrency?: number): Promise<CityLoadOutcome[]>;
    getCity(code: string): CityGraph | undefined;
    getRawArchive(code: string): Buffer | undefined;
    versionOf(code: string): string | undefined;
    loadedCities(): LoadedCitySummary[];
    readonly catalog: VersionCatalog;
};

export type CityRegistryOptions = {
    catalog: VersionCatalog;
    source: ArchiveSource;
    runs: LoadRunStore;
    metrics?: MetricsSink;
    stationGeometries?: StationGeometries;
    now?: () => Date;
};

type LoadedCity = {
    graph: CityGraph;
    archive: Buffer;
    loadedAt: string;
};

const noopMetrics: MetricsSink = {
    increment: () => undefined,
    gauge: () => undefined,
    histogram: () => undefined,
};

export const countTrips = (graph: CityGraph) =>
    graph.routes.reduce((sum, route) => sum + route.trips.reduce((inner, trips) => inner + trips.length, 0), 0);

const graphStats = (graph: CityGraph): Record<string, unknown> => ({
    stations: graph.stations.length,
    lines: graph.lines.length,
    routes: graph.routes.length,
    schedules: graph.schedules.length,
    fares: graph.fares.length,
    trips: countTrips(graph),
    warnings: graph.warnings.length,
});

async function mapWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    worker: (item: T) => Promise<R>,
): Promise<R[]> {
    const results = new Array<R>(items.length);
    let next = 0;
    const lanes = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
        while (next < items.length) {
            const idx = next;
            next += 1;
            const item = items[idx];
            if (item === undefined) continue;
            results[idx] = await worker(item);
        }
    });
    await Promise.all(lanes);
    return results;
}

export function createCityRegistry(options: CityRegistryOptions): CityRegistry {
    const { catalog, source, runs, stationGeometries } = options;
    const metrics = options.metrics ?? noopMetrics;
    const now = options.now ?? (() => new Date());
    const cities = new Map<string, LoadedCity>();

    // Run bookkeeping never changes the outcome of a load.
    const startRun = async (code: string, version: string): Promise<string | null> => {
        try {
            return await runs.start(code, version);
        } catch (err) {
            logger.warn({ err, city: code, version }, "load run start not recorded");
            return null;
        }
    };

    const finishRun = async (
        runId: string | null,
        status: "success" | "failed",
        stats: Record<string, unknown>,
        error?: Record<string, unknown>,
    ) => {
        if (!runId) return;
        try {
            await runs.finish(runId, status, stats, error);
        } catch (err) {
            logger.warn({ err, runId, status }, "load run result not recorded");
        }
    };

    const loadCity = async (code: string): Promise<CityGraph> => {
        const version = catalog.versionOf(code);
        if (!version) throw new CityNotFoundError(code);

        const runId = await startRun(code, version);
        const startedMs = Date.now();
        const tags = { city: code };

        let graph: CityGraph;
        try {
            const archive = await source.fetchArchive(code, version);
            graph = loadCityGraph(archive, {
                cityCode: code,
                version,
                stationGeometries: stationGeometries?.get(code),
            });
            cities.set(code, { graph, archive, loadedAt: now().toISOString() });
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            metrics.increment("city.load.failure", tags);
            logger.error({ err, city: code, version, runId }, "city load failed");
            await finishRun(runId, "failed", {}, { message });
            throw err;
        }

        const stats = graphStats(graph);
        await finishRun(runId, "success", stats);
        metrics.increment("city.load.success", tags);
        metrics.histogram("city.load.duration_ms", Date.now() - startedMs, tags);
        metrics.gauge("city.trips", countTrips(graph), tags);
        logger.info({ city: code, version, runId, ...stats }, "city loaded");
        return graph;
    };

    return {
        catalog,
        loadCity,

        async loadCities(codes, concurrency = 4) {
            return mapWithConcurrency(codes, concurrency, async (code): Promise<CityLoadOutcome> => {
                try {
                    return { city: code, ok: true, graph: await loadCity(code) };
                } catch (err) {
                    return { city: code, ok: false, error: err instanceof Error ? err.message : String(err) };
                }
            });
        },

        getCity: (code) => cities.get(code)?.graph,
        getRawArchive: (code) => cities.get(code)?.archive,
        versionOf: (code) => catalog.versionOf(code),
        loadedCities: () =>
            [...cities.entries()].map(([code, loaded]) => ({
                code,
                version: loaded.graph.version,
                loadedAt: loaded.loadedAt,
            })),
    };
}
