import type { Hono } from "hono";
import { buildCitySchedule } from "../export/schedule_rows";
import { packageGtfsZip, renderGtfsTables } from "../export/gtfs_zip";
import { countTrips } from "../registry";
import { mergeSchedules } from "../trips/schedules";
import type { CityGraph, Route, Schedule } from "../types";
import type { dependency } from "../types/dependency";

const zipResponse = (bytes: Buffer, fileName: string) =>
    new Response(new Uint8Array(bytes), {
        status: 200,
        headers: {
            "content-type": "application/zip",
            "content-disposition": `attachment; filename="${fileName}"`,
        },
    });

const describeRoute = (graph: CityGraph, route: Route) => {
    const schedules = route.scheduleCodes
        .map((code) => graph.schedules.find((schedule) => schedule.code === code))
        .filter((schedule): schedule is Schedule => schedule !== undefined);
    const line = route.lineIndex === null ? undefined : graph.lines[route.lineIndex];

    return {
        code: route.code,
        name: route.names.english,
        shortName: route.names.short,
        kind: route.kind,
        line: line?.code ?? null,
        stations: route.stationIndices.map((idx) => graph.stations[idx]?.code ?? ""),
        service: schedules.length > 0 ? mergeSchedules(schedules) : null,
        segmentation: route.segmentation,
        trips: route.trips.reduce((sum, trips) => sum + trips.length, 0),
    };
};

export function registerCityRoutes(app: Hono, deps: dependency) {
    // Looks up a loaded graph; a catalogued but unloaded city is still a 404.
    const loadedCity = (code: string) => {
        const graph = deps.registry.getCity(code);
        if (graph) return { ok: true as const, graph };
        const error = deps.registry.versionOf(code) ? `city ${code} is not loaded` : `city not found: ${code}`;
        return { ok: false as const, error };
    };

    app.get("/cities", (c) => {
        return c.json({
            available: deps.registry.catalog.cities,
            loaded: deps.registry.loadedCities(),
        });
    });

    app.get("/cities/:code", (c) => {
        const city = loadedCity(c.req.param("code"));
        if (!city.ok) return c.json({ error: city.error }, 404);
        const { graph } = city;
        return c.json({
            code: graph.cityCode,
            version: graph.version,
            stations: graph.stations.length,
            lines: graph.lines.length,
            routes: graph.routes.length,
            schedules: graph.schedules.map((schedule) => schedule.code),
            fares: graph.fares.length,
            trips: countTrips(graph),
            warnings: graph.warnings,
        });
    });

    app.get("/cities/:code/routes", (c) => {
        const city = loadedCity(c.req.param("code"));
        if (!city.ok) return c.json({ error: city.error }, 404);
        const { graph } = city;
        return c.json({ routes: graph.routes.map((route) => describeRoute(graph, route)) });
    });

    app.get("/cities/:code/gtfs.zip", (c) => {
        const code = c.req.param("code");
        const city = loadedCity(code);
        if (!city.ok) return c.json({ error: city.error }, 404);

        const schedule = buildCitySchedule(city.graph, deps.resolveAgency(code));
        return zipResponse(packageGtfsZip(renderGtfsTables(schedule)), `${code}-gtfs.zip`);
    });

    app.get("/cities/:code/raw.zip", (c) => {
        const code = c.req.param("code");
        const archive = deps.registry.getRawArchive(code);
        if (!archive) return c.json({ error: `city ${code} is not loaded` }, 404);
        return zipResponse(archive, `${code}-${deps.registry.versionOf(code) ?? "archive"}.zip`);
    });
}
