#!/usr/bin/env node
import "dotenv/config";
import { writeFile } from "node:fs/promises";
import { resolveAgency } from "../cities";
import { appConfig } from "../config";
import { createMemoryLoadRunStore } from "../db/load_runs";
import { buildCitySchedule } from "../export/schedule_rows";
import { packageGtfsZip, renderGtfsTables, writeDebugTables } from "../export/gtfs_zip";
import { createHttpArchiveSource } from "../fetch/archive_source";
import { fetchVersionCatalog } from "../fetch/version_catalog";
import { logger } from "../logger";
import { createCityRegistry } from "../registry";
import { readStationGeometries } from "../station_geometries";

const USAGE = "usage: export-city <city> [outFile] [--debug]";
const DEBUG_DIR = "debug";

async function main() {
    const args = process.argv.slice(2);
    const debug = args.includes("--debug");
    const [city, outFile] = args.filter((arg) => !arg.startsWith("--"));
    if (!city) throw new Error(USAGE);

    const { archive } = appConfig;
    const catalog = await fetchVersionCatalog(archive.baseUrl, { timeoutMs: archive.fetchTimeoutMs });
    const registry = createCityRegistry({
        catalog,
        source: createHttpArchiveSource({ baseUrl: archive.baseUrl, timeoutMs: archive.fetchTimeoutMs }),
        runs: createMemoryLoadRunStore(),
        stationGeometries: appConfig.stationGeometriesPath
            ? await readStationGeometries(appConfig.stationGeometriesPath)
            : undefined,
    });

    const graph = await registry.loadCity(city);
    const tables = renderGtfsTables(buildCitySchedule(graph, resolveAgency(city)));

    const target = outFile ?? `${city}-gtfs.zip`;
    await writeFile(target, packageGtfsZip(tables));
    if (debug) await writeDebugTables(DEBUG_DIR, tables);

    logger.info(
        {
            city,
            version: graph.version,
            out: target,
            debugDir: debug ? DEBUG_DIR : undefined,
            warnings: graph.warnings.length,
        },
        "gtfs feed written",
    );
}

main().catch((err) => {
    logger.error({ err }, "export failed");
    process.exit(1);
});
