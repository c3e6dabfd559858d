import { index, jsonb, pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";

export type LoadRunStatus = "running" | "success" | "failed";

// One row per attempt to download and load a city archive.
export const cityLoadRuns = pgTable(
    "city_load_runs",
    {
        id: uuid("id").primaryKey().defaultRandom(),
        cityCode: text("city_code").notNull(),
        version: text("version").notNull(),
        status: text("status").$type<LoadRunStatus>().notNull().default("running"),
        startedAt: timestamp("started_at", { withTimezone: true, mode: "string" }).defaultNow().notNull(),
        finishedAt: timestamp("finished_at", { withTimezone: true, mode: "string" }),
        statsJson: jsonb("stats_json").$type<Record<string, unknown>>().notNull().default({}),
        errorJson: jsonb("error_json").$type<Record<string, unknown> | null>(),
        createdAt: timestamp("created_at", { withTimezone: true, mode: "string" }).defaultNow().notNull(),
    },
    (table) => ({
        cityStartedIdx: index("idx_city_load_runs_city_started").on(table.cityCode, table.startedAt),
    }),
);
