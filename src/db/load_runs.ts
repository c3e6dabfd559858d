import { randomUUID } from "node:crypto";
import { desc, eq } from "drizzle-orm";
import type { Database } from "./db";
import { cityLoadRuns, type LoadRunStatus } from "./schema/schema";

export type LoadRunRecord = {
    id: string;
    cityCode: string;
    version: string;
    status: LoadRunStatus;
    startedAt: string;
    finishedAt: string | null;
    statsJson: Record<string, unknown>;
    errorJson: Record<string, unknown> | null;
};

export type LoadRunStore = {
    start(cityCode: string, version: string): Promise<string>;
    finish(
        runId: string,
        status: Exclude<LoadRunStatus, "running">,
        stats: Record<string, unknown>,
        error?: Record<string, unknown>,
    ): Promise<void>;
    latest(cityCode: string): Promise<LoadRunRecord | null>;
};

export function createDbLoadRunStore(db: Database): LoadRunStore {
    return {
        async start(cityCode, version) {
            const [run] = await db
                .insert(cityLoadRuns)
                .values({ cityCode, version, status: "running" })
                .returning({ id: cityLoadRuns.id });
            if (!run) throw new Error(`failed to record load run for ${cityCode}`);
            return run.id;
        },

        async finish(runId, status, stats, error) {
            await db
                .update(cityLoadRuns)
                .set({
                    status,
                    finishedAt: new Date().toISOString(),
                    statsJson: stats,
                    errorJson: error ?? null,
                })
                .where(eq(cityLoadRuns.id, runId));
        },

        async latest(cityCode) {
            const [row] = await db
                .select({
                    id: cityLoadRuns.id,
                    cityCode: cityLoadRuns.cityCode,
                    version: cityLoadRuns.version,
                    status: cityLoadRuns.status,
                    startedAt: cityLoadRuns.startedAt,
                    finishedAt: cityLoadRuns.finishedAt,
                    statsJson: cityLoadRuns.statsJson,
                    errorJson: cityLoadRuns.errorJson,
                })
                .from(cityLoadRuns)
                .where(eq(cityLoadRuns.cityCode, cityCode))
                .orderBy(desc(cityLoadRuns.startedAt))
                .limit(1);
            return row ?? null;
        },
    };
}

// Used by one-off scripts that run without a database, and by tests.
export function createMemoryLoadRunStore(now: () => Date = () => new Date()): LoadRunStore {
    const runs: LoadRunRecord[] = [];
    return {
        async start(cityCode, version) {
            const id = randomUUID();
            runs.push({
                id,
                cityCode,
                version,
                status: "running",
                startedAt: now().toISOString(),
                finishedAt: null,
                statsJson: {},
                errorJson: null,
            });
            return id;
        },

        async finish(runId, status, stats, error) {
            const run = runs.find((candidate) => candidate.id === runId);
            if (!run) throw new Error(`unknown load run ${runId}`);
            run.status = status;
            run.finishedAt = now().toISOString();
            run.statsJson = stats;
            run.errorJson = error ?? null;
        },

        async latest(cityCode) {
            const matching = runs.filter((run) => run.cityCode === cityCode);
            const last = matching[matching.length - 1];
            return last ? { ...last } : null;
        },
    };
}
