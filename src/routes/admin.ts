import type { Hono } from "hono";
import { countTrips } from "../registry";
import type { dependency } from "../types/dependency";
import { errorResponse } from "./errors";

const requireAdminToken = (configured: string, headerToken?: string | null) => {
    if (!configured) return { ok: false as const, code: 500 as const, error: "ADMIN_TOKEN not configured" };
    if (!headerToken || headerToken.trim() !== configured) {
        return { ok: false as const, code: 401 as const, error: "UNAUTHORIZED" };
    }
    return { ok: true as const };
};

export function registerAdmin(app: Hono, deps: dependency) {
    app.post("/admin/cities/:code/load", async (c) => {
        const auth = requireAdminToken(deps.adminToken, c.req.header("x-admin-token"));
        if (!auth.ok) return c.json({ error: auth.error }, auth.code);

        const code = c.req.param("code");
        try {
            const graph = await deps.registry.loadCity(code);
            return c.json({
                status: "ok",
                city: code,
                version: graph.version,
                stations: graph.stations.length,
                routes: graph.routes.length,
                trips: countTrips(graph),
                warnings: graph.warnings.length,
            });
        } catch (err) {
            return errorResponse(err, c);
        }
    });

    app.get("/admin/cities/:code/runs/latest", async (c) => {
        const auth = requireAdminToken(deps.adminToken, c.req.header("x-admin-token"));
        if (!auth.ok) return c.json({ error: auth.error }, auth.code);
        const latest = await deps.runs.latest(c.req.param("code"));
        return c.json({ latest });
    });
}
