import type { Hono } from "hono";
import type { dependency } from "../types/dependency";

export function registerHealth(app: Hono, deps: dependency) {
    app.get("/health", async (c) => {
        await deps.checkDb();
        return c.text("ok");
    });
}
