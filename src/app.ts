import { Hono } from "hono/quick";
import type { MiddlewareHandler } from "hono";
import { registerRoutes } from "./routes/index";
import { errorResponse } from "./routes/errors";
import type { dependency } from "./types/dependency";

export function createApp(deps: dependency, middleware: readonly MiddlewareHandler[] = []) {
    const app = new Hono();
    for (const handler of middleware) {
        app.use("*", handler);
    }
    app.onError(errorResponse);
    registerRoutes(app, deps);
    return app;
}
