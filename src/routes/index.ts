import type { Hono } from "hono";
import type { dependency } from "../types/dependency";
import { registerRoot } from "./root";
import { registerHealth } from "./health";
import { registerCityRoutes } from "./cities";
import { registerAdmin } from "./admin";

export function registerRoutes(app: Hono, deps: dependency) {
    registerRoot(app);
    registerHealth(app, deps);
    registerCityRoutes(app, deps);
    registerAdmin(app, deps);
}
