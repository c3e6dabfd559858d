import type { Context } from "hono";
import { MissingTableError, isTransitDataError } from "../errors";
import { ArchiveFetchError } from "../fetch/http";
import { logger } from "../logger";

type ErrorStatus = 404 | 500 | 502;

export function describeError(err: unknown): { status: ErrorStatus; body: Record<string, string> } {
    if (isTransitDataError(err, "CityNotFound")) {
        return { status: 404, body: { error: err.message } };
    }
    if (err instanceof MissingTableError) {
        return { status: 502, body: { error: err.message, path: err.path } };
    }
    if (err instanceof ArchiveFetchError) {
        return { status: 502, body: { error: err.message } };
    }
    return { status: 500, body: { error: err instanceof Error ? err.message : String(err) } };
}

export const errorResponse = (err: unknown, c: Context) => {
    const { status, body } = describeError(err);
    if (status === 500) {
        logger.error({ err, path: c.req.path }, "request failed");
    }
    return c.json(body, status);
};
