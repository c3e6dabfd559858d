import { InvalidSymbolError, UnknownGeometryKindError } from "../errors";
import type { ProjectedPoint } from "../types";
import { decodeDigits } from "./value_codec";

export type GeometryKind = "point" | "line" | "area";

export type GeometryFailure = "TruncatedBlock" | "InvalidSymbol";

export type Geometry = {
    kind: GeometryKind;
    points: ProjectedPoint[];
    failure?: GeometryFailure;
};

const KIND_BY_SELECTOR = new Map<string, GeometryKind>([
    [".", "point"],
    ["-", "line"],
    ["*", "area"],
]);

const ABSOLUTE_BLOCK_LENGTH = 13;
const DELTA_BLOCK_LENGTH = 8;
const AXIS_DIGITS = 6;
const DELTA_DIGITS = 4;
const DELTA_FOLD = 2 ** 23;
const POINT_SCALE = 100;

const SEGMENT_SEPARATOR = "|";
const RESET_MARKER = ";";

export const foldDelta = (delta: number) => (delta > DELTA_FOLD ? DELTA_FOLD - delta : delta);

const isAbsoluteMarker = (ch: string) => ch === "=" || ch === "-";

type BlockResult = { ok: true; points: ProjectedPoint[] } | { ok: false; failure: GeometryFailure };

function decodeBlocks(body: string): BlockResult {
    const points: ProjectedPoint[] = [];
    let x = 0;
    let y = 0;
    let cursor = 0;

    while (cursor < body.length) {
        const marker = body.charAt(cursor);
        if (marker === RESET_MARKER) {
            x = 0;
            y = 0;
            cursor += 1;
            continue;
        }

        const absolute = isAbsoluteMarker(marker);
        const width = absolute ? ABSOLUTE_BLOCK_LENGTH : DELTA_BLOCK_LENGTH;
        if (body.length - cursor < width) {
            return { ok: false, failure: "TruncatedBlock" };
        }

        try {
            if (absolute) {
                x = decodeDigits(body, cursor + 1, AXIS_DIGITS);
                y = decodeDigits(body, cursor + 1 + AXIS_DIGITS, AXIS_DIGITS);
            } else {
                x += foldDelta(decodeDigits(body, cursor, DELTA_DIGITS));
                y += foldDelta(decodeDigits(body, cursor + DELTA_DIGITS, DELTA_DIGITS));
            }
        } catch (err) {
            if (err instanceof InvalidSymbolError) {
                return { ok: false, failure: "InvalidSymbol" };
            }
            throw err;
        }

        cursor += width;
        points.push({ x: x / POINT_SCALE, y: y / POINT_SCALE });
    }

    return { ok: true, points };
}

/**
 * Decodes one encoded geometry. The first character selects the kind; the
 * rest is a run of absolute, delta and reset blocks. Malformed bodies come
 * back as an empty geometry carrying a `failure`; only an unknown kind
 * selector throws.
 */
export function decodeGeometry(encoded: string): Geometry {
    if (encoded.length === 0) {
        return { kind: "point", points: [] };
    }

    const selector = encoded.charAt(0);
    const kind = KIND_BY_SELECTOR.get(selector);
    if (!kind) {
        throw new UnknownGeometryKindError(selector);
    }

    const result = decodeBlocks(encoded.slice(1));
    if (!result.ok) {
        return { kind, points: [], failure: result.failure };
    }
    return { kind, points: result.points };
}

export function decodeCombinedGeometry(encoded: string): Geometry[] {
    const geometries: Geometry[] = [];
    for (const segment of encoded.split(SEGMENT_SEPARATOR)) {
        let geometry: Geometry;
        try {
            geometry = decodeGeometry(segment);
        } catch (err) {
            if (err instanceof UnknownGeometryKindError) continue;
            throw err;
        }
        if (geometry.points.length > 0) {
            geometries.push(geometry);
        }
    }
    return geometries;
}
