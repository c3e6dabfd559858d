import type { Coordinate, ProjectedPoint } from "../types";
import mercatorBands from "./mercator_bands.json";

// Datum conversions between the provider's projected plane, BD-09, GCJ-02 and WGS-84.

const X_PI = (Math.PI * 3000.0) / 180.0;
const KRASOVSKY_AXIS = 6378245.0;
const KRASOVSKY_ECCENTRICITY_SQ = 0.00669342162296594323;

const CHINA_BOUNDS = {
    minLng: 72.004,
    maxLng: 137.8347,
    minLat: 0.8293,
    maxLat: 55.8271,
} as const;

const signOf = (value: number) => (value < 0 || Object.is(value, -0) ? -1 : 1);

const bandFor = (absY: number): readonly number[] => {
    const { breakpoints, coefficients } = mercatorBands;
    for (let i = 0; i < breakpoints.length; i++) {
        const limit = breakpoints[i];
        const table = coefficients[i];
        if (limit !== undefined && table && absY >= limit) return table;
    }
    return coefficients[coefficients.length - 1] ?? [];
};

export function providerMercatorToBd09(point: ProjectedPoint): Coordinate {
    const table = bandFor(Math.abs(point.y));
    const c = (i: number) => table[i] ?? 0;

    const lng = c(0) + c(1) * Math.abs(point.x);
    const d = Math.abs(point.y) / c(9);
    const lat =
        c(2) + c(3) * d + c(4) * d ** 2 + c(5) * d ** 3 + c(6) * d ** 4 + c(7) * d ** 5 + c(8) * d ** 6;

    return {
        lat: lat * signOf(point.y),
        lng: lng * signOf(point.x),
    };
}

export function bd09ToGcj02(coord: Coordinate): Coordinate {
    const x = coord.lng - 0.0065;
    const y = coord.lat - 0.006;
    const z = Math.sqrt(x * x + y * y) - 0.00002 * Math.sin(y * X_PI);
    const theta = Math.atan2(y, x) - 0.000003 * Math.cos(x * X_PI);
    return {
        lat: z * Math.sin(theta),
        lng: z * Math.cos(theta),
    };
}

export function gcj02ToBd09(coord: Coordinate): Coordinate {
    const x = coord.lng;
    const y = coord.lat;
    const z = Math.sqrt(x * x + y * y) + 0.00002 * Math.sin(y * X_PI);
    const theta = Math.atan2(y, x) + 0.000003 * Math.cos(x * X_PI);
    return {
        lat: z * Math.sin(theta) + 0.006,
        lng: z * Math.cos(theta) + 0.0065,
    };
}

export const isOutOfChina = (coord: Coordinate) =>
    coord.lng < CHINA_BOUNDS.minLng ||
    coord.lng > CHINA_BOUNDS.maxLng ||
    coord.lat < CHINA_BOUNDS.minLat ||
    coord.lat > CHINA_BOUNDS.maxLat;

const transformLat = (x: number, y: number) => {
    let ret = -100.0 + 2.0 * x + 3.0 * y + 0.2 * y * y + 0.1 * x * y + 0.2 * Math.sqrt(Math.abs(x));
    ret += ((20.0 * Math.sin(6.0 * x * Math.PI) + 20.0 * Math.sin(2.0 * x * Math.PI)) * 2.0) / 3.0;
    ret += ((20.0 * Math.sin(y * Math.PI) + 40.0 * Math.sin((y / 3.0) * Math.PI)) * 2.0) / 3.0;
    ret += ((160.0 * Math.sin((y / 12.0) * Math.PI) + 320 * Math.sin((y * Math.PI) / 30.0)) * 2.0) / 3.0;
    return ret;
};

const transformLng = (x: number, y: number) => {
    let ret = 300.0 + x + 2.0 * y + 0.1 * x * x + 0.1 * x * y + 0.1 * Math.sqrt(Math.abs(x));
    ret += ((20.0 * Math.sin(6.0 * x * Math.PI) + 20.0 * Math.sin(2.0 * x * Math.PI)) * 2.0) / 3.0;
    ret += ((20.0 * Math.sin(x * Math.PI) + 40.0 * Math.sin((x / 3.0) * Math.PI)) * 2.0) / 3.0;
    ret += ((150.0 * Math.sin((x / 12.0) * Math.PI) + 300.0 * Math.sin((x / 30.0) * Math.PI)) * 2.0) / 3.0;
    return ret;
};

// Offset between WGS-84 and GCJ-02, evaluated at the given point.
const gcj02Offset = (coord: Coordinate): Coordinate => {
    const radLat = (coord.lat / 180.0) * Math.PI;
    let magic = Math.sin(radLat);
    magic = 1 - KRASOVSKY_ECCENTRICITY_SQ * magic * magic;
    const sqrtMagic = Math.sqrt(magic);

    const dLat = transformLat(coord.lng - 105.0, coord.lat - 35.0);
    const dLng = transformLng(coord.lng - 105.0, coord.lat - 35.0);
    return {
        lat: (dLat * 180.0) / (((KRASOVSKY_AXIS * (1 - KRASOVSKY_ECCENTRICITY_SQ)) / (magic * sqrtMagic)) * Math.PI),
        lng: (dLng * 180.0) / ((KRASOVSKY_AXIS / sqrtMagic) * Math.cos(radLat) * Math.PI),
    };
};

/**
 * Single-step approximation: the offset is evaluated at the GCJ-02 point
 * itself, so applying it twice does not return the original value.
 */
export function gcj02ToWgs84(coord: Coordinate): Coordinate {
    if (isOutOfChina(coord)) return { lat: coord.lat, lng: coord.lng };
    const offset = gcj02Offset(coord);
    return {
        lat: coord.lat - offset.lat,
        lng: coord.lng - offset.lng,
    };
}

export function wgs84ToGcj02(coord: Coordinate): Coordinate {
    if (isOutOfChina(coord)) return { lat: coord.lat, lng: coord.lng };
    const offset = gcj02Offset(coord);
    return {
        lat: coord.lat + offset.lat,
        lng: coord.lng + offset.lng,
    };
}

export const providerMercatorToWgs84 = (point: ProjectedPoint): Coordinate =>
    gcj02ToWgs84(bd09ToGcj02(providerMercatorToBd09(point)));
