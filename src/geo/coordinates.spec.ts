import {
    bd09ToGcj02,
    gcj02ToBd09,
    gcj02ToWgs84,
    isOutOfChina,
    providerMercatorToBd09,
    providerMercatorToWgs84,
    wgs84ToGcj02,
} from "./coordinates";

const BEIJING = { lat: 39.9087, lng: 116.3975 };

describe("providerMercatorToBd09", () => {
    it("evaluates the lowest band at the origin", () => {
        expect(providerMercatorToBd09({ x: 0, y: 0 })).toEqual({
            lat: -3.068298e-8,
            lng: 2.890871144776878e-9,
        });
    });

    it("treats negative zero as negative", () => {
        expect(providerMercatorToBd09({ x: -0, y: -0 })).toEqual({
            lat: 3.068298e-8,
            lng: -2.890871144776878e-9,
        });
    });

    it("picks the band from |y|", () => {
        const low = providerMercatorToBd09({ x: 1e7, y: 100 });
        const high = providerMercatorToBd09({ x: 1e7, y: 9e6 });
        expect(low.lng).toBeCloseTo(2.890871144776878e-9 + 0.000008983055095805407 * 1e7, 12);
        expect(high.lng).toBeCloseTo(-7.435856389565537e-9 + 0.000008983055097726239 * 1e7, 12);
        expect(Math.abs(low.lng - high.lng)).toBeGreaterThan(1e-9);
    });

    it("uses the top band at its breakpoint", () => {
        const result = providerMercatorToBd09({ x: 1e6, y: 12890594.86 });
        expect(result.lng).toBeCloseTo(1.410526172116255e-8 + 0.00000898305509648872 * 1e6, 12);
    });

    it("mirrors the output for negative inputs", () => {
        const positive = providerMercatorToBd09({ x: 12958160.97, y: 4825923.77 });
        const negative = providerMercatorToBd09({ x: -12958160.97, y: -4825923.77 });
        expect(negative).toEqual({ lat: -positive.lat, lng: -positive.lng });
    });
});

describe("BD-09 / GCJ-02", () => {
    it("round-trips within a few metres", () => {
        const back = bd09ToGcj02(gcj02ToBd09(BEIJING));
        expect(back.lat).toBeCloseTo(BEIJING.lat, 4);
        expect(back.lng).toBeCloseTo(BEIJING.lng, 4);
    });
});

describe("GCJ-02 / WGS-84", () => {
    it("leaves points outside China untouched", () => {
        const london = { lat: 51.5, lng: -0.12 };
        expect(isOutOfChina(london)).toBe(true);
        expect(gcj02ToWgs84(london)).toEqual(london);
        expect(wgs84ToGcj02(london)).toEqual(london);
    });

    it("treats the bounding box edges as inside", () => {
        expect(isOutOfChina({ lat: 30, lng: 72.004 })).toBe(false);
        expect(isOutOfChina({ lat: 55.8271, lng: 100 })).toBe(false);
        expect(isOutOfChina({ lat: 30, lng: 72.003 })).toBe(true);
    });

    it("shifts points inside China by the datum offset", () => {
        const wgs = gcj02ToWgs84(BEIJING);
        expect(Math.abs(wgs.lat - BEIJING.lat)).toBeGreaterThan(1e-4);
        expect(Math.abs(wgs.lng - BEIJING.lng)).toBeGreaterThan(1e-4);
    });

    it("approximately inverts wgs84ToGcj02", () => {
        const back = gcj02ToWgs84(wgs84ToGcj02(BEIJING));
        expect(back.lat).toBeCloseTo(BEIJING.lat, 4);
        expect(back.lng).toBeCloseTo(BEIJING.lng, 4);
    });

    it("is not idempotent", () => {
        const once = gcj02ToWgs84(BEIJING);
        const twice = gcj02ToWgs84(once);
        expect(twice.lat).not.toBeCloseTo(once.lat, 6);
    });
});

describe("providerMercatorToWgs84", () => {
    it("lands a central Beijing projected point in central Beijing", () => {
        const result = providerMercatorToWgs84({ x: 12958160.97, y: 4825923.77 });
        expect(result.lat).toBeGreaterThan(39.85);
        expect(result.lat).toBeLessThan(39.95);
        expect(result.lng).toBeGreaterThan(116.35);
        expect(result.lng).toBeLessThan(116.45);
    });
});
