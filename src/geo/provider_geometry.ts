import type { Coordinate } from "../types";
import { providerMercatorToWgs84 } from "./coordinates";
import { decodeCombinedGeometry, type GeometryKind } from "./geometry_codec";

export type ProviderGeometry = {
    kind: GeometryKind;
    coordinates: Coordinate[];
};

export function decodeProviderGeometry(encoded: string): ProviderGeometry[] {
    return decodeCombinedGeometry(encoded).map((geometry) => ({
        kind: geometry.kind,
        coordinates: geometry.points.map(providerMercatorToWgs84),
    }));
}

// Point geometries win; otherwise the first vertex of whatever decoded.
export function stationPositionFromGeometry(encoded: string): Coordinate | undefined {
    const geometries = decodeProviderGeometry(encoded);
    const preferred = geometries.find((geometry) => geometry.kind === "point") ?? geometries[0];
    return preferred?.coordinates[0];
}
