import { logger } from "../logger";
import { fetchOk, type FetchLike } from "./http";

export type ArchiveCache = {
    get(key: string): Promise<Buffer | null>;
    set(key: string, value: Buffer, ttlSeconds: number): Promise<void>;
};

export type ArchiveSource = {
    fetchArchive(cityCode: string, version: string): Promise<Buffer>;
};

export type HttpArchiveSourceOptions = {
    baseUrl: string;
    timeoutMs: number;
    cache?: ArchiveCache;
    cacheTtlSeconds?: number;
    fetchImpl?: FetchLike;
};

export const archiveCacheKey = (cityCode: string, version: string) => `archive:${cityCode}:${version}`;

export function createHttpArchiveSource(options: HttpArchiveSourceOptions): ArchiveSource {
    const { baseUrl, timeoutMs, cache, cacheTtlSeconds = 86_400, fetchImpl } = options;

    const readCache = async (key: string): Promise<Buffer | null> => {
        if (!cache) return null;
        try {
            return await cache.get(key);
        } catch (err) {
            logger.warn({ err, key }, "archive cache read failed");
            return null;
        }
    };

    const writeCache = async (key: string, bytes: Buffer) => {
        if (!cache) return;
        try {
            await cache.set(key, bytes, cacheTtlSeconds);
        } catch (err) {
            logger.warn({ err, key }, "archive cache write failed");
        }
    };

    return {
        async fetchArchive(cityCode, version) {
            const key = archiveCacheKey(cityCode, version);
            const cached = await readCache(key);
            if (cached) {
                logger.debug({ city: cityCode, version }, "archive cache hit");
                return cached;
            }

            const url = `${baseUrl}/${encodeURIComponent(cityCode)}/${encodeURIComponent(version)}.zip`;
            const response = await fetchOk(url, { timeoutMs, fetchImpl });
            const bytes = Buffer.from(await response.arrayBuffer());
            logger.info({ city: cityCode, version, bytes: bytes.length }, "archive downloaded");

            await writeCache(key, bytes);
            return bytes;
        },
    };
}
