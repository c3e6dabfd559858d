import { createHttpArchiveSource, type ArchiveCache } from "./archive_source";

class MemoryArchiveCache implements ArchiveCache {
    readonly entries = new Map<string, { value: Buffer; ttlSeconds: number }>();

    async get(key: string) {
        return this.entries.get(key)?.value ?? null;
    }

    async set(key: string, value: Buffer, ttlSeconds: number) {
        this.entries.set(key, { value, ttlSeconds });
    }
}

const zipBytes = Buffer.from([0x50, 0x4b, 0x05, 0x06]);

describe("createHttpArchiveSource", () => {
    it("downloads {base}/{city}/{version}.zip and caches it", async () => {
        const cache = new MemoryArchiveCache();
        const fetchImpl = jest.fn(async (_url: string) => new Response(new Uint8Array(zipBytes)));
        const source = createHttpArchiveSource({
            baseUrl: "https://archive.test/v1",
            timeoutMs: 1000,
            cache,
            cacheTtlSeconds: 60,
            fetchImpl,
        });

        const bytes = await source.fetchArchive("bj", "20250301");
        expect(bytes.equals(zipBytes)).toBe(true);
        expect(fetchImpl.mock.calls[0]?.[0]).toBe("https://archive.test/v1/bj/20250301.zip");
        expect(cache.entries.get("archive:bj:20250301")?.ttlSeconds).toBe(60);
    });

    it("serves a cached archive without fetching", async () => {
        const cache = new MemoryArchiveCache();
        await cache.set("archive:bj:20250301", zipBytes, 60);
        const fetchImpl = jest.fn(async (_url: string) => new Response("unused"));
        const source = createHttpArchiveSource({ baseUrl: "https://archive.test/v1", timeoutMs: 1000, cache, fetchImpl });

        expect((await source.fetchArchive("bj", "20250301")).equals(zipBytes)).toBe(true);
        expect(fetchImpl).not.toHaveBeenCalled();
    });

    it("falls through to the network when the cache fails", async () => {
        const cache: ArchiveCache = {
            get: async () => {
                throw new Error("redis down");
            },
            set: async () => {
                throw new Error("redis down");
            },
        };
        const fetchImpl = async () => new Response(new Uint8Array(zipBytes));
        const source = createHttpArchiveSource({ baseUrl: "https://archive.test/v1", timeoutMs: 1000, cache, fetchImpl });

        expect((await source.fetchArchive("bj", "20250301")).equals(zipBytes)).toBe(true);
    });

    it("reports the HTTP status of a failed download", async () => {
        const fetchImpl = async () => new Response("missing", { status: 404 });
        const source = createHttpArchiveSource({ baseUrl: "https://archive.test/v1", timeoutMs: 1000, fetchImpl });

        await expect(source.fetchArchive("bj", "20250301")).rejects.toMatchObject({
            name: "ArchiveFetchError",
            status: 404,
        });
    });
});
