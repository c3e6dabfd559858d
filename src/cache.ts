import { createClient, commandOptions } from "redis";
import type { ArchiveCache } from "./fetch/archive_source";
import { logger } from "./logger";

const CACHE_PREFIX = "transitbundle:";
const REDIS_URL = process.env.REDIS_URL ?? "redis://127.0.0.1:6379";
type RedisClient = ReturnType<typeof createClient>;

let redisClient: RedisClient | null = null;
let connectPromise: Promise<RedisClient> | null = null;

const toRedisKey = (key: string) => `${CACHE_PREFIX}${key}`;

const getRedisClient = async (): Promise<RedisClient> => {
    if (redisClient?.isOpen) {
        return redisClient;
    }
    if (connectPromise) {
        return connectPromise;
    }

    const client = createClient({ url: REDIS_URL });
    client.on("error", (err: Error) => {
        logger.error({ err }, "redis error");
    });

    connectPromise = client
        .connect()
        .then(() => {
            redisClient = client;
            connectPromise = null;
            return client;
        })
        .catch((err) => {
            connectPromise = null;
            throw err;
        });

    const connected = await connectPromise;
    return connected;
};

export const initCache = async () => {
    const client = await getRedisClient();
    await client.ping();
    logger.info({ url: REDIS_URL }, "redis connected");
};

export const closeCache = async () => {
    if (!redisClient?.isOpen) return;
    await redisClient.quit();
    redisClient = null;
};

export const getCacheBuffer = async (key: string): Promise<Buffer | null> => {
    const client = await getRedisClient();
    const raw = await client.get(commandOptions({ returnBuffers: true }), toRedisKey(key));
    if (!raw || typeof raw === "string") return null;
    return Buffer.from(raw);
};

export const setCacheBuffer = async (key: string, value: Buffer, ttlSeconds: number): Promise<void> => {
    const client = await getRedisClient();
    await client.set(toRedisKey(key), value, {
        EX: Math.max(1, Math.floor(ttlSeconds)),
    });
};

export const redisArchiveCache: ArchiveCache = {
    get: getCacheBuffer,
    set: setCacheBuffer,
};
