export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type FetchOptions = {
    timeoutMs: number;
    fetchImpl?: FetchLike;
};

export class ArchiveFetchError extends Error {
    // null when no response arrived (timeout, connection failure)
    status: number | null;

    constructor(message: string, status: number | null) {
        super(message);
        this.name = "ArchiveFetchError";
        this.status = status;
    }
}

export async function fetchOk(url: string, options: FetchOptions): Promise<Response> {
    const fetchImpl = options.fetchImpl ?? fetch;

    let response: Response;
    try {
        response = await fetchImpl(url, { signal: AbortSignal.timeout(options.timeoutMs) });
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new ArchiveFetchError(`Fetch failed for ${url}: ${message}`, null);
    }

    if (!response.ok) {
        throw new ArchiveFetchError(`Fetch failed for ${url} with status ${response.status}`, response.status);
    }
    return response;
}
