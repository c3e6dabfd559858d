import { fetchOk, type FetchOptions } from "./http";

export type VersionCatalog = {
    readonly cities: readonly string[];
    versionOf(code: string): string | undefined;
};

const VERSION_TABLE = "version.txt";
const VERSION_RECORD_WIDTH = 3;

function parseCsvLine(line: string): string[] {
    const values: string[] = [];
    let current = "";
    let inQuotes = false;

    for (let i = 0; i < line.length; i++) {
        const ch = line[i];
        if (ch === '"') {
            if (inQuotes && line[i + 1] === '"') {
                current += '"';
                i++;
            } else {
                inQuotes = !inQuotes;
            }
            continue;
        }
        if (ch === "," && !inQuotes) {
            values.push(current);
            current = "";
            continue;
        }
        current += ch;
    }
    values.push(current);
    return values;
}

/**
 * `code,version,extra` per line, no header. Lines of any other width are
 * ignored.
 */
export function parseVersionTable(text: string): VersionCatalog {
    const versions = new Map<string, string>();
    for (const line of text.split(/\r?\n/)) {
        if (!line.trim()) continue;
        const record = parseCsvLine(line).map((value) => value.trim());
        if (record.length !== VERSION_RECORD_WIDTH) continue;
        const [code, version] = record;
        if (!code || !version) continue;
        versions.set(code, version);
    }

    const cities = Object.freeze([...versions.keys()]);
    return Object.freeze({
        cities,
        versionOf: (code: string) => versions.get(code),
    });
}

export async function fetchVersionCatalog(baseUrl: string, options: FetchOptions): Promise<VersionCatalog> {
    const response = await fetchOk(`${baseUrl}/${VERSION_TABLE}`, options);
    return parseVersionTable(await response.text());
}
