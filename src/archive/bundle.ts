import AdmZip from "adm-zip";
import { MissingTableError } from "../errors";

export type ArchiveBundle = {
    version: string;
    table(name: string): string;
    optionalTable(name: string): string | null;
    tableByFile(fileName: string): string;
};

const normalizeZipPath = (value: string) =>
    value
        .replaceAll("\\", "/")
        .replace(/^\.\/+/, "")
        .replace(/^\/+/, "")
        .replace(/\/+$/, "");

const stripBom = (text: string) => (text.charCodeAt(0) === 0xfeff ? text.slice(1) : text);

/**
 * Tables live under a directory named after the archive version:
 * `{version}/{name}.csv`.
 */
export function openBundle(bytes: Buffer, version: string): ArchiveBundle {
    const zip = new AdmZip(bytes);
    const entries = new Map<string, AdmZip.IZipEntry>();
    for (const entry of zip.getEntries()) {
        if (entry.isDirectory) continue;
        entries.set(normalizeZipPath(entry.entryName), entry);
    }

    const pathFor = (fileName: string) => `${version}/${fileName}`;

    const read = (path: string): string | null => {
        const entry = entries.get(path);
        if (!entry) return null;
        return stripBom(entry.getData().toString("utf8"));
    };

    const readRequired = (path: string): string => {
        const text = read(path);
        if (text === null) throw new MissingTableError(path);
        return text;
    };

    return {
        version,
        table: (name) => readRequired(pathFor(`${name}.csv`)),
        optionalTable: (name) => read(pathFor(`${name}.csv`)),
        tableByFile: (fileName) => readRequired(pathFor(fileName.trim())),
    };
}
