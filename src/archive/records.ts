export const UNO_DELIMITER = "<,>";
export const FIELD_DELIMITER = ",";

// Source tables are unquoted; blank lines carry nothing.
export function readRecords(text: string, delimiter: string): string[][] {
    return text
        .split(/\r?\n/)
        .filter((line) => line.trim().length > 0)
        .map((line) => line.split(delimiter));
}

export const field = (record: readonly string[], idx: number): string => (record[idx] ?? "").trim();

const INTEGER = /^[+-]?\d+$/;

export const toInt = (value: string | undefined): number => {
    const trimmed = (value ?? "").trim();
    if (!INTEGER.test(trimmed)) return 0;
    const parsed = Number(trimmed);
    return Number.isSafeInteger(parsed) ? parsed : 0;
};

export const toFloat = (value: string | undefined): number => {
    const trimmed = (value ?? "").trim();
    if (!trimmed) return 0;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : 0;
};
