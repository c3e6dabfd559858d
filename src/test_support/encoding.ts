import { encodeSymbol } from "../geo/value_codec";

// Little-endian base-64 field of `count` symbols.
export const encodeDigits = (value: number, count: number): string => {
    let out = "";
    let rest = value;
    for (let i = 0; i < count; i++) {
        out += encodeSymbol(rest % 64);
        rest = Math.floor(rest / 64);
    }
    return out;
};

export const absoluteBlock = (x: number, y: number) => `=${encodeDigits(x, 6)}${encodeDigits(y, 6)}`;

// Negative deltas use the folded form 2^23 - d.
export const deltaBlock = (dx: number, dy: number) => {
    const fold = (d: number) => (d < 0 ? 2 ** 23 - d : d);
    return `${encodeDigits(fold(dx), 4)}${encodeDigits(fold(dy), 4)}`;
};
