import { InvalidSymbolError } from "../errors";

const ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789+/";
export const SYMBOL_BASE = ALPHABET.length;

const SYMBOL_VALUES = new Map<string, number>(Array.from(ALPHABET, (ch, idx): [string, number] => [ch, idx]));

export function decodeSymbol(symbol: string): number {
    const value = SYMBOL_VALUES.get(symbol);
    if (value === undefined) {
        throw new InvalidSymbolError(symbol);
    }
    return value;
}

export function encodeSymbol(value: number): string {
    if (!Number.isInteger(value) || value < 0 || value >= SYMBOL_BASE) {
        throw new RangeError(`symbol value out of range: ${value}`);
    }
    return ALPHABET.charAt(value);
}

/**
 * Reads `count` symbols starting at `start`, least significant first.
 * Six-symbol fields reach 36 bits, so the sum is built with multiplication
 * rather than 32-bit shifts.
 */
export function decodeDigits(text: string, start: number, count: number): number {
    let value = 0;
    for (let i = 0; i < count; i++) {
        value += decodeSymbol(text.charAt(start + i)) * SYMBOL_BASE ** i;
    }
    return value;
}
