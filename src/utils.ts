import { readFileSync } from 'fs';
import { sprintf } from 'sprintf-js';
import type { JsonObject, JsonValue } from 'type-fest';

export const isJsonObject = (value: JsonValue | undefined): value is JsonObject =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

export function readJSON(path: string): JsonObject {
    const value: JsonValue = JSON.parse(readFileSync(path, 'utf8'));
    if (!isJsonObject(value))
        throw new Error(`${path}: expected a JSON object at the top level`);
    return value;
}

/**
 * Rounds to `digits` decimals. An exact half (judged on the double's exact
 * decimal expansion) goes to the even digit: 0.125 -> 0.12, 0.375 -> 0.38.
 */
export function roundHalfEven(value: number, digits: number): number {
    if (!Number.isFinite(value) || Math.abs(value) >= 1e21) return value;

    const rounded = Number(value.toFixed(digits));
    const [integer, fraction = ''] = Math.abs(value).toFixed(100).split('.');
    const isTie =
        fraction[digits] === '5' && /^0*$/.test(fraction.slice(digits + 1));
    if (!isTie) return rounded;

    const kept = `${integer}.${fraction.slice(0, digits)}`;
    if (Number(kept[kept.length - 1]) % 2 !== 0) return rounded;
    return value < 0 ? -Number(kept) : Number(kept);
}

const stripZeros = (digits: string): string =>
    digits.includes('.') ? digits.replace(/\.?0+$/, '') : digits;

// printf's %g: `precision` significant digits, trailing zeros dropped.
export function formatGeneral(value: number, precision = 6): string {
    if (value === 0) return '0';
    if (!Number.isFinite(value)) return String(value);

    const [mantissa, exp] = value.toExponential(precision - 1).split('e');
    const exponent = Number(exp);
    if (exponent < -4 || exponent >= precision)
        return sprintf('%se%+03d', stripZeros(mantissa), exponent);

    return stripZeros(value.toFixed(precision - 1 - exponent));
}

// Ranking strings: 18 -> "18", 0.125 -> "0.12", 2500000.5 -> "2.5e+06".
export const formatScore = (value: number): string =>
    formatGeneral(roundHalfEven(value, 2));
