// src/core/settings/values.ts

import { SettingTypeError } from '../errors';

/**
 * A setting value tagged with its type. The tag of a Setting is pinned by the
 * first value it holds.
 */
export type SettingValue =
    | { type: 'boolean'; value: boolean }
    | { type: 'integer'; value: number }
    | { type: 'float'; value: number }
    | { type: 'string'; value: string }
    | { type: 'array'; value: SettingValue[] }
    | { type: 'table'; value: Record<string, SettingValue> };

export type SettingType = SettingValue['type'];

/**
 * The untagged form handed to and returned from module code.
 */
export type PlainValue = boolean | number | string | PlainValue[] | { [key: string]: PlainValue };

export function isPlainObject(value: unknown): value is Record<string, unknown> {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
    const proto = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

function describe(value: unknown): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    if (value instanceof Date) return 'date';
    return typeof value;
}

/**
 * Converts a plain JavaScript value into a tagged value.
 * Safe integers become `integer`, every other finite number becomes `float`.
 */
export function toSettingValue(value: unknown): SettingValue {
    switch (typeof value) {
        case 'boolean':
            return { type: 'boolean', value };
        case 'string':
            return { type: 'string', value };
        case 'number':
            if (!Number.isFinite(value)) {
                throw new SettingTypeError(`Non-finite number ${value} cannot be stored in a setting`);
            }
            return Number.isSafeInteger(value) ? { type: 'integer', value } : { type: 'float', value };
        case 'bigint':
            if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
                throw new SettingTypeError(`Integer ${value} is outside the supported range`);
            }
            return { type: 'integer', value: Number(value) };
    }

    if (Array.isArray(value)) {
        return { type: 'array', value: value.map(toSettingValue) };
    }
    if (isPlainObject(value)) {
        const table: Record<string, SettingValue> = {};
        for (const [key, item] of Object.entries(value)) {
            table[key] = toSettingValue(item);
        }
        return { type: 'table', value: table };
    }

    throw new SettingTypeError(`Values of type '${describe(value)}' cannot be stored in a setting`);
}

export function toPlain(value: SettingValue): PlainValue {
    switch (value.type) {
        case 'array':
            return value.value.map(toPlain);
        case 'table': {
            const out: { [key: string]: PlainValue } = {};
            for (const [key, item] of Object.entries(value.value)) {
                out[key] = toPlain(item);
            }
            return out;
        }
        default:
            return value.value;
    }
}

/**
 * Deep equality of the carried values. Numbers compare numerically, so an
 * integer 1 equals a float 1.0.
 */
export function valuesEqual(a: PlainValue, b: PlainValue): boolean {
    if (Array.isArray(a) || Array.isArray(b)) {
        if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
        return a.every((item, index) => valuesEqual(item, b[index]));
    }
    if (typeof a === 'object' || typeof b === 'object') {
        if (typeof a !== 'object' || typeof b !== 'object') return false;
        const keys = Object.keys(a);
        if (keys.length !== Object.keys(b).length) return false;
        return keys.every(key => key in b && valuesEqual(a[key], b[key]));
    }
    return a === b;
}

/**
 * Checks `value` against a pinned type and returns the value to store.
 * The only coercion is integer to float.
 */
export function coerceToType(pinned: SettingType, value: SettingValue): SettingValue {
    if (value.type === pinned) return value;
    if (pinned === 'float' && value.type === 'integer') {
        return { type: 'float', value: value.value };
    }
    throw new SettingTypeError(`Cannot assign type '${value.type}' to setting with type '${pinned}'`);
}
