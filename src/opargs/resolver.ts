/**
 * @file Value Resolver
 *
 * Reads values out of an argument store, following `^key` indirections
 * and recording which keys were consulted.
 *
 * `used` is keyed by the key the caller asked for and holds the final
 * value. `allUsed` holds the raw value seen at every hop of the chain,
 * intermediate keys included.
 *
 * Indirection cycles are not detected. A cyclic chain recurses until the
 * engine's stack limit throws a RangeError; keeping chains acyclic is the
 * definition author's responsibility.
 *
 * @module opargs
 */

import { log_debug } from '../telemetry/log.js';
import { INDIRECTION_MARKER, type ArgumentState, type NumericResult } from './types.js';

const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*(?:[eE][+-]?\d+)?|\.\d+(?:[eE][+-]?\d+)?|inf|infinity|nan)$/i;

/**
 * Resolve `key`, chasing indirections.
 *
 * @param state - Store maps
 * @param key - Key asked for by the caller
 * @param fallback - Returned when any key in the chain is missing
 * @returns The final, non-indirect value, or `fallback`
 */
export function value_resolve(state: ArgumentState, key: string, fallback: string): string {
    const value: string = chain_follow(state, key, fallback);
    if (value !== fallback) {
        state.used.set(key, value);
    }
    return value;
}

function chain_follow(state: ArgumentState, key: string, fallback: string): string {
    const raw: string | undefined = state.args.get(key);
    if (raw === undefined) return fallback;

    state.allUsed.set(key, raw);

    if (raw.startsWith(INDIRECTION_MARKER)) {
        const target: string = raw.slice(INDIRECTION_MARKER.length);
        log_debug(`indirection ${key} -> ${target}`);
        return chain_follow(state, target, fallback);
    }
    return raw;
}

/**
 * Resolve `key` as a number.
 *
 * A missing (or empty) value yields `fallback`. A present value that is
 * not a number is an error naming the operator, the key and the text.
 */
export function numeric_resolve(
    state: ArgumentState,
    operatorName: string,
    key: string,
    fallback: number,
): NumericResult {
    const text: string = value_resolve(state, key, '');
    if (text === '') {
        return { ok: true, value: fallback };
    }

    const value: number | null = number_parse(text);
    if (value !== null) {
        return { ok: true, value };
    }

    return {
        ok: false,
        error: `Numeric value expected for '${operatorName}.${key}' - got [${key}: ${text}].`,
    };
}

/**
 * True when `key` is present and its value is anything but `"false"`.
 * Note that `"0"` and `""` are both true.
 */
export function flag_resolve(state: ArgumentState, key: string): boolean {
    return value_resolve(state, key, 'false') !== 'false';
}

/**
 * Strict float parse: no surrounding whitespace, no hex, no trailing text.
 * Accepts `inf`, `infinity` and `nan` in any case, with an optional sign.
 */
export function number_parse(text: string): number | null {
    if (!FLOAT_PATTERN.test(text)) return null;

    const lowered: string = text.toLowerCase();
    const unsigned: string = lowered.replace(/^[+-]/, '');
    if (unsigned === 'nan') return Number.NaN;
    if (unsigned === 'inf' || unsigned === 'infinity') {
        return lowered.startsWith('-') ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
    }
    return Number(text);
}
