/**
 * @file Value Resolver Tests
 *
 * @module opargs
 */

import { describe, expect, it } from 'vitest';
import { OperatorArgs } from './OperatorArgs.js';
import { number_parse } from './resolver.js';

/** dx and dy are direct; dz hides behind two levels of indirection. */
function store_build(): OperatorArgs {
    const args = new OperatorArgs();
    args.arg_insert('dx', '11');
    args.arg_insert('dy', '22');
    args.arg_insert('dz', '^ddz');
    args.arg_insert('ddz', '^dddz');
    args.arg_insert('dddz', '33');
    return args;
}

describe('value_resolve', (): void => {
    it('tracks direct and indirect lookups separately', (): void => {
        const args = store_build();

        expect(args.value_resolve('', '00')).toBe('00');
        expect(args.value_resolve('dx', '')).toBe('11');
        expect(args.value_resolve('dy', '')).toBe('22');
        expect(args.used.size).toBe(2);

        expect(args.value_resolve('dz', '')).toBe('33');
        expect(args.numeric_resolve('foo', 'dz', 42)).toEqual({ ok: true, value: 33 });
        expect(args.numeric_resolve('foo', 'bar', 42)).toEqual({ ok: true, value: 42 });

        expect(args.used.size).toBe(3);
        expect(args.allUsed.size).toBe(5);
        expect(args.value_resolve('abcdefg', '')).toBe('');
    });

    it('records every hop in allUsed and only the outer key in used', (): void => {
        const args = new OperatorArgs();
        args.arg_insert('a', '^b');
        args.arg_insert('b', '^c');
        args.arg_insert('c', '33');

        expect(args.value_resolve('a', '')).toBe('33');
        expect(Object.fromEntries(args.allUsed)).toEqual({ a: '^b', b: '^c', c: '33' });
        expect(Object.fromEntries(args.used)).toEqual({ a: '33' });
    });

    it('returns the default when a hop is missing', (): void => {
        const args = new OperatorArgs();
        args.arg_insert('a', '^missing');

        expect(args.value_resolve('a', 'dflt')).toBe('dflt');
        expect(Object.fromEntries(args.allUsed)).toEqual({ a: '^missing' });
        expect(args.used.size).toBe(0);
    });

    it('does not mark a key used when its value equals the default', (): void => {
        const args = new OperatorArgs();
        args.arg_insert('k', 'same');

        expect(args.value_resolve('k', 'same')).toBe('same');
        expect(args.allUsed.get('k')).toBe('same');
        expect(args.used.has('k')).toBe(false);
    });

    it('leaves raw access untracked', (): void => {
        const args = store_build();
        expect(args.arg_get('dz')).toBe('^ddz');
        expect(args.args_snapshot()['dx']).toBe('11');
        expect(args.allUsed.size).toBe(0);
    });
});

describe('numeric_resolve', (): void => {
    it('reports non-numeric text with operator, key and value', (): void => {
        const args = new OperatorArgs();
        args.arg_insert('ds', 'foo');

        expect(args.numeric_resolve('bar', 'ds', 0)).toEqual({
            ok: false,
            error: "Numeric value expected for 'bar.ds' - got [ds: foo].",
        });
    });

    it('parses through indirection', (): void => {
        const args = new OperatorArgs();
        args.arg_insert('k', '^k0');
        args.arg_insert('k0', '0.9996');
        expect(args.numeric_resolve('utm', 'k', 1)).toEqual({ ok: true, value: 0.9996 });
    });

    it('treats an empty value as absent', (): void => {
        const args = new OperatorArgs();
        args.arg_insert('lat_0', '');
        expect(args.numeric_resolve('tmerc', 'lat_0', 45)).toEqual({ ok: true, value: 45 });
    });
});

describe('number_parse', (): void => {
    it('accepts float syntax', (): void => {
        expect(number_parse('33')).toBe(33);
        expect(number_parse('-2.5')).toBe(-2.5);
        expect(number_parse('+.5')).toBe(0.5);
        expect(number_parse('5.')).toBe(5);
        expect(number_parse('1e3')).toBe(1000);
        expect(number_parse('-inf')).toBe(Number.NEGATIVE_INFINITY);
        expect(number_parse('Infinity')).toBe(Number.POSITIVE_INFINITY);
        expect(number_parse('NaN')).toBeNaN();
    });

    it('rejects text a float parser would reject', (): void => {
        expect(number_parse('')).toBeNull();
        expect(number_parse(' 3')).toBeNull();
        expect(number_parse('0x10')).toBeNull();
        expect(number_parse('1_000')).toBeNull();
        expect(number_parse('3m')).toBeNull();
        expect(number_parse('.')).toBeNull();
    });
});

describe('flag_resolve', (): void => {
    it('is false when absent or exactly "false"', (): void => {
        const args = new OperatorArgs();
        args.arg_insert('off', 'false');
        expect(args.flag_resolve('missing')).toBe(false);
        expect(args.flag_resolve('off')).toBe(false);
    });

    it('is true for any other present value, "0" included', (): void => {
        const args = new OperatorArgs();
        args.arg_insert('inv', 'true');
        args.arg_insert('zero', '0');
        args.arg_insert('empty', '');
        args.arg_insert('FALSE', 'FALSE');
        expect(args.flag_resolve('inv')).toBe(true);
        expect(args.flag_resolve('zero')).toBe(true);
        expect(args.flag_resolve('empty')).toBe(true);
        expect(args.flag_resolve('FALSE')).toBe(true);
    });

    it('is false when the indirection target is missing', (): void => {
        const args = new OperatorArgs();
        args.arg_insert('inv', '^nowhere');
        expect(args.flag_resolve('inv')).toBe(false);
    });
});
