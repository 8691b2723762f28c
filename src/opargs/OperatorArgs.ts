/**
 * @file Operator Argument Store
 *
 * The flat argument store handed to an operator constructor. A store is
 * created empty (or seeded with global defaults), populated once from a
 * YAML definition, then queried any number of times.
 *
 * Pipelines hand their globals down to each step through
 * `globals_inherit`: the step store starts from the parent's user-facing
 * arguments and the step's own definition overrides them.
 *
 * @module opargs
 */

import { definition_populate } from './loader.js';
import { flag_resolve, numeric_resolve, value_resolve } from './resolver.js';
import {
    GLOBAL_DEFAULTS,
    INVERSE_KEY,
    key_isBookkeeping,
    type ArgumentState,
    type DefinitionTarget,
    type NumericResult,
} from './types.js';

export class OperatorArgs implements ArgumentState, DefinitionTarget {
    public name = '';
    public readonly args: Map<string, string> = new Map();
    public readonly used: Map<string, string> = new Map();
    public readonly allUsed: Map<string, string> = new Map();

    /**
     * Store seeded with the global defaults (`ellps: GRS80`).
     */
    public static globalDefaults_create(): OperatorArgs {
        const store = new OperatorArgs();
        for (const [key, value] of Object.entries(GLOBAL_DEFAULTS)) {
            store.arg_insert(key, value);
        }
        return store;
    }

    /**
     * Store inheriting the arguments of `existing`, then populated from
     * `definition`.
     *
     * Bookkeeping keys (`_*`) and `inv` are load-local and never inherited.
     * The populate outcome is reported through the new store's `name`
     * and `cause`, as with `definition_populate`.
     *
     * @throws When `definition` is not well-formed YAML
     */
    public static globals_inherit(existing: OperatorArgs, definition: string, which: string): OperatorArgs {
        const store = new OperatorArgs();
        for (const [key, value] of existing.args) {
            if (key_isBookkeeping(key) || key === INVERSE_KEY) continue;
            store.arg_insert(key, value);
        }
        store.definition_populate(definition, which);
        return store;
    }

    /**
     * Load a YAML operator or pipeline definition into this store.
     *
     * @returns true on success; false on a structural problem, with
     *   `name === 'badvalue'` and the reason under `cause`
     * @throws When `definition` is not well-formed YAML
     */
    public definition_populate(definition: string, which: string): boolean {
        return definition_populate(this, definition, which);
    }

    public name_set(name: string): void {
        this.name = name;
    }

    /** Set `key`, overwriting any earlier value. */
    public arg_insert(key: string, value: string): void {
        this.args.set(key, value);
    }

    /** Copy every argument of `additional` into this store, overwriting on conflict. */
    public args_append(additional: OperatorArgs): void {
        for (const [key, value] of additional.args) {
            this.arg_insert(key, value);
        }
    }

    /** Raw stored value, without indirection or usage tracking. */
    public arg_get(key: string): string | undefined {
        return this.args.get(key);
    }

    /** Plain-object copy of the raw arguments, for logging and diagnostics. */
    public args_snapshot(): Record<string, string> {
        return Object.fromEntries(this.args);
    }

    /** Resolve `key`, following `^key` indirections; see `value_resolve`. */
    public value_resolve(key: string, fallback: string): string {
        return value_resolve(this, key, fallback);
    }

    public numeric_resolve(operatorName: string, key: string, fallback: number): NumericResult {
        return numeric_resolve(this, operatorName, key, fallback);
    }

    public flag_resolve(key: string): boolean {
        return flag_resolve(this, key);
    }
}
