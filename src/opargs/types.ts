/**
 * @file Operator Argument Type Definitions
 *
 * Shared types and reserved keys for the operator argument store. The
 * store is a flat `string → string` mapping: operator-specific keys are
 * only known at run time, so no closed argument schema is imposed here.
 *
 * @module opargs
 */

// ─── Reserved Keys ──────────────────────────────────────────────

/** Prefix marking a value as a reference to another key. */
export const INDIRECTION_MARKER = '^';

/** Name assigned to a store whose definition could not be loaded. */
export const BADVALUE_NAME = 'badvalue';

/** Key holding the human-readable failure reason after a soft failure. */
export const CAUSE_KEY = 'cause';

/** Key holding the verbatim definition text. */
export const DEFINITION_KEY = '_definition';

/** Key holding the pipeline step count, as decimal text. */
export const NSTEPS_KEY = '_nsteps';

/** Key that is never taken from globals, nor inherited from a parent store. */
export const INVERSE_KEY = 'inv';

/** Global default seeded by `OperatorArgs.globalDefaults_create()`. */
export const GLOBAL_DEFAULTS: Readonly<Record<string, string>> = {
    ellps: 'GRS80',
};

/** Key under which the serialized text of pipeline step `index` is stored. */
export function stepKey_build(index: number): string {
    return `_step_${index}`;
}

/** True for load-local bookkeeping keys (`_definition`, `_nsteps`, `_step_<i>`). */
export function key_isBookkeeping(key: string): boolean {
    return key.startsWith('_');
}

// ─── Store Seams ────────────────────────────────────────────────

/**
 * The three maps behind a store.
 *
 * @property args - Stored argument values, raw (possibly indirect)
 * @property used - Outer key → final value, for keys whose value differed from the caller's default
 * @property allUsed - Key → raw value for every hop taken while resolving
 */
export interface ArgumentState {
    readonly args: Map<string, string>;
    readonly used: Map<string, string>;
    readonly allUsed: Map<string, string>;
}

/**
 * What the definition loader writes to.
 */
export interface DefinitionTarget {
    name_set(name: string): void;
    arg_insert(key: string, value: string): void;
}

/**
 * Outcome of a numeric lookup. A missing key is not an error: it yields
 * the caller's default as a successful value.
 */
export type NumericResult =
    | { ok: true; value: number }
    | { ok: false; error: string };
