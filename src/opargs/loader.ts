/**
 * @file Definition Loader
 *
 * Flattens a YAML operator or pipeline definition into a store.
 *
 * A definition root maps one name to its body:
 *
 *     cart: {ellps: intl}
 *
 * A body holding a `steps` sequence is a pipeline. Its `globals` become
 * ordinary arguments, and each step is re-serialized to YAML text and
 * stored as `_step_<i>` for the pipeline executor to parse again. Any
 * other body is a plain operator whose scalar entries become arguments.
 *
 * Structural problems are soft failures: the store is renamed `badvalue`,
 * the reason goes under `cause`, and the loader returns false. Malformed
 * YAML is a hard failure and throws.
 *
 * @module opargs
 */

import { log_debug, log_warn } from '../telemetry/log.js';
import {
    BADVALUE_NAME,
    CAUSE_KEY,
    DEFINITION_KEY,
    INVERSE_KEY,
    NSTEPS_KEY,
    stepKey_build,
    key_isBookkeeping,
    type DefinitionTarget,
} from './types.js';
import {
    documents_parse,
    mapping_cast,
    node_serialize,
    scalar_coerce,
    sequence_cast,
} from './yaml/document.js';
import type { YamlMapping } from './yaml/schemas.js';

/**
 * Populate `target` from a definition.
 *
 * @param target - Store to write to
 * @param definition - Raw YAML text, possibly multi-document
 * @param which - Name of the definition to load; `''` takes the sole
 *   non-underscore entry of the first document
 * @returns true on success, false on a soft failure
 * @throws When `definition` is not well-formed YAML
 */
export function definition_populate(
    target: DefinitionTarget,
    definition: string,
    which: string,
): boolean {
    target.arg_insert(DEFINITION_KEY, definition);

    const docs: unknown[] = documents_parse(definition);

    let index = 0;
    if (which !== '') {
        index = docs.findIndex((doc: unknown): boolean => entry_has(mapping_cast(doc), which));
        if (index < 0) {
            return badvalue_set(target, 'Cannot locate definition');
        }
    }

    const main: YamlMapping | null = mapping_cast(docs[index]);
    if (!main) {
        return badvalue_set(target, 'Cannot parse definition');
    }

    let mainEntryName: string = which;
    if (mainEntryName === '') {
        for (const key of Object.keys(main)) {
            if (key_isBookkeeping(key)) continue;
            if (mainEntryName !== '') {
                return badvalue_set(target, 'Too many items in definition root');
            }
            mainEntryName = key;
        }
    }
    target.name_set(mainEntryName);

    // An empty name here (no non-underscore root key) lands in the same
    // failure as an unknown name.
    if (!entry_has(main, mainEntryName)) {
        return badvalue_set(target, 'Cannot locate definition');
    }
    const mainEntry: unknown = main[mainEntryName];
    const body: YamlMapping | null = mapping_cast(mainEntry);

    const globals: YamlMapping | null = body ? mapping_cast(body['globals']) : null;
    if (globals) {
        scalars_insert(target, globals, INVERSE_KEY);
    }

    const steps = body ? sequence_cast(body['steps']) : null;

    if (!steps) {
        if (!body) {
            return badvalue_set(target, 'Cannot read args');
        }
        scalars_insert(target, body, null);
        log_debug(`loaded operator '${mainEntryName}'`);
        return true;
    }

    target.arg_insert(NSTEPS_KEY, String(steps.length));
    steps.forEach((step: unknown, stepIndex: number): void => {
        target.arg_insert(stepKey_build(stepIndex), node_serialize(step));
    });
    log_debug(`loaded pipeline '${mainEntryName}'`, { steps: steps.length });
    return true;
}

/**
 * Insert every entry whose value coerces to non-empty scalar text.
 */
function scalars_insert(target: DefinitionTarget, entries: YamlMapping, skipKey: string | null): void {
    for (const [key, value] of Object.entries(entries)) {
        if (key === skipKey) continue;
        const text: string = scalar_coerce(value);
        if (text !== '') {
            target.arg_insert(key, text);
        }
    }
}

function entry_has(mapping: YamlMapping | null, key: string): boolean {
    return mapping !== null && Object.prototype.hasOwnProperty.call(mapping, key);
}

function badvalue_set(target: DefinitionTarget, cause: string): false {
    target.name_set(BADVALUE_NAME);
    target.arg_insert(CAUSE_KEY, cause);
    log_warn(`definition rejected: ${cause}`);
    return false;
}
