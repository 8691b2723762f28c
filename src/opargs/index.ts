/**
 * @file Operator Argument Store — public surface
 *
 * @module opargs
 */

export { OperatorArgs } from './OperatorArgs.js';
export { definition_populate } from './loader.js';
export { value_resolve, numeric_resolve, flag_resolve, number_parse } from './resolver.js';
export { documents_parse, node_serialize, scalar_coerce } from './yaml/document.js';
export {
    BADVALUE_NAME,
    CAUSE_KEY,
    DEFINITION_KEY,
    GLOBAL_DEFAULTS,
    INDIRECTION_MARKER,
    INVERSE_KEY,
    NSTEPS_KEY,
    stepKey_build,
} from './types.js';
export type { ArgumentState, DefinitionTarget, NumericResult } from './types.js';
