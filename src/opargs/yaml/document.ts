/**
 * @file YAML Document Adapter
 *
 * The generic document model behind the definition loader. js-yaml does
 * the parsing and emitting; this module decides node kinds and turns
 * scalars into the text stored in an argument map.
 *
 * Parsing uses the YAML core schema, whose node kinds are integer, real,
 * string, boolean, null, sequence and mapping. Timestamps and binary
 * nodes stay plain strings. Its int type is swapped for one that keeps
 * integers beyond 2^53 exact as `bigint`.
 *
 * Duplicate mapping keys are accepted, the last value winning.
 *
 * @module opargs/yaml
 */

import * as yaml from 'js-yaml';
import {
    MappingSchema,
    ScalarSchema,
    SequenceSchema,
    type YamlMapping,
    type YamlSequence,
} from './schemas.js';

const CORE_INT: yaml.Type = yaml.types.int;

/**
 * Core int type, except that values outside the safe integer range are
 * built as `bigint` and dumped back digit for digit. `-0` becomes `0`.
 */
const EXACT_INT = new yaml.Type('tag:yaml.org,2002:int', {
    kind: 'scalar',
    resolve: (data: unknown): boolean => CORE_INT.resolve(data),
    construct: (data: string): unknown => {
        const value: unknown = CORE_INT.construct(data);
        if (typeof value === 'number' && !Number.isSafeInteger(value)) {
            return bigint_parse(data);
        }
        return value === 0 ? 0 : value;
    },
    predicate: (data: unknown): boolean =>
        typeof data === 'bigint'
        || (typeof data === 'number' && Number.isInteger(data) && !Object.is(data, -0)),
    represent: (data: unknown): string => String(data),
});

const DEFINITION_SCHEMA: yaml.Schema = yaml.CORE_SCHEMA.extend({ implicit: [EXACT_INT] });

/** Exact value of a YAML int literal: optional sign, `_` separators, 0x/0o/0b prefixes. */
function bigint_parse(literal: string): bigint {
    const cleaned: string = literal.replace(/_/g, '');
    const magnitude = BigInt(cleaned.replace(/^[+-]/, ''));
    return cleaned.startsWith('-') ? -magnitude : magnitude;
}

/**
 * Parse every document in a (possibly multi-document) YAML string.
 *
 * @param text - Raw YAML text
 * @returns One entry per document, in order
 * @throws When the text is not well-formed YAML
 */
export function documents_parse(text: string): unknown[] {
    try {
        return yaml.loadAll(text, null, { schema: DEFINITION_SCHEMA, json: true });
    } catch (err: unknown) {
        const message: string = err instanceof Error ? err.message : String(err);
        throw new Error(`Invalid definition: ${message}`);
    }
}

/**
 * Serialize one node back to block-style YAML text, without a leading
 * document separator.
 *
 * Mappings are plain JS objects, so integer-like keys come out first
 * whatever their source position: `{helmert: {...}, 7: x}` serializes
 * starting with `7: x`.
 */
export function node_serialize(node: unknown): string {
    const text: string = yaml.dump(node, {
        schema: DEFINITION_SCHEMA,
        noRefs: true,
        lineWidth: -1,
    });
    return text.startsWith('---\n') ? text.slice(4) : text;
}

/**
 * Text form of a scalar node, or `''` for anything else.
 *
 * Integers and reals arrive as JS numbers (or `bigint` past 2^53) and
 * take their canonical number text: `1.50` becomes `1.5`, `.inf` becomes
 * `Infinity`. A real `-0.0` keeps its sign as `-0`.
 */
export function scalar_coerce(node: unknown): string {
    const result = ScalarSchema.safeParse(node);
    if (!result.success) return '';
    if (Object.is(result.data, -0)) return '-0';
    return String(result.data);
}

/** The node as a mapping, or null when it is some other kind. */
export function mapping_cast(node: unknown): YamlMapping | null {
    const result = MappingSchema.safeParse(node);
    return result.success ? result.data : null;
}

/** The node as a sequence, or null when it is some other kind. */
export function sequence_cast(node: unknown): YamlSequence | null {
    const result = SequenceSchema.safeParse(node);
    return result.success ? result.data : null;
}
