/**
 * @file YAML Node Schemas
 *
 * Zod runtime schemas classifying the nodes that js-yaml produces under
 * the core schema. A definition is free-form, so these only decide the
 * kind of a node; they never constrain operator-specific keys.
 *
 * @module opargs/yaml
 */

import { z } from 'zod';

/**
 * Integer, real, string or boolean. Null is not a scalar value here.
 * `.nan` needs its own member: `z.number()` rejects NaN. Integers past
 * 2^53 arrive as `bigint`.
 */
export const ScalarSchema = z.union([z.number(), z.nan(), z.bigint(), z.string(), z.boolean()]);

/** A YAML mapping. Arrays and null are rejected. */
export const MappingSchema = z.record(z.string(), z.unknown());

/** A YAML sequence. */
export const SequenceSchema = z.array(z.unknown());

export type YamlScalar   = z.infer<typeof ScalarSchema>;
export type YamlMapping  = z.infer<typeof MappingSchema>;
export type YamlSequence = z.infer<typeof SequenceSchema>;
