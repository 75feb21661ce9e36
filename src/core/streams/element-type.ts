/**
 * Runtime element type tags.
 *
 * The generic parameters on Source/Flow/Sink already stop mismatched connects
 * at compile time. An ElementType adds the same guarantee at runtime for
 * blueprints that declare one: connecting two declared endpoints with different
 * names throws ShapeMismatchError, and stages that declare a type validate each
 * element against its zod schema.
 */

import { z } from "zod";
import { ShapeMismatchError } from "./errors";

/**
 * The part of an element type a blueprint keeps for connect-time checks.
 */
export interface TypeTag {
  readonly name: string;
}

export interface ElementType<T> extends TypeTag {
  readonly schema: z.ZodType<T>;
}

export function elementType<T>(name: string, schema: z.ZodType<T>): ElementType<T> {
  return Object.freeze({ name, schema });
}

export const ElementTypes = {
  number: elementType("number", z.number()),
  string: elementType("string", z.string()),
  boolean: elementType("boolean", z.boolean()),
  /** Compatible with every other type */
  unknown: elementType("unknown", z.unknown()),
} as const;

/**
 * Reject a connection between two endpoints with different declared types.
 * Undeclared endpoints, and the `unknown` type, connect to anything.
 */
export function assertCompatible(
  upstream: TypeTag | undefined,
  downstream: TypeTag | undefined,
  connection: string,
): void {
  if (!upstream || !downstream) return;
  if (upstream.name === ElementTypes.unknown.name || downstream.name === ElementTypes.unknown.name) return;
  if (upstream.name !== downstream.name) {
    throw new ShapeMismatchError(upstream.name, downstream.name, connection);
  }
}
