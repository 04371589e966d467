/***
 * Brand: Nominal typing for TypeScript.
 *
 * Brand<T, Name> intersects T with a phantom readonly symbol property
 * tagged with Name. The symbol never exists at runtime; it only prevents
 * accidental assignment between structurally identical types.
 *
 * Example: NodeID is a plain number at runtime, but a
 * Brand<number, "node_id"> cannot be passed where a frame index or a
 * repeat count is expected.
 *
 ***/

declare const brand: unique symbol;

export type Brand<T, BrandName extends string> = T & {
  readonly [brand]: BrandName;
};
