import { z } from "zod";

// ------------------------------------------------------------------------------
// Reference slots
//
// A referenceable position holds either a direct value or one of the
// reference states below. Every reference state keeps the original `$ref`
// string (and the 3.1 `summary` / `description` overrides) untouched.
// `$deref` tells the processed states apart; a plain Reference has none.
// ------------------------------------------------------------------------------

export const SlotErrorKind = z.enum([
  "malformedPointer",
  "unknownComponent",
  "kindMismatch",
]);

export type SlotErrorKind = z.infer<typeof SlotErrorKind>;

const referenceShape = {
  $ref: z.string(),
  summary: z.string().optional(),
  description: z.string().optional(),
};

// Reference Object - an unresolved pointer
export const Reference = z.object(referenceShape);

// Left where a cycle was cut: the target leads back into the component being expanded
export const CircularReference = z.object({
  ...referenceShape,
  $deref: z.literal("circular"),
});

// Left where the pointer could not be resolved
export const UnresolvedReference = z.object({
  ...referenceShape,
  $deref: z.literal("error"),
  error: SlotErrorKind,
});

export const ResolvedReference = <T extends z.ZodType>(value: T) =>
  z.object({
    ...referenceShape,
    $deref: z.literal("resolved"),
    value,
  });

/**
 * Schema for a referenceable slot. Processed states are tried before the
 * plain Reference, which would otherwise strip `$deref` and `value`, and the
 * direct value comes last since most OpenAPI objects have no required keys.
 */
export const referenceOr = <T extends z.ZodType>(item: T) =>
  z.union([
    ResolvedReference(item),
    CircularReference,
    UnresolvedReference,
    Reference,
    item,
  ]);

export type Reference = z.infer<typeof Reference>;
export type CircularReference = z.infer<typeof CircularReference>;
export type UnresolvedReference = z.infer<typeof UnresolvedReference>;
export type ResolvedReference<T> = Reference & {
  $deref: "resolved";
  value: T;
};

export type ReferenceState<T> =
  | Reference
  | ResolvedReference<T>
  | CircularReference
  | UnresolvedReference;

export type ReferenceOr<T> = T | ReferenceState<T>;

/** What a reference becomes once the resolver has visited it */
export type ProcessedReference<T> =
  | ResolvedReference<T>
  | CircularReference
  | UnresolvedReference;

export const toResolvedReference = <T>(
  reference: Reference,
  value: T
): ResolvedReference<T> => ({ ...reference, $deref: "resolved", value });

export const toCircularReference = (
  reference: Reference
): CircularReference => ({ ...reference, $deref: "circular" });

export const toUnresolvedReference = (
  reference: Reference,
  error: SlotErrorKind
): UnresolvedReference => ({ ...reference, $deref: "error", error });

// ------------------------------------------------------------------------------
// Guards
// ------------------------------------------------------------------------------

/**
 * True for every reference state, processed or not. Narrowing a
 * `ReferenceOr<T>` with it leaves `T` in the false branch.
 */
export const isReference = (obj: object): obj is Reference =>
  "$ref" in obj && typeof obj.$ref === "string";

export const isResolvedReference = <T>(
  slot: ReferenceState<T>
): slot is ResolvedReference<T> =>
  "$deref" in slot && slot.$deref === "resolved";

export const isCircularReference = <T>(
  slot: ReferenceState<T>
): slot is CircularReference => "$deref" in slot && slot.$deref === "circular";

export const isUnresolvedReference = <T>(
  slot: ReferenceState<T>
): slot is UnresolvedReference => "$deref" in slot && slot.$deref === "error";

/**
 * Strip any processing state, giving back the reference as written.
 */
export const toReference = <T>(slot: ReferenceState<T>): Reference => {
  const reference: Reference = { $ref: slot.$ref };
  if (slot.summary !== undefined) reference.summary = slot.summary;
  if (slot.description !== undefined) reference.description = slot.description;
  return reference;
};

/**
 * The value a slot stands for, when it has one: the direct value or the
 * value of a resolved reference.
 */
export const getSlotValue = <T extends object>(
  slot: ReferenceOr<T>
): T | undefined => {
  if (!isReference(slot)) return slot;
  if (isResolvedReference<T>(slot)) return slot.value;
  return undefined;
};
