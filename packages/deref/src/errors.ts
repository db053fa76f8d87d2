import type { ComponentKind } from "@openapi-deref/core/openapi";

// ------------------------------------------------------------------------------
// Per-slot errors: the slot is left as an error placeholder and the walk goes on
// ------------------------------------------------------------------------------

export type LookupError =
  | { type: "malformedPointer"; pointer: string; message: string }
  | { type: "unknownComponent"; pointer: string }
  | {
      type: "kindMismatch";
      pointer: string;
      expected: ComponentKind;
      actual: ComponentKind;
    };

export type SlotError = LookupError & {
  /** Dot-joined path of the slot, e.g. `paths./pets.get.parameters.0` */
  location: string;
};

// ------------------------------------------------------------------------------
// Fatal errors: the whole resolution fails and no document is returned
// ------------------------------------------------------------------------------

export type DuplicateComponentError = {
  type: "duplicateComponent";
  pointer: string;
};

export type TooDeepError = {
  type: "tooDeep";
  location: string;
  maxDepth: number;
};

export type FatalError = DuplicateComponentError | TooDeepError;

export type DerefError = SlotError | FatalError;

export const describeDerefError = (error: DerefError): string => {
  switch (error.type) {
    case "malformedPointer":
      return `${error.location}: malformed reference ${error.pointer} (${error.message})`;
    case "unknownComponent":
      return `${error.location}: unknown component ${error.pointer}`;
    case "kindMismatch":
      return `${error.location}: ${error.pointer} is a ${error.actual}, expected a ${error.expected}`;
    case "duplicateComponent":
      return `duplicate component ${error.pointer}`;
    case "tooDeep":
      return `${error.location}: document is nested deeper than ${error.maxDepth} levels`;
  }
};
