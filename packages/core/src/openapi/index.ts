export * from "./types.js";
export * from "./reference.js";

export {
  ComponentKind,
  ComponentSection,
  isComponentSection,
  getSectionKind,
  getKindSection,
} from "./kind.js";
