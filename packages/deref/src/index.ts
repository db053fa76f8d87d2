export { dereference, type DereferenceOptions } from "./dereference.js";
export {
  ComponentIndex,
  parseComponentPointer,
  toComponentPointer,
  type ComponentEntry,
  type ComponentNode,
  type ComponentValues,
} from "./components/ComponentIndex.js";
export {
  Resolver,
  type ResolveOutput,
  type ResolverOptions,
} from "./resolver/Resolver.js";
export type { ResolvedSlot, ResolveStats } from "./resolver/ResolveContext.js";
export * from "./errors.js";
export { parseDocumentText, type ParseError } from "./loader/parseDocumentText.js";
export {
  loadDocument,
  describeLoadError,
  type LoadError,
} from "./loader/loadDocument.js";
export type { VFS, VFSError } from "./vfs/VFS.js";
export { NodeVFS } from "./vfs/NodeVFS.js";
export { MemoryVFS } from "./vfs/MemoryVFS.js";
export {
  collectServers,
  type CollectServersError,
} from "./servers/collectServers.js";
