export {
  dereference,
  dereferenceDocument,
  dereferenceEachPath,
} from "./dereference.js";
export type { Dereferenceable, DereferenceableKind } from "./dereference.js";

export { DefinitionsStore } from "./store/DefinitionsStore.js";
export type { DefinitionRecords } from "./store/DefinitionsStore.js";
export { DefinitionCategory } from "./store/DefinitionCategory.js";
export type { Definition, DefinitionKinds } from "./store/DefinitionCategory.js";

export { parseReference, formatReference } from "./reference/Reference.js";
export type {
  Reference,
  LocalReference,
  RemoteReference,
} from "./reference/Reference.js";
export { formatLocalReference } from "./reference/pointer.js";

export {
  formatDereferenceError,
  notFound,
  cannotResolveRemote,
  recursiveReference,
  typeMismatch,
  invalidReference,
} from "./errors/DereferenceError.js";
export type { DereferenceError } from "./errors/DereferenceError.js";

export { CycleGuard } from "./context/CycleGuard.js";
export { createDereferenceContext } from "./context/DereferenceContext.js";
export type { DereferenceContext } from "./context/DereferenceContext.js";
export { followReference } from "./context/followReference.js";

export type { DereferencedSchema } from "./dereferenced/DereferencedSchema.js";
export { DereferencedSchemaContext } from "./dereferenced/DereferencedSchemaContext.js";
export type { DereferencedSchemaOrContent } from "./dereferenced/DereferencedSchemaOrContent.js";
export { DereferencedHeader } from "./dereferenced/DereferencedHeader.js";
export { DereferencedParameter } from "./dereferenced/DereferencedParameter.js";
export { DereferencedEncoding } from "./dereferenced/DereferencedEncoding.js";
export { DereferencedMediaType } from "./dereferenced/DereferencedMediaType.js";
export { DereferencedRequestBody } from "./dereferenced/DereferencedRequestBody.js";
export { DereferencedResponse } from "./dereferenced/DereferencedResponse.js";
export { DereferencedOperation } from "./dereferenced/DereferencedOperation.js";
export {
  DereferencedPathItem,
  httpMethods,
} from "./dereferenced/DereferencedPathItem.js";
export type { HttpMethod } from "./dereferenced/DereferencedPathItem.js";
export type { DereferencedCallback } from "./dereferenced/DereferencedCallback.js";
export { DereferencedDocument } from "./dereferenced/DereferencedDocument.js";

// Results keep authored key order; read it back with these
export { orderedEntries, orderedKeys } from "@openapi-deref/core/record";

export { loadDocument } from "./document/loadDocument.js";
export type { LoadError, LoadedDocument } from "./document/loadDocument.js";
