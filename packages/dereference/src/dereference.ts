import { OpenAPI, SchemaContext } from "@openapi-deref/core/openapi";
import { DereferenceConfigurationInput } from "@openapi-deref/core/configuration";
import { Result } from "@openapi-deref/core/result";
import { orderedEntries, orderedRecord } from "@openapi-deref/core/record";
import { DereferenceError } from "./errors/DereferenceError.js";
import { DefinitionsStore } from "./store/DefinitionsStore.js";
import {
  createDereferenceContext,
  DereferenceContext,
} from "./context/DereferenceContext.js";
import {
  DereferencedSchema,
  dereferenceSchema,
} from "./dereferenced/DereferencedSchema.js";
import { dereferenceExample } from "./dereferenced/DereferencedExample.js";
import {
  DereferencedSchemaContext,
  dereferenceSchemaContext,
} from "./dereferenced/DereferencedSchemaContext.js";
import {
  DereferencedHeader,
  dereferenceHeader,
} from "./dereferenced/DereferencedHeader.js";
import {
  DereferencedParameter,
  dereferenceParameter,
} from "./dereferenced/DereferencedParameter.js";
import {
  DereferencedEncoding,
  dereferenceEncoding,
} from "./dereferenced/DereferencedEncoding.js";
import {
  DereferencedMediaType,
  dereferenceMediaType,
} from "./dereferenced/DereferencedMediaType.js";
import {
  DereferencedRequestBody,
  dereferenceRequestBody,
} from "./dereferenced/DereferencedRequestBody.js";
import {
  DereferencedResponse,
  dereferenceLink,
  dereferenceResponse,
} from "./dereferenced/DereferencedResponse.js";
import {
  DereferencedOperation,
  dereferenceOperation,
} from "./dereferenced/DereferencedOperation.js";
import {
  DereferencedPathItem,
  dereferencePathItem,
  dereferencePathItemOrReference,
} from "./dereferenced/DereferencedPathItem.js";
import {
  DereferencedCallback,
  dereferenceCallback,
} from "./dereferenced/DereferencedCallback.js";
import {
  DereferencedDocument,
  dereferenceDocumentPaths,
} from "./dereferenced/DereferencedDocument.js";

/**
 * Every node kind that can be dereferenced, with the shape it is given in
 * and the shape it resolves to.
 */
export interface Dereferenceable {
  Schema: {
    source: OpenAPI.Schema | OpenAPI.Reference;
    dereferenced: DereferencedSchema;
  };
  Example: {
    source: OpenAPI.Example | OpenAPI.Reference;
    dereferenced: OpenAPI.Example;
  };
  SchemaContext: {
    source: SchemaContext;
    dereferenced: DereferencedSchemaContext;
  };
  Header: {
    source: OpenAPI.Header | OpenAPI.Reference;
    dereferenced: DereferencedHeader;
  };
  Parameter: {
    source: OpenAPI.Parameter | OpenAPI.Reference;
    dereferenced: DereferencedParameter;
  };
  Encoding: {
    source: OpenAPI.Encoding;
    dereferenced: DereferencedEncoding;
  };
  MediaType: {
    source: OpenAPI.MediaType;
    dereferenced: DereferencedMediaType;
  };
  RequestBody: {
    source: OpenAPI.RequestBody | OpenAPI.Reference;
    dereferenced: DereferencedRequestBody;
  };
  Response: {
    source: OpenAPI.Response | OpenAPI.Reference;
    dereferenced: DereferencedResponse;
  };
  Link: {
    source: OpenAPI.Link | OpenAPI.Reference;
    dereferenced: OpenAPI.Link;
  };
  Operation: {
    source: OpenAPI.Operation;
    dereferenced: DereferencedOperation;
  };
  PathItem: {
    source: OpenAPI.PathItem;
    dereferenced: DereferencedPathItem;
  };
  Callback: {
    source: OpenAPI.Callback | OpenAPI.Reference;
    dereferenced: DereferencedCallback;
  };
}

export type DereferenceableKind = keyof Dereferenceable;

type Dereferencer<K extends DereferenceableKind> = (
  source: Dereferenceable[K]["source"],
  ctx: DereferenceContext
) => Result<Dereferenceable[K]["dereferenced"], DereferenceError>;

const dereferencers: { [K in DereferenceableKind]: Dereferencer<K> } = {
  Schema: dereferenceSchema,
  Example: dereferenceExample,
  SchemaContext: dereferenceSchemaContext,
  Header: dereferenceHeader,
  Parameter: dereferenceParameter,
  Encoding: dereferenceEncoding,
  MediaType: dereferenceMediaType,
  RequestBody: dereferenceRequestBody,
  Response: dereferenceResponse,
  Link: dereferenceLink,
  Operation: dereferenceOperation,
  PathItem: dereferencePathItem,
  Callback: dereferenceCallback,
};

/**
 * Resolve every reference in `source` against `store`.
 *
 * Each call starts with an empty cycle guard. The first reference that cannot
 * be resolved fails the whole call.
 */
export function dereference<K extends DereferenceableKind>(
  kind: K,
  source: Dereferenceable[K]["source"],
  store: DefinitionsStore,
  configuration?: DereferenceConfigurationInput
): Result<Dereferenceable[K]["dereferenced"], DereferenceError> {
  const dereferencer: Dereferencer<K> = dereferencers[kind];
  return dereferencer(source, createDereferenceContext(store, configuration));
}

/**
 * Dereference every path of a document against its own components.
 */
export function dereferenceDocument(
  document: OpenAPI.Document,
  configuration?: DereferenceConfigurationInput
): Result<DereferencedDocument, DereferenceError> {
  const store = DefinitionsStore.fromComponents(document.components);
  return dereferenceDocumentPaths(
    document,
    createDereferenceContext(store, configuration)
  );
}

/**
 * Dereference each path of a document on its own, so one broken reference
 * only fails the path it appears in.
 */
export function dereferenceEachPath(
  document: OpenAPI.Document,
  configuration?: DereferenceConfigurationInput
): Record<string, Result<DereferencedPathItem, DereferenceError>> {
  const store = DefinitionsStore.fromComponents(document.components);
  return orderedRecord(
    orderedEntries(document.paths ?? {}).map(
      ([path, pathItem]): [string, Result<DereferencedPathItem, DereferenceError>] => [
        path,
        dereferencePathItemOrReference(
          pathItem,
          createDereferenceContext(store, configuration)
        ),
      ]
    )
  );
}
