import { OpenAPI } from "@openapi-deref/core/openapi";
import {
  collectArray,
  collectRecord,
  mapOptional,
  ok,
  Result,
} from "@openapi-deref/core/result";
import { DereferenceError } from "../errors/DereferenceError.js";
import { DereferenceContext } from "../context/DereferenceContext.js";
import {
  DereferencedParameter,
  dereferenceParameter,
} from "./DereferencedParameter.js";
import {
  DereferencedRequestBody,
  dereferenceRequestBody,
} from "./DereferencedRequestBody.js";
import {
  DereferencedResponse,
  dereferenceResponse,
} from "./DereferencedResponse.js";
import {
  DereferencedCallback,
  dereferenceCallback,
} from "./DereferencedCallback.js";

export class DereferencedOperation {
  constructor(
    readonly source: OpenAPI.Operation,
    readonly parameters: readonly DereferencedParameter[],
    readonly requestBody: DereferencedRequestBody | undefined,
    readonly responses: Readonly<Record<string, DereferencedResponse>>,
    readonly callbacks: Readonly<Record<string, DereferencedCallback>> | undefined
  ) {}

  get operationId(): string | undefined {
    return this.source.operationId;
  }

  get tags(): readonly string[] | undefined {
    return this.source.tags;
  }

  get summary(): string | undefined {
    return this.source.summary;
  }

  get description(): string | undefined {
    return this.source.description;
  }

  get externalDocs(): OpenAPI.ExternalDocumentation | undefined {
    return this.source.externalDocs;
  }

  get deprecated(): boolean | undefined {
    return this.source.deprecated;
  }

  get security(): readonly OpenAPI.SecurityRequirement[] | undefined {
    return this.source.security;
  }

  get servers(): readonly OpenAPI.Server[] | undefined {
    return this.source.servers;
  }
}

export const dereferenceOperation = (
  operation: OpenAPI.Operation,
  ctx: DereferenceContext
): Result<DereferencedOperation, DereferenceError> => {
  const parameters = collectArray(operation.parameters ?? [], (parameter) =>
    dereferenceParameter(parameter, ctx)
  );
  if (!parameters.success) return parameters;

  const requestBody = mapOptional(operation.requestBody, (node) =>
    dereferenceRequestBody(node, ctx)
  );
  if (!requestBody.success) return requestBody;

  const responses = collectRecord(operation.responses, (response) =>
    dereferenceResponse(response, ctx)
  );
  if (!responses.success) return responses;

  const callbacks = mapOptional(operation.callbacks, (entries) =>
    collectRecord(entries, (callback) => dereferenceCallback(callback, ctx))
  );
  if (!callbacks.success) return callbacks;

  return ok(
    new DereferencedOperation(
      operation,
      parameters.data,
      requestBody.data,
      responses.data,
      callbacks.data
    )
  );
};
