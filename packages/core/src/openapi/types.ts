/**
 * OpenAPI object model
 * Based on OpenAPI Specification v3.0.3
 * https://spec.openapis.org/oas/v3.0.3.html
 *
 * Zod v4 implementation
 */

import { z } from "zod";
import { setOpenAPITag, TaggedObject } from "./tag.js";
import { ParameterLocation, ParameterStyle } from "./style.js";
import { decodeEncodingFields } from "./encoding.js";
import { OrderedRecord } from "./ordered.js";

// ------------------------------------------------------------------------------
// OpenAPI Namespace
//
// Schema, the Header / MediaType / Encoding cluster and the
// Operation / PathItem / Callback cluster are recursive and use z.lazy() with
// explicit types. Everything else uses direct references.
//
// Maps are OrderedRecords so authored key order survives parsing.
// ------------------------------------------------------------------------------
export namespace OpenAPI {
  // ===========================================================================
  // Layer 1: Leaf types (no dependencies)
  // ===========================================================================

  // Reference Object - used at use sites for referenceable types
  export const Reference = TaggedObject(
    {
      $ref: z.string(),
    },
    "Reference"
  );

  // Objects no reference can appear in (XML, Discriminator, Contact, License,
  // server variables, OAuth flows). Carried through without inspection.
  export const Opaque = OrderedRecord(z.unknown());

  export const Example = TaggedObject(
    {
      summary: z.string().optional(),
      description: z.string().optional(),
      value: z.unknown().optional(),
      externalValue: z.string().optional(),
    },
    "Example"
  );

  export const SecurityRequirement = z.record(z.string(), z.array(z.string()));

  export const ExternalDocumentation = TaggedObject(
    {
      description: z.string().optional(),
      url: z.string(),
    },
    "ExternalDocumentation"
  );

  export const Server = TaggedObject(
    {
      url: z.string(),
      description: z.string().optional(),
      variables: OrderedRecord(Opaque).optional(),
    },
    "Server"
  );

  // Link Object. `requestBody` and parameter values are runtime expressions
  // or literals and never carry references.
  export const Link = TaggedObject(
    {
      operationRef: z.string().optional(),
      operationId: z.string().optional(),
      parameters: Opaque.optional(),
      requestBody: z.unknown().optional(),
      description: z.string().optional(),
      server: Server.optional(),
    },
    "Link"
  );

  // ===========================================================================
  // Layer 2: Schema (recursive - uses z.lazy)
  // ===========================================================================

  type SchemaType = {
    // JSON Schema properties
    title?: string;
    multipleOf?: number;
    maximum?: number;
    exclusiveMaximum?: boolean;
    minimum?: number;
    exclusiveMinimum?: boolean;
    maxLength?: number;
    minLength?: number;
    pattern?: string;
    maxItems?: number;
    minItems?: number;
    uniqueItems?: boolean;
    maxProperties?: number;
    minProperties?: number;
    required?: string[];
    enum?: unknown[];

    // Modified JSON Schema properties
    type?: string;
    allOf?: (SchemaType | Reference)[];
    oneOf?: (SchemaType | Reference)[];
    anyOf?: (SchemaType | Reference)[];
    not?: SchemaType | Reference;
    items?: SchemaType | Reference;
    properties?: Record<string, SchemaType | Reference>;
    additionalProperties?: boolean | SchemaType | Reference;
    description?: string;
    format?: string;
    default?: unknown;

    // OpenAPI-specific properties
    nullable?: boolean;
    discriminator?: Opaque;
    readOnly?: boolean;
    writeOnly?: boolean;
    xml?: Opaque;
    externalDocs?: ExternalDocumentation;
    example?: unknown;
    deprecated?: boolean;
  };

  const SchemaOrRef: z.ZodType<SchemaType | Reference> = z.lazy(() =>
    z.union([Reference, Schema])
  );

  export const Schema: z.ZodType<SchemaType> = z.lazy(() =>
    z
      .object({
        title: z.string().optional(),
        multipleOf: z.number().optional(),
        maximum: z.number().optional(),
        exclusiveMaximum: z.boolean().optional(),
        minimum: z.number().optional(),
        exclusiveMinimum: z.boolean().optional(),
        maxLength: z.number().int().optional(),
        minLength: z.number().int().optional(),
        pattern: z.string().optional(),
        maxItems: z.number().int().optional(),
        minItems: z.number().int().optional(),
        uniqueItems: z.boolean().optional(),
        maxProperties: z.number().int().optional(),
        minProperties: z.number().int().optional(),
        required: z.array(z.string()).optional(),
        enum: z.array(z.unknown()).optional(),

        type: z.string().optional(),
        allOf: z.array(SchemaOrRef).optional(),
        oneOf: z.array(SchemaOrRef).optional(),
        anyOf: z.array(SchemaOrRef).optional(),
        not: SchemaOrRef.optional(),
        items: SchemaOrRef.optional(),
        properties: OrderedRecord(SchemaOrRef).optional(),
        additionalProperties: z.union([z.boolean(), SchemaOrRef]).optional(),
        description: z.string().optional(),
        format: z.string().optional(),
        default: z.unknown().optional(),

        nullable: z.boolean().optional(),
        discriminator: Opaque.optional(),
        readOnly: z.boolean().optional(),
        writeOnly: z.boolean().optional(),
        xml: Opaque.optional(),
        externalDocs: ExternalDocumentation.optional(),
        example: z.unknown().optional(),
        deprecated: z.boolean().optional(),
      })
      .transform((value) => {
        setOpenAPITag(value, "Schema");
        return value;
      })
  );

  // ===========================================================================
  // Layer 3: Header / MediaType / Encoding (mutually recursive)
  // ===========================================================================

  type HeaderType = {
    description?: string;
    required?: boolean;
    deprecated?: boolean;
    allowEmptyValue?: boolean;
    style?: ParameterStyle;
    explode?: boolean;
    allowReserved?: boolean;
    schema?: SchemaType | Reference;
    example?: unknown;
    examples?: Record<string, Example | Reference>;
    content?: Record<string, MediaTypeType>;
  };

  type MediaTypeType = {
    schema?: SchemaType | Reference;
    example?: unknown;
    examples?: Record<string, Example | Reference>;
    encoding?: Record<string, EncodingType>;
  };

  /**
   * Encoding Object, decoded into its model form.
   *
   * The wire `contentType` is a comma separated list; it is kept here as
   * `contentTypes`. `style`, `explode` and `allowReserved` always carry a value,
   * filled from their defaults when the document omits them.
   */
  type EncodingType = {
    contentTypes: string[];
    headers?: Record<string, HeaderType | Reference>;
    style: ParameterStyle;
    explode: boolean;
    allowReserved: boolean;
    vendorExtensions?: Record<string, unknown>;
  };

  const SchemaOrReference = z.union([Reference, Schema]);
  const ExampleOrReference = z.union([Reference, Example]);
  const Examples = OrderedRecord(ExampleOrReference);

  const HeaderOrReference: z.ZodType<HeaderType | Reference> = z.lazy(() =>
    z.union([Reference, Header])
  );

  export const Encoding: z.ZodType<EncodingType> = z.lazy(() =>
    z
      .looseObject({
        contentType: z.string().optional(),
        headers: OrderedRecord(HeaderOrReference).optional(),
        style: ParameterStyle.optional(),
        explode: z.boolean().optional(),
        allowReserved: z.boolean().optional(),
      })
      .transform((fields) => {
        const encoding = decodeEncodingFields(fields);
        setOpenAPITag(encoding, "Encoding");
        return encoding;
      })
  );

  export const MediaType: z.ZodType<MediaTypeType> = z.lazy(() =>
    z
      .object({
        schema: SchemaOrReference.optional(),
        example: z.unknown().optional(),
        examples: Examples.optional(),
        encoding: OrderedRecord(Encoding).optional(),
      })
      .transform((value) => {
        setOpenAPITag(value, "MediaType");
        return value;
      })
  );

  const Content = OrderedRecord(MediaType);

  export const Header: z.ZodType<HeaderType> = z.lazy(() =>
    z
      .object({
        description: z.string().optional(),
        required: z.boolean().optional(),
        deprecated: z.boolean().optional(),
        allowEmptyValue: z.boolean().optional(),
        style: ParameterStyle.optional(),
        explode: z.boolean().optional(),
        allowReserved: z.boolean().optional(),
        schema: SchemaOrReference.optional(),
        example: z.unknown().optional(),
        examples: Examples.optional(),
        content: Content.optional(),
      })
      .transform((value) => {
        setOpenAPITag(value, "Header");
        return value;
      })
  );

  // ===========================================================================
  // Layer 4: Request / response types
  // ===========================================================================

  const LinkOrReference = z.union([Reference, Link]);

  export const Response = TaggedObject(
    {
      description: z.string(),
      headers: OrderedRecord(HeaderOrReference).optional(),
      content: Content.optional(),
      links: OrderedRecord(LinkOrReference).optional(),
    },
    "Response"
  );

  const ResponseOrReference = z.union([Reference, Response]);

  export const Parameter = TaggedObject(
    {
      name: z.string(),
      in: ParameterLocation,
      description: z.string().optional(),
      required: z.boolean().optional(),
      deprecated: z.boolean().optional(),
      allowEmptyValue: z.boolean().optional(),
      style: ParameterStyle.optional(),
      explode: z.boolean().optional(),
      allowReserved: z.boolean().optional(),
      schema: SchemaOrReference.optional(),
      example: z.unknown().optional(),
      examples: Examples.optional(),
      content: Content.optional(),
    },
    "Parameter"
  );

  const ParameterOrReference = z.union([Reference, Parameter]);

  export const RequestBody = TaggedObject(
    {
      description: z.string().optional(),
      content: Content,
      required: z.boolean().optional(),
    },
    "RequestBody"
  );

  const RequestBodyOrReference = z.union([Reference, RequestBody]);

  export const SecurityScheme = TaggedObject(
    {
      type: z.enum(["apiKey", "http", "oauth2", "openIdConnect"]),
      description: z.string().optional(),
      name: z.string().optional(),
      in: z.enum(["query", "header", "cookie"]).optional(),
      scheme: z.string().optional(),
      bearerFormat: z.string().optional(),
      flows: Opaque.optional(),
      openIdConnectUrl: z.string().optional(),
    },
    "SecurityScheme"
  );

  const SecuritySchemeOrReference = z.union([Reference, SecurityScheme]);

  // ===========================================================================
  // Layer 5: Operation / PathItem / Callback (mutually recursive)
  // ===========================================================================

  type OperationType = {
    tags?: string[];
    summary?: string;
    description?: string;
    externalDocs?: ExternalDocumentation;
    operationId?: string;
    parameters?: (Parameter | Reference)[];
    requestBody?: RequestBody | Reference;
    responses: Record<string, Response | Reference>;
    callbacks?: Record<string, CallbackType | Reference>;
    deprecated?: boolean;
    security?: SecurityRequirement[];
    servers?: Server[];
  };

  type PathItemType = {
    summary?: string;
    description?: string;
    get?: OperationType;
    put?: OperationType;
    post?: OperationType;
    delete?: OperationType;
    options?: OperationType;
    head?: OperationType;
    patch?: OperationType;
    trace?: OperationType;
    servers?: Server[];
    parameters?: (Parameter | Reference)[];
  };

  // Runtime expression to the path item describing the request sent to it
  type CallbackType = Record<string, PathItemType | Reference>;

  const PathItemOrReference: z.ZodType<PathItemType | Reference> = z.lazy(() =>
    z.union([Reference, PathItem])
  );

  export const Callback: z.ZodType<CallbackType> = z.lazy(() =>
    OrderedRecord(PathItemOrReference)
  );

  const CallbackOrReference: z.ZodType<CallbackType | Reference> = z.lazy(() =>
    z.union([Reference, Callback])
  );

  export const Operation: z.ZodType<OperationType> = z.lazy(() =>
    z
      .object({
        tags: z.array(z.string()).optional(),
        summary: z.string().optional(),
        description: z.string().optional(),
        externalDocs: ExternalDocumentation.optional(),
        operationId: z.string().optional(),
        parameters: z.array(ParameterOrReference).optional(),
        requestBody: RequestBodyOrReference.optional(),
        responses: OrderedRecord(ResponseOrReference),
        callbacks: OrderedRecord(CallbackOrReference).optional(),
        deprecated: z.boolean().optional(),
        security: z.array(SecurityRequirement).optional(),
        servers: z.array(Server).optional(),
      })
      .transform((value) => {
        setOpenAPITag(value, "Operation");
        return value;
      })
  );

  export const PathItem: z.ZodType<PathItemType> = z.lazy(() =>
    z
      .object({
        summary: z.string().optional(),
        description: z.string().optional(),
        get: Operation.optional(),
        put: Operation.optional(),
        post: Operation.optional(),
        delete: Operation.optional(),
        options: Operation.optional(),
        head: Operation.optional(),
        patch: Operation.optional(),
        trace: Operation.optional(),
        servers: z.array(Server).optional(),
        parameters: z.array(ParameterOrReference).optional(),
      })
      .transform((value) => {
        setOpenAPITag(value, "PathItem");
        return value;
      })
  );

  // ===========================================================================
  // Layer 6: Components
  // ===========================================================================

  export const Components = TaggedObject(
    {
      schemas: OrderedRecord(SchemaOrReference).optional(),
      responses: OrderedRecord(ResponseOrReference).optional(),
      parameters: OrderedRecord(ParameterOrReference).optional(),
      examples: Examples.optional(),
      requestBodies: OrderedRecord(RequestBodyOrReference).optional(),
      headers: OrderedRecord(HeaderOrReference).optional(),
      securitySchemes: OrderedRecord(SecuritySchemeOrReference).optional(),
      links: OrderedRecord(LinkOrReference).optional(),
      callbacks: OrderedRecord(CallbackOrReference).optional(),
    },
    "Components"
  );

  // ===========================================================================
  // Layer 7: Top-level types
  // ===========================================================================

  export const Tag = TaggedObject(
    {
      name: z.string(),
      description: z.string().optional(),
      externalDocs: ExternalDocumentation.optional(),
    },
    "Tag"
  );

  export const Info = TaggedObject(
    {
      title: z.string(),
      description: z.string().optional(),
      termsOfService: z.string().optional(),
      contact: Opaque.optional(),
      license: Opaque.optional(),
      version: z.string(),
    },
    "Info"
  );

  export const Document = TaggedObject(
    {
      openapi: z.string(),
      info: Info,
      servers: z.array(Server).optional(),
      paths: OrderedRecord(PathItemOrReference).optional(),
      components: Components.optional(),
      security: z.array(SecurityRequirement).optional(),
      tags: z.array(Tag).optional(),
      externalDocs: ExternalDocumentation.optional(),
    },
    "Document"
  );

  // ===========================================================================
  // Type exports
  // ===========================================================================
  export type Reference = z.infer<typeof Reference>;
  export type Opaque = z.infer<typeof Opaque>;
  export type ExternalDocumentation = z.infer<typeof ExternalDocumentation>;
  export type Schema = SchemaType;
  export type MediaType = MediaTypeType;
  export type Example = z.infer<typeof Example>;
  export type Encoding = EncodingType;
  export type Header = HeaderType;
  export type Link = z.infer<typeof Link>;
  export type Server = z.infer<typeof Server>;
  export type Response = z.infer<typeof Response>;
  export type Parameter = z.infer<typeof Parameter>;
  export type RequestBody = z.infer<typeof RequestBody>;
  export type SecurityRequirement = z.infer<typeof SecurityRequirement>;
  export type Operation = OperationType;
  export type PathItem = PathItemType;
  export type Callback = CallbackType;
  export type SecurityScheme = z.infer<typeof SecurityScheme>;
  export type Components = z.infer<typeof Components>;
  export type Tag = z.infer<typeof Tag>;
  export type Info = z.infer<typeof Info>;
  export type Document = z.infer<typeof Document>;
}
