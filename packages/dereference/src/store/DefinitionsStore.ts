import type { OpenAPI } from "@openapi-deref/core/openapi";
import { err, ok, Result } from "@openapi-deref/core/result";
import { orderedEntries } from "@openapi-deref/core/record";
import { Definition, DefinitionCategory } from "./DefinitionCategory.js";
import { DereferenceError, notFound } from "../errors/DereferenceError.js";

export type DefinitionRecords = {
  [C in DefinitionCategory]?: Readonly<Record<string, Definition<C>>>;
};

type DefinitionTables = {
  readonly [C in DefinitionCategory]: ReadonlyMap<string, Definition<C>>;
};

const toTable = <T>(
  record: Readonly<Record<string, T>> | undefined
): ReadonlyMap<string, T> => new Map(orderedEntries(record ?? {}));

/**
 * Read-only table of the named definitions of one document.
 *
 * The tables are copied on construction: definitions added to or removed from
 * the components object afterwards are not seen. The definitions themselves
 * are shared, not copied. Dereferenced results reuse them (an example, a
 * schema's `enum` array) and must not be mutated.
 */
export class DefinitionsStore {
  private readonly tables: DefinitionTables;

  constructor(records: DefinitionRecords = {}) {
    this.tables = {
      schemas: toTable(records.schemas),
      responses: toTable(records.responses),
      parameters: toTable(records.parameters),
      examples: toTable(records.examples),
      requestBodies: toTable(records.requestBodies),
      headers: toTable(records.headers),
      securitySchemes: toTable(records.securitySchemes),
      links: toTable(records.links),
      callbacks: toTable(records.callbacks),
    };
  }

  static fromComponents(
    components: OpenAPI.Components | undefined
  ): DefinitionsStore {
    return new DefinitionsStore(components ?? {});
  }

  lookup<C extends DefinitionCategory>(
    category: C,
    name: string
  ): Result<Definition<C>, DereferenceError> {
    const table: ReadonlyMap<string, Definition<C>> = this.tables[category];
    const definition = table.get(name);
    if (definition === undefined) {
      return err(notFound(category, name));
    }
    return ok(definition);
  }

  has(category: DefinitionCategory, name: string): boolean {
    return this.tables[category].has(name);
  }

  names(category: DefinitionCategory): string[] {
    return [...this.tables[category].keys()];
  }
}
