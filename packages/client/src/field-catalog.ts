/**
 * Field Catalog
 *
 * Static registration of the fields a model reads and writes: field name to
 * remote field name and field type. Built once per model with
 * {@link defineModel}; every lookup of an undeclared name fails loudly.
 *
 * @packageDocumentation
 */

import type { FieldType, FieldValue } from '@recordset/shared-types';
import { ValidationError, ValidationErrorCode } from './errors.js';

// =============================================================================
// Definitions
// =============================================================================

/**
 * @public
 * @since 0.1.0
 */
export interface FieldDefinition<T extends FieldType = FieldType> {
  type: T;
  /** Remote field name; defaults to the declared name */
  remote?: string;
}

export type FieldDefinitions = Record<string, FieldDefinition>;

/**
 * Typed values for some of the fields `F` declares
 */
export type FieldInput<F extends FieldDefinitions> = { readonly [K in keyof F]?: FieldValue<F[K]['type']> };

/**
 * Options shared by the field helpers
 */
export interface FieldOptions {
  remote?: string;
}

function fieldOf<T extends FieldType>(type: T, options: FieldOptions): FieldDefinition<T> {
  return options.remote === undefined ? { type } : { type, remote: options.remote };
}

/**
 * Field definition helpers
 *
 * @example
 * ```typescript
 * const fields = {
 *   name: field.text(),
 *   born: field.date({ remote: 'Birth Date' }),
 * };
 * ```
 */
export const field = {
  text: (options: FieldOptions = {}): FieldDefinition<'text'> => fieldOf('text', options),
  number: (options: FieldOptions = {}): FieldDefinition<'number'> => fieldOf('number', options),
  boolean: (options: FieldOptions = {}): FieldDefinition<'boolean'> => fieldOf('boolean', options),
  date: (options: FieldOptions = {}): FieldDefinition<'date'> => fieldOf('date', options),
  timestamp: (options: FieldOptions = {}): FieldDefinition<'timestamp'> => fieldOf('timestamp', options),
} as const;

/**
 * A related collection shown through a portal on the model's layout
 *
 * @public
 * @since 0.1.0
 */
export interface PortalDefinition<F extends FieldDefinitions = FieldDefinitions> {
  /** Table occurrence prefixing the remote keys (`table::field`); defaults to the portal name */
  table?: string;
  /** Portal object name on the layout; defaults to the declared name */
  remote?: string;
  fields: F;
  /** Related records requested per page; defaults to 50 */
  chunkSize?: number;
}

export type PortalDefinitions = Record<string, PortalDefinition>;

export interface ModelDefinition<F extends FieldDefinitions, P extends PortalDefinitions> {
  layout: string;
  fields: F;
  portals?: P;
}

export const DEFAULT_PORTAL_CHUNK_SIZE = 50;

// =============================================================================
// Name Validation
// =============================================================================

/**
 * Names a declared field cannot take, since record handles and queries use
 * them for their own members
 */
export const RESERVED_FIELD_NAMES: readonly string[] = ['recordId', 'modId', 'portal', 'layout', 'model', 'tableOccurrence'];

export function unknownField(field: string, owner: string): ValidationError {
  return new ValidationError(ValidationErrorCode.UNKNOWN_FIELD, `Field '${field}' is not declared on ${owner}`, {
    context: { field },
  });
}

/**
 * @throws ValidationError with code INVALID_FIELD_NAME
 */
export function validateFieldName(name: string): void {
  const fail = (reason: string): never => {
    throw new ValidationError(ValidationErrorCode.INVALID_FIELD_NAME, `Invalid field name '${name}': ${reason}`, {
      context: { field: name },
    });
  };

  if (name.length === 0) fail('name cannot be empty');
  if (name.includes('__')) fail("'__' separates a field from a query operator");
  if (name.startsWith('_')) fail('names cannot start with an underscore');
  if (RESERVED_FIELD_NAMES.includes(name)) fail('the name is reserved');
}

// =============================================================================
// Catalog
// =============================================================================

/**
 * Field name to remote name and type lookup
 *
 * @public
 * @since 0.1.0
 */
export interface FieldCatalog {
  /**
   * @throws ValidationError with code UNKNOWN_FIELD
   */
  resolve(field: string): string;
  /**
   * @throws ValidationError with code UNKNOWN_FIELD
   */
  typeOf(field: string): FieldType;
  has(field: string): boolean;
  /** Declared names in declaration order */
  names(): string[];
}

interface CatalogEntry {
  remote: string;
  type: FieldType;
}

/**
 * Catalog backed by a registration table built at definition time
 */
export class StaticFieldCatalog implements FieldCatalog {
  private readonly entries = new Map<string, CatalogEntry>();
  private readonly owner: string;

  /**
   * @param remotePrefix prepended to every remote name (`table::` for portals)
   */
  constructor(owner: string, fields: FieldDefinitions, remotePrefix = '') {
    this.owner = owner;
    for (const [name, definition] of Object.entries(fields)) {
      validateFieldName(name);
      this.entries.set(name, { remote: `${remotePrefix}${definition.remote ?? name}`, type: definition.type });
    }
  }

  private entry(field: string): CatalogEntry {
    const entry = this.entries.get(field);
    if (!entry) {
      throw unknownField(field, this.owner);
    }
    return entry;
  }

  resolve(field: string): string {
    return this.entry(field).remote;
  }

  typeOf(field: string): FieldType {
    return this.entry(field).type;
  }

  has(field: string): boolean {
    return this.entries.has(field);
  }

  names(): string[] {
    return [...this.entries.keys()];
  }
}

// =============================================================================
// Schemas
// =============================================================================

/**
 * Resolved portal of a model
 */
export class PortalSchema {
  readonly name: string;
  /** Portal object name sent to the remote */
  readonly remote: string;
  readonly table: string;
  readonly chunkSize: number;
  readonly catalog: FieldCatalog;

  constructor(name: string, definition: PortalDefinition) {
    validateFieldName(name);
    const chunkSize = definition.chunkSize ?? DEFAULT_PORTAL_CHUNK_SIZE;
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new ValidationError(
        ValidationErrorCode.INVALID_ARGUMENT,
        `Portal '${name}' chunk size must be a positive integer, got ${chunkSize}`
      );
    }
    this.name = name;
    this.remote = definition.remote ?? name;
    this.table = definition.table ?? this.remote;
    this.chunkSize = chunkSize;
    this.catalog = new StaticFieldCatalog(`portal '${name}'`, definition.fields, `${this.table}::`);
  }
}

/**
 * Resolved model: layout, field catalog and portals
 *
 * @public
 * @since 0.1.0
 */
export class ModelSchema<F extends FieldDefinitions, P extends PortalDefinitions> {
  readonly layout: string;
  readonly fields: F;
  readonly catalog: FieldCatalog;
  private readonly portalDefinitions: P | undefined;
  private readonly portalSchemas = new Map<string, PortalSchema>();

  constructor(definition: ModelDefinition<F, P>) {
    if (definition.layout.length === 0) {
      throw new ValidationError(ValidationErrorCode.INVALID_ARGUMENT, 'Model layout cannot be empty');
    }
    this.layout = definition.layout;
    this.fields = definition.fields;
    this.catalog = new StaticFieldCatalog(`layout '${definition.layout}'`, definition.fields);
    this.portalDefinitions = definition.portals;
    for (const [name, portal] of Object.entries(definition.portals ?? {})) {
      this.portalSchemas.set(name, new PortalSchema(name, portal));
    }
  }

  /**
   * Whether `name` is a declared field
   */
  hasField(name: string): name is keyof F & string {
    return this.catalog.has(name);
  }

  /**
   * Whether `name` is a declared portal
   */
  hasPortal(name: string): name is keyof P & string {
    return this.portalSchemas.has(name);
  }

  /**
   * @throws ValidationError with code UNKNOWN_PORTAL
   */
  portal(name: string): PortalSchema {
    const schema = this.portalSchemas.get(name);
    if (!schema) {
      throw new ValidationError(ValidationErrorCode.UNKNOWN_PORTAL, `Portal '${name}' is not declared on layout '${this.layout}'`);
    }
    return schema;
  }

  /**
   * Declared fields of a portal, with their types
   * @throws ValidationError with code UNKNOWN_PORTAL
   */
  portalFields<K extends keyof P & string>(name: K): P[K]['fields'] {
    const definition = this.portalDefinitions?.[name];
    if (!definition) {
      throw new ValidationError(ValidationErrorCode.UNKNOWN_PORTAL, `Portal '${name}' is not declared on layout '${this.layout}'`);
    }
    return definition.fields;
  }

  portals(): PortalSchema[] {
    return [...this.portalSchemas.values()];
  }
}

/**
 * Declare a model once, at startup
 *
 * @example
 * ```typescript
 * const Person = defineModel({
 *   layout: 'People',
 *   fields: { name: field.text(), age: field.number() },
 *   portals: { pets: { table: 'Pets', fields: { kind: field.text() } } },
 * });
 * ```
 *
 * @public
 * @since 0.1.0
 */
export function defineModel<F extends FieldDefinitions, P extends PortalDefinitions = Record<never, PortalDefinition>>(
  definition: ModelDefinition<F, P>
): ModelSchema<F, P> {
  return new ModelSchema(definition);
}
