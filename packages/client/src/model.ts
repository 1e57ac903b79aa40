/**
 * Model manager: the entry point for queries and single-record reads and
 * writes of one model.
 *
 * @packageDocumentation
 */

import { RemoteCode, type RecordId, type ScriptsInput, type WireValue } from '@recordset/shared-types';
import { RemoteBusinessError } from './errors.js';
import { unknownField, type FieldDefinitions, type FieldInput, type ModelSchema, type PortalDefinitions } from './field-catalog.js';
import { PortalPrefetchCoordinator } from './portal-prefetch.js';
import { QueryBuilder } from './query-builder.js';
import { RecordHandle } from './record.js';
import type { RawRecord, RecordsBackend } from './types.js';

export interface CreateOptions {
  scripts?: ScriptsInput;
}

/**
 * @public
 * @since 0.1.0
 */
export class ModelManager<F extends FieldDefinitions, P extends PortalDefinitions> {
  readonly schema: ModelSchema<F, P>;
  private readonly backend: RecordsBackend;

  constructor(schema: ModelSchema<F, P>, backend: RecordsBackend) {
    this.schema = schema;
    this.backend = backend;
  }

  /**
   * A query over every record of the layout
   */
  query(): QueryBuilder<F, P> {
    return new QueryBuilder(this.schema, this.backend);
  }

  private handle(raw: RawRecord): RecordHandle<F, P> {
    const coordinator = new PortalPrefetchCoordinator({
      backend: this.backend,
      layout: this.schema.layout,
      portals: this.schema.portals(),
      logger: this.backend.logger,
    });
    return new RecordHandle(this.schema, this.backend, raw, coordinator);
  }

  /**
   * Read one record by id
   *
   * @throws RemoteBusinessError when the record does not exist
   */
  async get(recordId: RecordId): Promise<RecordHandle<F, P>> {
    const page = await this.backend.getRecord({ layout: this.schema.layout, recordId });
    const [raw] = page.records;
    if (raw === undefined) {
      throw new RemoteBusinessError({ code: RemoteCode.RECORD_MISSING, message: 'Record is missing' }, undefined, {
        context: { layout: this.schema.layout, recordId },
      });
    }
    return this.handle(raw);
  }

  /**
   * Create a record from typed values and read it back
   */
  async create(values: FieldInput<F>, options: CreateOptions = {}): Promise<RecordHandle<F, P>> {
    const fieldData: Record<string, WireValue> = {};
    for (const name of Object.keys(values)) {
      if (!this.schema.hasField(name)) {
        throw unknownField(name, `layout '${this.schema.layout}'`);
      }
      const wire = this.encode(values, name);
      if (wire !== undefined) {
        fieldData[this.schema.catalog.resolve(name)] = wire;
      }
    }

    const created = await this.backend.createRecord({ layout: this.schema.layout, fieldData, scripts: options.scripts });
    return this.get(created.recordId);
  }

  private encode<K extends keyof F & string>(values: FieldInput<F>, field: K): WireValue | undefined {
    const value = values[field];
    return value === undefined ? undefined : this.backend.codec.encode(this.schema.fields[field].type, value);
  }
}
