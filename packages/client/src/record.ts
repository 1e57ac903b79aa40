/**
 * Record handles
 *
 * A decoded record of a model: typed field access, local pending changes,
 * and one related collection per declared portal. Writes go through the
 * handle and update its mod id.
 *
 * @packageDocumentation
 */

import {
  RemoteCode,
  type FieldType,
  type FieldValue,
  type ModId,
  type RecordId,
  type ScriptsInput,
  type WireValue,
} from '@recordset/shared-types';
import { RemoteBusinessError, ValidationError } from './errors.js';
import { unknownField, type FieldDefinitions, type FieldInput, type ModelSchema, type PortalDefinitions } from './field-catalog.js';
import type { LazyResultCache } from './lazy-result-cache.js';
import { PortalPrefetchCoordinator, RelatedCollection } from './portal-prefetch.js';
import type { CreateRecordResult, RawPortalRecord, RawRecord, RecordsBackend, ScriptResults } from './types.js';

export interface SaveOptions {
  /** Send the mod id so the remote rejects the edit if the record changed */
  checkModId?: boolean;
  scripts?: ScriptsInput;
}

export interface DeleteOptions {
  scripts?: ScriptsInput;
}

export interface DuplicateOptions {
  scripts?: ScriptsInput;
}

/**
 * @public
 * @since 0.1.0
 */
export class RecordHandle<F extends FieldDefinitions, P extends PortalDefinitions> {
  readonly recordId: RecordId;
  readonly model: ModelSchema<F, P>;
  private currentModId: ModId;
  private raw: RawRecord;
  private readonly pending = new Map<string, WireValue>();
  private coordinator: PortalPrefetchCoordinator;
  private portalSources = new Map<string, LazyResultCache<RawPortalRecord>>();
  private readonly backend: RecordsBackend;

  /**
   * @throws ValidationError with code DECODE_FAILED when a declared field
   *   does not decode
   */
  constructor(model: ModelSchema<F, P>, backend: RecordsBackend, raw: RawRecord, coordinator: PortalPrefetchCoordinator) {
    this.model = model;
    this.backend = backend;
    this.recordId = raw.recordId;
    this.currentModId = raw.modId;
    this.raw = raw;
    this.coordinator = coordinator;
    this.toObject();
  }

  get modId(): ModId {
    return this.currentModId;
  }

  get layout(): string {
    return this.model.layout;
  }

  // ===========================================================================
  // Field Access
  // ===========================================================================

  private wireValue(field: string): WireValue | undefined {
    const remote = this.model.catalog.resolve(field);
    return this.pending.get(field) ?? this.raw.fieldData[remote];
  }

  private decode<T extends FieldType>(field: string, type: T, wire: WireValue): FieldValue<T> {
    try {
      return this.backend.codec.decode<T>(type, wire);
    } catch (error) {
      if (error instanceof ValidationError) {
        error.withContext({ layout: this.model.layout, recordId: this.recordId, field });
      }
      throw error;
    }
  }

  /**
   * Current value of a field, pending change included. A declared field the
   * response did not carry reads as `null`.
   */
  get<K extends keyof F & string>(field: K): FieldValue<F[K]['type']> {
    const wire = this.wireValue(field);
    if (wire === undefined) {
      return null;
    }
    return this.decode<F[K]['type']>(field, this.model.fields[field].type, wire);
  }

  /**
   * Record a pending change. The value is encoded at once, so a value the
   * field cannot hold fails here rather than on save.
   */
  set<K extends keyof F & string>(field: K, value: FieldValue<F[K]['type']>): void {
    this.model.catalog.resolve(field);
    this.pending.set(field, this.backend.codec.encode(this.model.fields[field].type, value));
  }

  /**
   * Record pending changes for every field in `values`
   */
  assign(values: FieldInput<F>): void {
    for (const name of Object.keys(values)) {
      if (!this.model.hasField(name)) {
        throw unknownField(name, `layout '${this.model.layout}'`);
      }
      this.assignField(values, name);
    }
  }

  private assignField<K extends keyof F & string>(values: FieldInput<F>, field: K): void {
    const value = values[field];
    if (value !== undefined) {
      this.set(field, value);
    }
  }

  get isDirty(): boolean {
    return this.pending.size > 0;
  }

  /**
   * Pending changes by field name
   */
  get changes(): Record<string, FieldValue> {
    const result: Record<string, FieldValue> = {};
    for (const [field, wire] of this.pending) {
      result[field] = this.decode(field, this.model.catalog.typeOf(field), wire);
    }
    return result;
  }

  /**
   * Every declared field by name, pending changes included
   */
  toObject(): Record<string, FieldValue> {
    const result: Record<string, FieldValue> = {};
    for (const field of this.model.catalog.names()) {
      const wire = this.wireValue(field);
      result[field] = wire === undefined ? null : this.decode(field, this.model.catalog.typeOf(field), wire);
    }
    return result;
  }

  // ===========================================================================
  // Portals
  // ===========================================================================

  /**
   * Related records of a declared portal
   *
   * @throws ValidationError with code UNKNOWN_PORTAL
   */
  portal<K extends keyof P & string>(name: K): RelatedCollection<P[K]['fields']> {
    const schema = this.model.portal(name);
    let source = this.portalSources.get(name);
    if (source === undefined) {
      source = this.coordinator.sourceFor(this.raw, schema);
      this.portalSources.set(name, source);
    }
    return new RelatedCollection(schema, this.model.portalFields(name), source, this.backend.codec);
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  /**
   * Send the pending changes. Only changed fields are written.
   *
   * @returns results of the scripts that ran, empty when nothing was pending
   * @throws RemoteBusinessError when the remote rejects the edit, such as a
   *   mod id mismatch under `checkModId`
   */
  async save(options: SaveOptions = {}): Promise<ScriptResults> {
    if (this.pending.size === 0) {
      return {};
    }

    const fieldData: Record<string, WireValue> = {};
    for (const [field, wire] of this.pending) {
      fieldData[this.model.catalog.resolve(field)] = wire;
    }

    const result = await this.backend.editRecord({
      layout: this.model.layout,
      recordId: this.recordId,
      fieldData,
      modId: options.checkModId ? this.currentModId : undefined,
      scripts: options.scripts,
    });

    this.currentModId = result.modId;
    this.raw = { ...this.raw, modId: result.modId, fieldData: { ...this.raw.fieldData, ...fieldData } };
    this.pending.clear();
    this.backend.logger.debug('Saved record {recordId}', { recordId: this.recordId, fields: Object.keys(fieldData) });
    return result.scriptResults;
  }

  async delete(options: DeleteOptions = {}): Promise<ScriptResults> {
    const result = await this.backend.deleteRecord({
      layout: this.model.layout,
      recordId: this.recordId,
      scripts: options.scripts,
    });
    return result.scriptResults;
  }

  /**
   * Copy the stored record. Pending changes are not part of the copy.
   */
  async duplicate(options: DuplicateOptions = {}): Promise<CreateRecordResult> {
    return this.backend.duplicateRecord({
      layout: this.model.layout,
      recordId: this.recordId,
      scripts: options.scripts,
    });
  }

  /**
   * Re-read the record. Pending changes and fetched related rows are
   * discarded.
   */
  async refresh(): Promise<void> {
    const page = await this.backend.getRecord({ layout: this.model.layout, recordId: this.recordId });
    const [raw] = page.records;
    if (raw === undefined) {
      throw new RemoteBusinessError(
        { code: RemoteCode.RECORD_MISSING, message: 'Record is missing' },
        undefined,
        { context: { layout: this.model.layout, recordId: this.recordId } }
      );
    }

    this.raw = raw;
    this.currentModId = raw.modId;
    this.pending.clear();
    this.coordinator = new PortalPrefetchCoordinator({
      backend: this.backend,
      layout: this.model.layout,
      portals: this.model.portals(),
      logger: this.backend.logger,
    });
    this.portalSources = new Map();
    this.toObject();
  }
}
