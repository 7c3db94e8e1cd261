/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Declarative description of a DXF record kind.
 *
 * A schema is built once per kind and shared by every record of that
 * kind; it holds no mutable state.
 */

import type { DxfRecord, FormatVersion } from '@dxfio/data';
import type { GroupCodeClass } from '@dxfio/encoding';

/**
 * Typed read/write access to one property of a record
 */
export interface Accessor<R, V> {
  /** Property name, used in diagnostics */
  readonly name: string;
  get(record: R): V;
  set(record: R, value: V): void;
}

/**
 * One group code of a schema. Value types are sealed inside the rule;
 * the codec only moves wire text in and out.
 */
export interface FieldRule<R> {
  readonly name: string;
  readonly groupCode: number;
  readonly valueClass: GroupCodeClass;
  /** Each tag appends to a ScalarList instead of overwriting */
  readonly repeatable: boolean;
  /** An empty value rejects the whole record */
  readonly required: boolean;
  /** First version the tag is legal in */
  readonly minVersion?: FormatVersion;
  /** Last version the tag is legal in */
  readonly maxVersion?: FormatVersion;
  /**
   * Parse wire text and store it on the record.
   * @returns false when the text is not a value of the rule's class
   */
  read(record: R, raw: string): boolean;
  /**
   * Wire values to write: [] when the field is omitted, one entry per node
   * for repeatable fields. Empty strings with a fallback come out as the
   * fallback; the record itself is not modified.
   */
  write(record: R): string[];
  /** True when the value is an empty string or an empty list */
  isEmpty(record: R): boolean;
  /**
   * Replace an empty string with the rule's fallback.
   * @returns true when the fallback was applied
   */
  applyFallback(record: R): boolean;
}

/**
 * Repeatable fields that together describe a sequence of elements
 * (one LTYPE dash plus its complex-element data, for instance).
 * The lead rule has one value per element; members contribute their next
 * unread value to element i only where `includes` says so.
 */
export interface ElementGroup<R> {
  readonly name: string;
  readonly lead: FieldRule<R>;
  readonly members: readonly ElementMember<R>[];
}

export interface ElementMember<R> {
  readonly rule: FieldRule<R>;
  includes?(record: R, index: number): boolean;
}

/**
 * Fields that follow one subclass marker, in emission order
 */
export interface SchemaSection<R> {
  /** Subclass marker (group code 100); omitted sections have none */
  readonly marker?: string;
  /** Version from which the marker is written; defaults to R13 */
  readonly markerMinVersion?: FormatVersion;
  readonly fields: readonly FieldRule<R>[];
  readonly elements?: readonly ElementGroup<R>[];
}

export interface SchemaDefinition<R extends DxfRecord> {
  /** Entity or object name written with group code 0 */
  typeName: string;
  /** Versions below this log a VersionMismatch diagnostic */
  minVersion?: FormatVersion;
  sections: readonly SchemaSection<R>[];
  /** New record holding the schema's defaults */
  create(): R;
}

export interface EntitySchema<R extends DxfRecord> extends Readonly<SchemaDefinition<R>> {
  /** Every rule, including element group members, in emission order */
  readonly rules: readonly FieldRule<R>[];
  /** Subclass markers mapped to the version they are written from */
  readonly markers: ReadonlyMap<string, FormatVersion>;
  ruleFor(groupCode: number): FieldRule<R> | undefined;
}
