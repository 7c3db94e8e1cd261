/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Field rule builders.
 *
 * Usage:
 *   const f = fieldsFor<TextRecord>();
 *   f.string(1, f.prop('textValue'), { required: true })
 *   f.double(41, f.prop('relativeXScale'), { omitIf: 1.0 })
 */

import { InvariantViolationError, type FormatVersion } from '@dxfio/data';
import {
  GroupCodeClass,
  classify,
  parseBool,
  parseDouble,
  parseInteger,
  formatBool,
  formatDouble,
  formatInteger,
} from '@dxfio/encoding';
import type { Scalar, ScalarList } from '@dxfio/lists';
import type { Accessor, FieldRule } from './types.js';

type IntegerClass = GroupCodeClass.Int16 | GroupCodeClass.Int32 | GroupCodeClass.Int64;

interface VersionWindow {
  minVersion?: FormatVersion;
  maxVersion?: FormatVersion;
}

export interface ScalarFieldOptions<R, V extends Scalar> extends VersionWindow {
  required?: boolean;
  /** Substituted for an empty string, on decode and on encode */
  fallback?: V;
  /** Omit the tag when the value equals this */
  omitIf?: V;
  /** Emit only when this returns true */
  emitWhen?: (record: R) => boolean;
}

export type ListFieldOptions = VersionWindow;

interface ValueCodec<V extends Scalar> {
  valueClass: GroupCodeClass;
  parse(raw: string): V | null;
  format(value: V): string;
}

function isEmptyValue(value: Scalar): boolean {
  return typeof value === 'string' && value.length === 0;
}

function requireClass(groupCode: number, accepted: readonly GroupCodeClass[]): GroupCodeClass {
  const valueClass = classify(groupCode);
  if (valueClass === undefined || !accepted.includes(valueClass)) {
    throw new InvariantViolationError(
      `Group code ${groupCode} is ${valueClass ?? 'unclassified'}, expected ${accepted.join(' or ')}`,
    );
  }
  return valueClass;
}

function stringCodec(groupCode: number): ValueCodec<string> {
  return {
    valueClass: requireClass(groupCode, [GroupCodeClass.String]),
    parse: (raw) => raw,
    format: (value) => value,
  };
}

function doubleCodec(groupCode: number): ValueCodec<number> {
  return {
    valueClass: requireClass(groupCode, [GroupCodeClass.Double]),
    parse: parseDouble,
    format: formatDouble,
  };
}

function integerCodec(groupCode: number): ValueCodec<number> {
  const valueClass = requireClass(groupCode, [GroupCodeClass.Int16, GroupCodeClass.Int32, GroupCodeClass.Int64]);
  const integerClass: IntegerClass =
    valueClass === GroupCodeClass.Int16
      ? GroupCodeClass.Int16
      : valueClass === GroupCodeClass.Int32
        ? GroupCodeClass.Int32
        : GroupCodeClass.Int64;
  return {
    valueClass,
    parse: (raw) => parseInteger(raw, integerClass),
    format: formatInteger,
  };
}

function boolCodec(groupCode: number): ValueCodec<boolean> {
  return {
    valueClass: requireClass(groupCode, [GroupCodeClass.Bool]),
    parse: parseBool,
    format: formatBool,
  };
}

function scalarRule<R, V extends Scalar>(
  groupCode: number,
  codec: ValueCodec<V>,
  access: Accessor<R, V>,
  options: ScalarFieldOptions<R, V>,
): FieldRule<R> {
  const { fallback, omitIf, emitWhen } = options;

  const effective = (record: R): V => {
    const value = access.get(record);
    return fallback !== undefined && isEmptyValue(value) ? fallback : value;
  };

  return {
    name: access.name,
    groupCode,
    valueClass: codec.valueClass,
    repeatable: false,
    required: options.required ?? false,
    minVersion: options.minVersion,
    maxVersion: options.maxVersion,

    read(record, raw) {
      const value = codec.parse(raw);
      if (value === null) return false;
      access.set(record, value);
      return true;
    },

    write(record) {
      if (emitWhen && !emitWhen(record)) return [];
      const value = effective(record);
      if (omitIf !== undefined && value === omitIf) return [];
      return [codec.format(value)];
    },

    isEmpty(record) {
      return isEmptyValue(access.get(record));
    },

    applyFallback(record) {
      if (fallback === undefined || !isEmptyValue(access.get(record))) return false;
      access.set(record, fallback);
      return true;
    },
  };
}

function listRule<R, V extends Scalar>(
  groupCode: number,
  codec: ValueCodec<V>,
  access: Accessor<R, ScalarList<V>>,
  options: ListFieldOptions,
): FieldRule<R> {
  return {
    name: access.name,
    groupCode,
    valueClass: codec.valueClass,
    repeatable: true,
    required: false,
    minVersion: options.minVersion,
    maxVersion: options.maxVersion,

    read(record, raw) {
      const value = codec.parse(raw);
      if (value === null) return false;
      access.get(record).append(value);
      return true;
    },

    write(record) {
      return access.get(record).toArray().map((value) => codec.format(value));
    },

    isEmpty(record) {
      return access.get(record).isEmpty;
    },

    applyFallback() {
      return false;
    },
  };
}

/**
 * Rule builders bound to one record type
 */
export function fieldsFor<R>() {
  return {
    /** Accessor for a record property */
    prop<K extends keyof R & string>(key: K): Accessor<R, R[K]> {
      return {
        name: key,
        get: (record) => record[key],
        set: (record, value) => {
          record[key] = value;
        },
      };
    },

    string(groupCode: number, access: Accessor<R, string>, options: ScalarFieldOptions<R, string> = {}): FieldRule<R> {
      return scalarRule(groupCode, stringCodec(groupCode), access, options);
    },

    double(groupCode: number, access: Accessor<R, number>, options: ScalarFieldOptions<R, number> = {}): FieldRule<R> {
      return scalarRule(groupCode, doubleCodec(groupCode), access, options);
    },

    int(groupCode: number, access: Accessor<R, number>, options: ScalarFieldOptions<R, number> = {}): FieldRule<R> {
      return scalarRule(groupCode, integerCodec(groupCode), access, options);
    },

    bool(groupCode: number, access: Accessor<R, boolean>, options: ScalarFieldOptions<R, boolean> = {}): FieldRule<R> {
      return scalarRule(groupCode, boolCodec(groupCode), access, options);
    },

    stringList(groupCode: number, access: Accessor<R, ScalarList<string>>, options: ListFieldOptions = {}): FieldRule<R> {
      return listRule(groupCode, stringCodec(groupCode), access, options);
    },

    doubleList(groupCode: number, access: Accessor<R, ScalarList<number>>, options: ListFieldOptions = {}): FieldRule<R> {
      return listRule(groupCode, doubleCodec(groupCode), access, options);
    },

    intList(groupCode: number, access: Accessor<R, ScalarList<number>>, options: ListFieldOptions = {}): FieldRule<R> {
      return listRule(groupCode, integerCodec(groupCode), access, options);
    },
  };
}
