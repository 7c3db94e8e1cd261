/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { FormatVersion, resolveDefaults } from '@dxfio/data';
import { classify } from '@dxfio/encoding';
import { createSchemaRegistry } from './registry.js';
import { createTextSchema } from './entities/text.js';
import { ComplexElementType, createLinetypeSchema, isComplexElement, isTextElement } from './entities/ltype.js';

describe('createSchemaRegistry', () => {
  const registry = createSchemaRegistry();

  it('holds every record kind by type name', () => {
    expect([...registry.keys()].sort()).toEqual([
      'APPID',
      'DICTIONARY',
      'LTYPE',
      'OBJECT_PTR',
      'POINT',
      'REGION',
      'TEXT',
    ]);
  });

  it('declares every rule with the class of its group code', () => {
    for (const schema of registry.values()) {
      for (const rule of schema.rules) {
        expect(classify(rule.groupCode), `${schema.typeName} ${rule.name}`).toBe(rule.valueClass);
      }
    }
  });

  it('gates subclass markers at R13', () => {
    expect(registry.get('TEXT')?.markers).toEqual(
      new Map([
        ['AcDbEntity', FormatVersion.R13],
        ['AcDbText', FormatVersion.R13],
      ]),
    );
    expect(registry.get('OBJECT_PTR')?.markers.size).toBe(0);
  });

  it('marks the required fields', () => {
    const required = [...registry.values()].flatMap((schema) =>
      schema.rules.filter((rule) => rule.required).map((rule) => `${schema.typeName}.${rule.groupCode}`),
    );
    expect(required.sort()).toEqual(['APPID.2', 'DICTIONARY.3', 'LTYPE.2', 'TEXT.1']);
  });
});

describe('entity schemas', () => {
  it('create records from the configured defaults', () => {
    const defaults = resolveDefaults({ layer: 'NOTES', textStyle: 'ROMANS' });
    const record = createTextSchema(defaults).create();
    expect(record.layer).toBe('NOTES');
    expect(record.textStyle).toBe('ROMANS');
    expect(record.color).toBe(256);
    expect(record.extrusionZ).toBe(1);
  });

  it('give every record its own lists', () => {
    const schema = createLinetypeSchema(resolveDefaults());
    const a = schema.create();
    const b = schema.create();
    a.dashLengths.append(1);
    expect(b.dashLengths.isEmpty).toBe(true);
    expect(a.alignment).toBe(65);
  });

  it('classify LTYPE complex element types', () => {
    expect(isComplexElement(ComplexElementType.None)).toBe(false);
    expect(isComplexElement(ComplexElementType.AbsoluteRotation)).toBe(false);
    expect(isComplexElement(ComplexElementType.Text)).toBe(true);
    expect(isComplexElement(ComplexElementType.ShapeAbsoluteRotation)).toBe(true);
    expect(isTextElement(ComplexElementType.TextAbsoluteRotation)).toBe(true);
    expect(isTextElement(ComplexElementType.Shape)).toBe(false);
  });

  it('reads 160 into the graphics data size but writes 92', () => {
    const schema = createTextSchema(resolveDefaults());
    const record = schema.create();
    expect(schema.ruleFor(160)?.read(record, '2048')).toBe(true);
    expect(record.graphicsDataSize).toBe(2048);
    expect(schema.ruleFor(160)?.write(record)).toEqual([]);
    expect(schema.ruleFor(92)?.write(record)).toEqual(['2048']);
  });
});
