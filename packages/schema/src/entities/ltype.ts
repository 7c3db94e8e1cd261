/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * LTYPE symbol table entry.
 *
 * Each pattern element is a dash length (49) followed by its complex type
 * (74). Text and shape elements (types 2-5) add shape number, style
 * pointer, scale, rotation and offsets; text elements (2-3) add the text
 * string. Those codes are stored in their own lists and only hold entries
 * for complex elements, so the k-th shape entry belongs to the k-th
 * element whose type is 2-5, not to the k-th dash.
 */

import { FormatVersion, createRecordHeader, type DxfDefaults, type DxfRecord } from '@dxfio/data';
import { ScalarList } from '@dxfio/lists';
import { fieldsFor } from '../builder.js';
import { defineSchema } from '../define.js';
import type { ElementMember, EntitySchema } from '../types.js';

export enum ComplexElementType {
  None = 0,
  AbsoluteRotation = 1,
  Text = 2,
  TextAbsoluteRotation = 3,
  Shape = 4,
  ShapeAbsoluteRotation = 5,
}

export interface LinetypeRecord extends DxfRecord {
  /** 2: linetype name, required */
  linetypeName: string;
  /** 70: standard flags */
  flags: number;
  /** 3: descriptive text */
  description: string;
  /** 72: always 65 ('A') */
  alignment: number;
  /** 73: number of elements; written as the length of dashLengths */
  elementCount: number;
  /** 40 */
  totalPatternLength: number;
  /** 49: one per element */
  dashLengths: ScalarList<number>;
  /** 74: one per element */
  complexTypes: ScalarList<number>;
  /** 75: one per complex element; 0 for text */
  shapeNumbers: ScalarList<number>;
  /** 340: STYLE handle, one per complex element */
  stylePointers: ScalarList<string>;
  /** 46 */
  scales: ScalarList<number>;
  /** 50 */
  rotations: ScalarList<number>;
  /** 44 */
  xOffsets: ScalarList<number>;
  /** 45 */
  yOffsets: ScalarList<number>;
  /** 9: one per text element */
  textStrings: ScalarList<string>;
}

export function isComplexElement(type: number): boolean {
  return type >= ComplexElementType.Text && type <= ComplexElementType.ShapeAbsoluteRotation;
}

export function isTextElement(type: number): boolean {
  return type === ComplexElementType.Text || type === ComplexElementType.TextAbsoluteRotation;
}

const f = fieldsFor<LinetypeRecord>();

/** Complex linetypes (group codes 74 and up, plus 9) start with R13 */
const COMPLEX = { minVersion: FormatVersion.R13 };

const complexOnly = (record: LinetypeRecord, index: number): boolean =>
  isComplexElement(record.complexTypes.at(index) ?? ComplexElementType.None);

function complexMember(rule: ElementMember<LinetypeRecord>['rule']): ElementMember<LinetypeRecord> {
  return { rule, includes: complexOnly };
}

export function createLinetypeSchema(defaults: DxfDefaults): EntitySchema<LinetypeRecord> {
  return defineSchema<LinetypeRecord>({
    typeName: 'LTYPE',
    sections: [
      { marker: 'AcDbSymbolTableRecord', fields: [] },
      {
        marker: 'AcDbLinetypeTableRecord',
        fields: [
          f.string(2, f.prop('linetypeName'), { required: true }),
          f.int(70, f.prop('flags')),
          f.string(3, f.prop('description')),
          f.int(72, f.prop('alignment')),
          f.int(73, {
            name: 'elementCount',
            get: (record) => record.dashLengths.length,
            set: (record, value) => {
              record.elementCount = value;
            },
          }),
          f.double(40, f.prop('totalPatternLength')),
        ],
        elements: [
          {
            name: 'patternElements',
            lead: f.doubleList(49, f.prop('dashLengths')),
            members: [
              { rule: f.intList(74, f.prop('complexTypes'), COMPLEX) },
              complexMember(f.intList(75, f.prop('shapeNumbers'), COMPLEX)),
              complexMember(f.stringList(340, f.prop('stylePointers'), COMPLEX)),
              complexMember(f.doubleList(46, f.prop('scales'), COMPLEX)),
              complexMember(f.doubleList(50, f.prop('rotations'), COMPLEX)),
              complexMember(f.doubleList(44, f.prop('xOffsets'), COMPLEX)),
              complexMember(f.doubleList(45, f.prop('yOffsets'), COMPLEX)),
              {
                rule: f.stringList(9, f.prop('textStrings'), COMPLEX),
                includes: (record, index) => isTextElement(record.complexTypes.at(index) ?? ComplexElementType.None),
              },
            ],
          },
        ],
      },
    ],
    create: () => ({
      ...createRecordHeader(),
      linetypeName: '',
      flags: 0,
      description: '',
      alignment: defaults.linetypeAlignment,
      elementCount: 0,
      totalPatternLength: 0,
      dashLengths: new ScalarList<number>(),
      complexTypes: new ScalarList<number>(),
      shapeNumbers: new ScalarList<number>(),
      stylePointers: new ScalarList<string>(),
      scales: new ScalarList<number>(),
      rotations: new ScalarList<number>(),
      xOffsets: new ScalarList<number>(),
      yOffsets: new ScalarList<number>(),
      textStrings: new ScalarList<string>(),
    }),
  });
}
