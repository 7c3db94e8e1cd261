/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * TEXT entity: a single line of text
 */

import type { DxfDefaults } from '@dxfio/data';
import { fieldsFor } from '../builder.js';
import { defineSchema } from '../define.js';
import type { EntitySchema } from '../types.js';
import {
  createEntityRecord,
  entityCommonSection,
  extendedDataSection,
  hasDefaultExtrusion,
  type DxfEntityRecord,
  type Extrusion,
} from './common.js';

export interface TextRecord extends DxfEntityRecord, Extrusion {
  /** 1: the text itself, required */
  textValue: string;
  /** 7 */
  textStyle: string;
  /** 10/20/30: first alignment point (insertion point) */
  x0: number;
  y0: number;
  z0: number;
  /** 11/21/31: second alignment point, used when justified */
  x1: number;
  y1: number;
  z1: number;
  /** 39 */
  thickness: number;
  /** 40 */
  height: number;
  /** 41 */
  relativeXScale: number;
  /** 50: degrees */
  rotationAngle: number;
  /** 51: degrees */
  obliqueAngle: number;
  /** 71: 2 = mirrored in X, 4 = mirrored in Y */
  generationFlags: number;
  /** 72: 0 left, 1 center, 2 right, 3 aligned, 4 middle, 5 fit */
  horizontalJustification: number;
  /** 73: 0 baseline, 1 bottom, 2 middle, 3 top */
  verticalJustification: number;
}

const f = fieldsFor<TextRecord>();

const isJustified = (record: TextRecord): boolean =>
  record.horizontalJustification !== 0 || record.verticalJustification !== 0;

const hasExtrusion = (record: TextRecord): boolean => !hasDefaultExtrusion(record);

export function createTextSchema(defaults: DxfDefaults): EntitySchema<TextRecord> {
  return defineSchema<TextRecord>({
    typeName: 'TEXT',
    sections: [
      entityCommonSection(defaults),
      {
        marker: 'AcDbText',
        fields: [
          f.double(39, f.prop('thickness'), { omitIf: 0 }),
          f.double(10, f.prop('x0')),
          f.double(20, f.prop('y0')),
          f.double(30, f.prop('z0')),
          f.double(40, f.prop('height')),
          f.string(1, f.prop('textValue'), { required: true }),
          f.double(50, f.prop('rotationAngle'), { omitIf: 0 }),
          f.double(41, f.prop('relativeXScale'), { omitIf: defaults.relativeXScale }),
          f.double(51, f.prop('obliqueAngle'), { omitIf: 0 }),
          f.string(7, f.prop('textStyle'), { fallback: defaults.textStyle, omitIf: defaults.textStyle }),
          f.int(71, f.prop('generationFlags'), { omitIf: 0 }),
          f.int(72, f.prop('horizontalJustification'), { omitIf: 0 }),
          f.double(11, f.prop('x1'), { emitWhen: isJustified }),
          f.double(21, f.prop('y1'), { emitWhen: isJustified }),
          f.double(31, f.prop('z1'), { emitWhen: isJustified }),
          f.double(210, f.prop('extrusionX'), { emitWhen: hasExtrusion }),
          f.double(220, f.prop('extrusionY'), { emitWhen: hasExtrusion }),
          f.double(230, f.prop('extrusionZ'), { emitWhen: hasExtrusion }),
        ],
      },
      {
        // The format repeats the marker before the vertical justification
        marker: 'AcDbText',
        fields: [f.int(73, f.prop('verticalJustification'), { omitIf: 0 })],
      },
      extendedDataSection<TextRecord>(),
    ],
    create: () => ({
      ...createEntityRecord(defaults),
      textValue: '',
      textStyle: defaults.textStyle,
      x0: 0,
      y0: 0,
      z0: 0,
      x1: 0,
      y1: 0,
      z1: 0,
      thickness: 0,
      height: 0,
      relativeXScale: defaults.relativeXScale,
      rotationAngle: 0,
      obliqueAngle: 0,
      generationFlags: 0,
      horizontalJustification: 0,
      verticalJustification: 0,
      extrusionX: 0,
      extrusionY: 0,
      extrusionZ: 1,
    }),
  });
}
