/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

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

export interface PointRecord extends DxfEntityRecord, Extrusion {
  /** 10/20/30 */
  x0: number;
  y0: number;
  z0: number;
  /** 39 */
  thickness: number;
  /** 50: angle of the X axis of the UCS in effect when the point was drawn */
  xAxisAngle: number;
}

const f = fieldsFor<PointRecord>();

const hasExtrusion = (record: PointRecord): boolean => !hasDefaultExtrusion(record);

export function createPointSchema(defaults: DxfDefaults): EntitySchema<PointRecord> {
  return defineSchema<PointRecord>({
    typeName: 'POINT',
    sections: [
      entityCommonSection(defaults),
      {
        marker: 'AcDbPoint',
        fields: [
          f.double(10, f.prop('x0')),
          f.double(20, f.prop('y0')),
          f.double(30, f.prop('z0')),
          f.double(39, f.prop('thickness'), { omitIf: 0 }),
          f.double(210, f.prop('extrusionX'), { emitWhen: hasExtrusion }),
          f.double(220, f.prop('extrusionY'), { emitWhen: hasExtrusion }),
          f.double(230, f.prop('extrusionZ'), { emitWhen: hasExtrusion }),
          f.double(50, f.prop('xAxisAngle'), { omitIf: 0 }),
        ],
      },
      extendedDataSection<PointRecord>(),
    ],
    create: () => ({
      ...createEntityRecord(defaults),
      x0: 0,
      y0: 0,
      z0: 0,
      thickness: 0,
      xAxisAngle: 0,
      extrusionX: 0,
      extrusionY: 0,
      extrusionZ: 1,
    }),
  });
}
