/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * REGION entity: ACIS modeler data carried as opaque text lines
 */

import { FormatVersion, type DxfDefaults } from '@dxfio/data';
import { ScalarList } from '@dxfio/lists';
import { fieldsFor } from '../builder.js';
import { defineSchema } from '../define.js';
import type { EntitySchema } from '../types.js';
import { createEntityRecord, entityCommonSection, extendedDataSection, type DxfEntityRecord } from './common.js';

export interface RegionRecord extends DxfEntityRecord {
  /** 39 */
  thickness: number;
  /** 70: modeler format version, currently 1 */
  modelerFormatVersion: number;
  /** 1: proprietary data lines */
  proprietaryData: ScalarList<string>;
  /** 3: continuation lines for data longer than one line */
  additionalProprietaryData: ScalarList<string>;
}

const f = fieldsFor<RegionRecord>();

export function createRegionSchema(defaults: DxfDefaults): EntitySchema<RegionRecord> {
  return defineSchema<RegionRecord>({
    typeName: 'REGION',
    sections: [
      entityCommonSection(defaults),
      {
        marker: 'AcDbModelerGeometry',
        fields: [
          f.double(39, f.prop('thickness'), { omitIf: 0 }),
          f.int(70, f.prop('modelerFormatVersion'), { minVersion: FormatVersion.R13 }),
          f.stringList(1, f.prop('proprietaryData')),
          f.stringList(3, f.prop('additionalProprietaryData')),
        ],
      },
      extendedDataSection<RegionRecord>(),
    ],
    create: () => ({
      ...createEntityRecord(defaults),
      thickness: 0,
      modelerFormatVersion: defaults.modelerFormatVersion,
      proprietaryData: new ScalarList<string>(),
      additionalProprietaryData: new ScalarList<string>(),
    }),
  });
}
