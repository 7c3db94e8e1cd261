/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { createRecordHeader, type DxfRecord } from '@dxfio/data';
import { fieldsFor } from '../builder.js';
import { defineSchema } from '../define.js';
import type { EntitySchema } from '../types.js';

/**
 * APPID symbol table entry: a registered application name
 */
export interface AppIdRecord extends DxfRecord {
  /** 2 */
  applicationName: string;
  /** 70 */
  flags: number;
}

const f = fieldsFor<AppIdRecord>();

export function createAppIdSchema(): EntitySchema<AppIdRecord> {
  return defineSchema<AppIdRecord>({
    typeName: 'APPID',
    sections: [
      { marker: 'AcDbSymbolTableRecord', fields: [] },
      {
        marker: 'AcDbRegAppTableRecord',
        fields: [
          f.string(2, f.prop('applicationName'), { required: true }),
          f.int(70, f.prop('flags')),
        ],
      },
    ],
    create: () => ({ ...createRecordHeader(), applicationName: '', flags: 0 }),
  });
}
