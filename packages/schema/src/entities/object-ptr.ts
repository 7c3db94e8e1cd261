/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { createRecordHeader, type DxfRecord } from '@dxfio/data';
import { ScalarList } from '@dxfio/lists';
import { defineSchema } from '../define.js';
import type { EntitySchema } from '../types.js';
import { extendedDataSection } from './common.js';

/**
 * OBJECT_PTR object: carrier for ASE extended data (ACADASER13)
 */
export interface ObjectPtrRecord extends DxfRecord {
  /** 1001: extended data application names */
  xdataApplications: ScalarList<string>;
}

export function createObjectPtrSchema(): EntitySchema<ObjectPtrRecord> {
  return defineSchema<ObjectPtrRecord>({
    typeName: 'OBJECT_PTR',
    sections: [extendedDataSection<ObjectPtrRecord>()],
    create: () => ({
      ...createRecordHeader(),
      xdataApplications: new ScalarList<string>(),
    }),
  });
}
