/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * DICTIONARY object: one named entry pointing at another object
 */

import { FormatVersion, createRecordHeader, type DxfRecord } from '@dxfio/data';
import { fieldsFor } from '../builder.js';
import { defineSchema } from '../define.js';
import type { EntitySchema } from '../types.js';

export interface DictionaryRecord extends DxfRecord {
  /** 3: entry name, required */
  entryName: string;
  /** 350: handle of the entry object */
  entryObjectHandle: string;
  /** 280: 1 when the dictionary is hard owner of its entries */
  hardOwnerFlag: number;
  /** 281: duplicate record cloning flag */
  cloningFlag: number;
}

const f = fieldsFor<DictionaryRecord>();

export function createDictionarySchema(): EntitySchema<DictionaryRecord> {
  return defineSchema<DictionaryRecord>({
    typeName: 'DICTIONARY',
    minVersion: FormatVersion.R13,
    sections: [
      {
        marker: 'AcDbDictionary',
        fields: [
          f.int(280, f.prop('hardOwnerFlag'), { minVersion: FormatVersion.AC2000, omitIf: 0 }),
          f.int(281, f.prop('cloningFlag'), { minVersion: FormatVersion.AC2000, omitIf: 0 }),
          f.string(3, f.prop('entryName'), { required: true }),
          f.string(350, f.prop('entryObjectHandle')),
        ],
      },
    ],
    create: () => ({
      ...createRecordHeader(),
      entryName: '',
      entryObjectHandle: '',
      hardOwnerFlag: 0,
      cloningFlag: 0,
    }),
  });
}
