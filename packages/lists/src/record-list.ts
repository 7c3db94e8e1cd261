/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { DxfRecord } from '@dxfio/data';
import { Chain } from './chain.js';

/**
 * All records of one kind, in the order they were decoded
 * (e.g. every DICTIONARY object of a drawing).
 */
export class RecordList<R extends DxfRecord> extends Chain<R> {
  /** Find a record by handle */
  findByHandle(idCode: number): R | undefined {
    for (const record of this) {
      if (record.idCode === idCode) return record;
    }
    return undefined;
  }

  toJSON(): R[] {
    return this.toArray();
  }
}
