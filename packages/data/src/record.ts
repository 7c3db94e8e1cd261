/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { InvariantViolationError } from './errors.js';

/**
 * Members shared by every DXF object and entity record
 */
export interface DxfRecord {
  /** Handle (group code 5). 0 means unassigned. Never negative. */
  idCode: number;
  /** Soft-pointer handle to the owner dictionary (330), '' when absent */
  ownerSoft: string;
  /** Hard-owner handle to the extension dictionary (360), '' when absent */
  ownerHard: string;
}

/** The null handle: an owner pointer that points nowhere */
export const NULL_HANDLE = '0';

export function createRecordHeader(): DxfRecord {
  return { idCode: 0, ownerSoft: '', ownerHard: '' };
}

/**
 * Assign a handle, rejecting values that cannot be a DXF handle
 */
export function setIdCode<R extends DxfRecord>(record: R, idCode: number): R {
  if (!Number.isSafeInteger(idCode) || idCode < 0) {
    throw new InvariantViolationError(`Handle must be a non-negative integer, got ${idCode}`);
  }
  record.idCode = idCode;
  return record;
}
