/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

export { GroupCodeClass, GROUP_CODE_RANGES, classify } from './group-codes.js';
export type { GroupCodeRange } from './group-codes.js';
export {
  DOUBLE_PRECISION,
  parseDouble,
  parseInteger,
  parseBool,
  parseHandle,
  formatDouble,
  formatInteger,
  formatBool,
  formatHandle,
  formatGroupCode,
} from './scalar-value.js';
