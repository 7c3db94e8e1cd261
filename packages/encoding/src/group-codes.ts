/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Group code classification - which scalar type a group code's value has,
 * determined purely by numeric range.
 */

export enum GroupCodeClass {
  String = 'string',
  Double = 'double',
  Bool = 'bool',
  Int16 = 'int16',
  Int32 = 'int32',
  Int64 = 'int64',
}

/** Inclusive [from, to] range of group codes */
export type GroupCodeRange = readonly [from: number, to: number];

/**
 * Range table. Ranges never overlap; group-codes.test.ts checks it.
 */
export const GROUP_CODE_RANGES: ReadonlyMap<GroupCodeClass, readonly GroupCodeRange[]> = new Map<GroupCodeClass, readonly GroupCodeRange[]>([
  [GroupCodeClass.String, [
    [0, 9], [100, 100], [102, 102], [105, 105], [300, 369], [390, 399],
    [410, 419], [430, 439], [470, 481], [999, 1009],
  ]],
  [GroupCodeClass.Double, [[10, 59], [110, 149], [210, 239], [460, 469], [1010, 1059]]],
  [GroupCodeClass.Int16, [[60, 79], [170, 179], [270, 289], [370, 389], [400, 409], [1060, 1070]]],
  [GroupCodeClass.Int32, [[90, 99], [420, 429], [440, 459], [1071, 1071]]],
  [GroupCodeClass.Int64, [[160, 169]]],
  [GroupCodeClass.Bool, [[290, 299]]],
]);

const MAX_GROUP_CODE = 1071;

// Flat lookup built once; index = group code
const CLASS_BY_CODE: ReadonlyArray<GroupCodeClass | undefined> = (() => {
  const table = new Array<GroupCodeClass | undefined>(MAX_GROUP_CODE + 1).fill(undefined);
  for (const [valueClass, ranges] of GROUP_CODE_RANGES) {
    for (const [from, to] of ranges) {
      for (let code = from; code <= to; code++) {
        table[code] = valueClass;
      }
    }
  }
  return table;
})();

/**
 * Scalar class of a group code, or undefined for codes no range covers
 * (their values are carried as raw text).
 */
export function classify(groupCode: number): GroupCodeClass | undefined {
  if (!Number.isInteger(groupCode) || groupCode < 0 || groupCode > MAX_GROUP_CODE) {
    return undefined;
  }
  return CLASS_BY_CODE[groupCode];
}
