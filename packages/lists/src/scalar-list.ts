/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { Chain } from './chain.js';

/** Values a repeatable group code can carry */
export type Scalar = string | number | boolean;

/**
 * Append-ordered list of one scalar type, one node per repeated tag.
 * Position is meaningful: the i-th value of one list pairs with the i-th
 * value of its sibling lists.
 */
export class ScalarList<T extends Scalar> extends Chain<T> {
  toJSON(): T[] {
    return this.toArray();
  }
}
