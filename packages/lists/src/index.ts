/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

export { Chain } from './chain.js';
export type { ChainNode } from './chain.js';
export { ScalarList } from './scalar-list.js';
export type { Scalar } from './scalar-list.js';
export { RecordList } from './record-list.js';
