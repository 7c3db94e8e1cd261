/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @dxfio/parser - DXF tag reading and record decoding
 */

export { StringLineSource, FileLineSource } from './line-source.js';
export type { LineSource } from './line-source.js';
export { DxfTagReader } from './tag-reader.js';
export type { DxfTag } from './tag-reader.js';
export {
  RecordDecoder,
  decodeRecord,
  readRecords,
  ACAD_REACTORS,
  ACAD_XDICTIONARY,
} from './record-decoder.js';
export type { DecodeOptions } from './record-decoder.js';

// Group-code classification lives with the scalar codecs
export { classify, GroupCodeClass } from '@dxfio/encoding';
