/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @dxfio/export - DXF record encoding
 */

export { StringTagSink, ArrayTagSink, type TagSink, type EncodedTag } from './tag-sink.js';
export {
  RecordEncoder,
  encodeRecord,
  type EncoderOptions,
  type EncodeOptions,
} from './record-encoder.js';
