/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Destinations for encoded tags
 */

import { formatGroupCode } from '@dxfio/encoding';

export interface EncodedTag {
  groupCode: number;
  /** Wire text of the value line */
  value: string;
}

export interface TagSink {
  /** Receives one complete record; never called with a partial one */
  writeTags(tags: readonly EncodedTag[]): void;
}

/**
 * Accumulates DXF text: a right-aligned group-code line followed by the
 * value line, for every tag.
 */
export class StringTagSink implements TagSink {
  private readonly lines: string[] = [];

  constructor(private readonly lineEnding: '\n' | '\r\n' = '\n') {}

  writeTags(tags: readonly EncodedTag[]): void {
    for (const tag of tags) {
      this.lines.push(formatGroupCode(tag.groupCode), tag.value);
    }
  }

  /** Number of tags written so far */
  get tagCount(): number {
    return this.lines.length / 2;
  }

  toString(): string {
    return this.lines.map((line) => line + this.lineEnding).join('');
  }
}

/**
 * Keeps tags as values
 */
export class ArrayTagSink implements TagSink {
  readonly tags: EncodedTag[] = [];

  writeTags(tags: readonly EncodedTag[]): void {
    this.tags.push(...tags);
  }
}
