/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * DXF tag reader - pulls (group code, value) line pairs from a line source
 */

import { InvariantViolationError, MalformedTagError } from '@dxfio/data';
import type { LineSource } from './line-source.js';

export interface DxfTag {
  groupCode: number;
  /** Value line, verbatim apart from the line terminator */
  value: string;
  /** 1-based line number of the group-code line */
  line: number;
}

const GROUP_CODE_PATTERN = /^[+-]?\d+$/;

export class DxfTagReader {
  private lineNumber = 0;
  private pushedBack: DxfTag | null = null;

  constructor(private readonly source: LineSource) {}

  /** Number of lines consumed so far */
  get line(): number {
    return this.lineNumber;
  }

  get sourceName(): string {
    return this.source.name;
  }

  /**
   * Read the next tag.
   * @returns null at end of stream
   * @throws MalformedTagError when the group code is not an integer or the
   *         value line is missing
   * @throws StreamError when the underlying source fails
   */
  nextTag(): DxfTag | null {
    if (this.pushedBack) {
      const tag = this.pushedBack;
      this.pushedBack = null;
      return tag;
    }

    const codeLine = this.source.readLine();
    if (codeLine === null) return null;
    this.lineNumber++;
    const line = this.lineNumber;

    // Group codes are matched numerically; padding like "  5" is irrelevant
    const codeText = codeLine.trim();
    if (!GROUP_CODE_PATTERN.test(codeText)) {
      throw new MalformedTagError(`Group code line '${codeLine}' is not an integer`, {
        source: this.source.name,
        line,
      });
    }
    const groupCode = parseInt(codeText, 10);

    const value = this.source.readLine();
    if (value === null) {
      throw new MalformedTagError(`Missing value line for group code ${groupCode}`, {
        source: this.source.name,
        line,
        groupCode,
      });
    }
    this.lineNumber++;

    return { groupCode, value, line };
  }

  /**
   * Return a tag to the stream; the next nextTag() call yields it again.
   * Only one tag of lookahead is supported.
   */
  pushBack(tag: DxfTag): void {
    if (this.pushedBack) {
      throw new InvariantViolationError('Only one tag can be pushed back');
    }
    this.pushedBack = tag;
  }

  /** Look at the next tag without consuming it */
  peekTag(): DxfTag | null {
    const tag = this.nextTag();
    if (tag) {
      this.pushBack(tag);
    }
    return tag;
  }

  /**
   * Iterate the remaining tags
   */
  *tags(): Generator<DxfTag> {
    for (let tag = this.nextTag(); tag !== null; tag = this.nextTag()) {
      yield tag;
    }
  }
}
