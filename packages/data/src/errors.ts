/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Error types for DXF tag-stream decoding and encoding.
 *
 * Fatal conditions are thrown; recoverable ones are reported as
 * diagnostics (see diagnostics.ts).
 */

export type DxfErrorKind =
  | 'StreamError'
  | 'MalformedTag'
  | 'TypeMismatch'
  | 'UnexpectedEndOfStream'
  | 'MissingRequiredField'
  | 'InvariantViolation';

/** Where in the input an error was detected */
export interface DxfErrorLocation {
  /** Source identifier (file name or '<memory>') */
  source?: string;
  /** 1-based line number */
  line?: number;
  /** Group code of the offending tag */
  groupCode?: number;
}

export class DxfError extends Error {
  readonly source?: string;
  readonly line?: number;
  readonly groupCode?: number;

  constructor(
    public readonly kind: DxfErrorKind,
    message: string,
    location: DxfErrorLocation = {},
  ) {
    super(message);
    this.name = 'DxfError';
    this.source = location.source;
    this.line = location.line;
    this.groupCode = location.groupCode;
  }
}

/** Errors that abort decoding of the current record */
export class DxfDecodeError extends DxfError {
  constructor(kind: DxfErrorKind, message: string, location?: DxfErrorLocation) {
    super(kind, message, location);
    this.name = 'DxfDecodeError';
  }
}

/** I/O failure while reading the underlying stream */
export class StreamError extends DxfDecodeError {
  constructor(
    message: string,
    location: DxfErrorLocation,
    public readonly ioError?: unknown,
  ) {
    super('StreamError', message, location);
    this.name = 'StreamError';
  }
}

/** Group-code line is not an integer, or the value line is missing */
export class MalformedTagError extends DxfDecodeError {
  constructor(message: string, location: DxfErrorLocation) {
    super('MalformedTag', message, location);
    this.name = 'MalformedTagError';
  }
}

/** Value line cannot be parsed as the group code's scalar class */
export class TypeMismatchError extends DxfDecodeError {
  constructor(
    message: string,
    location: DxfErrorLocation,
    public readonly rawValue: string,
  ) {
    super('TypeMismatch', message, location);
    this.name = 'TypeMismatchError';
  }
}

/** Stream ended before the record's terminating 0 tag */
export class UnexpectedEndOfStreamError extends DxfDecodeError {
  constructor(message: string, location: DxfErrorLocation) {
    super('UnexpectedEndOfStream', message, location);
    this.name = 'UnexpectedEndOfStreamError';
  }
}

/**
 * A field declared required is empty. Thrown by decode (record discarded)
 * and by encode (record skipped, nothing written).
 */
export class MissingRequiredFieldError extends DxfError {
  constructor(
    public readonly entityType: string,
    public readonly field: string,
    groupCode: number,
    location: Omit<DxfErrorLocation, 'groupCode'> = {},
  ) {
    super(
      'MissingRequiredField',
      `${entityType} record has an empty required field '${field}' (group code ${groupCode})`,
      { ...location, groupCode },
    );
    this.name = 'MissingRequiredFieldError';
  }
}

/** API misuse: freeing a chained node, negative handles, unwritable values */
export class InvariantViolationError extends DxfError {
  constructor(message: string, location?: DxfErrorLocation) {
    super('InvariantViolation', message, location);
    this.name = 'InvariantViolationError';
  }
}
