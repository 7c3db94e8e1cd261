/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @dxfio/data - Shared types, errors, diagnostics and logging
 */

export { createLogger } from './logger.js';
export type { Logger, LogContext, LogLevel } from './logger.js';
export {
  DxfError,
  DxfDecodeError,
  StreamError,
  MalformedTagError,
  TypeMismatchError,
  UnexpectedEndOfStreamError,
  MissingRequiredFieldError,
  InvariantViolationError,
} from './errors.js';
export type { DxfErrorKind, DxfErrorLocation } from './errors.js';
export { loggingDiagnosticHandler, collectDiagnostics } from './diagnostics.js';
export type { DxfDiagnostic, DiagnosticKind, DiagnosticHandler } from './diagnostics.js';
export {
  FormatVersion,
  SUBCLASS_MARKER_VERSION,
  REACTORS_VERSION,
  parseFormatVersion,
  formatVersionName,
} from './versions.js';
export {
  DEFAULT_DXF_DEFAULTS,
  COLOR_BYBLOCK,
  COLOR_BYLAYER,
  MODELSPACE,
  PAPERSPACE,
  resolveDefaults,
} from './defaults.js';
export type { DxfDefaults } from './defaults.js';
export { NULL_HANDLE, createRecordHeader, setIdCode } from './record.js';
export type { DxfRecord } from './record.js';
