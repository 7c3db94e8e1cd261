/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Non-fatal conditions reported while decoding or encoding records
 */

import { createLogger, type Logger } from './logger.js';

export type DiagnosticKind =
  | 'UnknownGroupCode'
  | 'VersionMismatch'
  | 'SubclassMismatch'
  | 'Comment'
  | 'DefaultApplied'
  | 'SkippedRecord'
  /** A tag inside another application's 102 group, discarded */
  | 'ApplicationGroupData'
  /** A 102 {NAME group still open at the end of the record */
  | 'UnclosedGroup';

export interface DxfDiagnostic {
  kind: DiagnosticKind;
  message: string;
  /** Record type name (e.g., 'TEXT') */
  entityType?: string;
  groupCode?: number;
  /** 1-based line of the group-code line */
  line?: number;
  /** Raw tag value where one was involved (the comment text for 'Comment') */
  value?: string;
}

export type DiagnosticHandler = (diagnostic: DxfDiagnostic) => void;

/**
 * Build a handler that routes diagnostics to a component logger.
 * Comments go to info, applied defaults and application group data to
 * debug, everything else to warn.
 */
export function loggingDiagnosticHandler(log: Logger = createLogger('Diagnostics')): DiagnosticHandler {
  return (diagnostic) => {
    const ctx = { entityType: diagnostic.entityType, line: diagnostic.line };
    switch (diagnostic.kind) {
      case 'Comment':
        log.info(`DXF comment: ${diagnostic.value ?? ''}`, ctx);
        break;
      case 'DefaultApplied':
      case 'ApplicationGroupData':
        log.debug(diagnostic.message, undefined, ctx);
        break;
      default:
        log.warn(diagnostic.message, ctx);
    }
  };
}

/**
 * Handler that keeps diagnostics in memory, for callers that inspect them
 * after the fact.
 */
export function collectDiagnostics(): { handler: DiagnosticHandler; diagnostics: DxfDiagnostic[] } {
  const diagnostics: DxfDiagnostic[] = [];
  return {
    handler: (diagnostic) => {
      diagnostics.push(diagnostic);
    },
    diagnostics,
  };
}
