/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Record decoder - turns a tag stream into records using a schema's
 * field table
 *
 * Fatal (record aborted, error thrown): stream failures, malformed tags,
 * values that do not parse as their group code's class, end of stream
 * before the terminating 0 tag, empty required fields.
 * Non-fatal (diagnostic, decoding continues): unknown group codes, tags
 * outside their version window, unexpected subclass markers, comments.
 */

import {
  MissingRequiredFieldError,
  REACTORS_VERSION,
  TypeMismatchError,
  UnexpectedEndOfStreamError,
  createLogger,
  formatVersionName,
  loggingDiagnosticHandler,
  type DiagnosticHandler,
  type FormatVersion,
  type DxfDiagnostic,
  type DxfRecord,
} from '@dxfio/data';
import { parseHandle } from '@dxfio/encoding';
import { RecordList } from '@dxfio/lists';
import type { EntitySchema, FieldRule } from '@dxfio/schema';
import type { DxfTag, DxfTagReader } from './tag-reader.js';

const log = createLogger('RecordDecoder');

export const ACAD_REACTORS = 'ACAD_REACTORS';
export const ACAD_XDICTIONARY = 'ACAD_XDICTIONARY';

export interface DecodeOptions {
  /** Receives non-fatal diagnostics; defaults to the logger */
  onDiagnostic?: DiagnosticHandler;
}

/** Per-record state while tags are dispatched */
interface DecodeState<R extends DxfRecord> {
  schema: EntitySchema<R>;
  record: R;
  version: FormatVersion;
  source: string;
  /** Name of the open 102 {NAME ... 102 } group, if any */
  group: string | null;
}

function isOutsideWindow<R>(rule: FieldRule<R>, version: FormatVersion): boolean {
  return (
    (rule.minVersion !== undefined && version < rule.minVersion) ||
    (rule.maxVersion !== undefined && version > rule.maxVersion)
  );
}

export class RecordDecoder {
  private readonly report: DiagnosticHandler;

  constructor(options: DecodeOptions = {}) {
    this.report = options.onDiagnostic ?? loggingDiagnosticHandler(log);
  }

  /**
   * Decode one record.
   *
   * The reader may be positioned at the record's `0/<TYPE>` tag or just
   * after it. Decoding stops at the next 0 tag, which is left in the stream.
   */
  decode<R extends DxfRecord>(schema: EntitySchema<R>, reader: DxfTagReader, version: FormatVersion): R {
    const state: DecodeState<R> = {
      schema,
      record: schema.create(),
      version,
      source: reader.sourceName,
      group: null,
    };

    if (schema.minVersion !== undefined && version < schema.minVersion) {
      this.diagnose(state, {
        kind: 'VersionMismatch',
        message: `${schema.typeName} is not defined in ${formatVersionName(version)}`,
      });
    }

    let tag = reader.nextTag();
    if (tag && tag.groupCode === 0 && tag.value.trim() === schema.typeName) {
      tag = reader.nextTag();
    }

    for (;;) {
      if (tag === null) {
        throw new UnexpectedEndOfStreamError(
          `Stream ended inside a ${schema.typeName} record`,
          { source: state.source, line: reader.line },
        );
      }
      if (tag.groupCode === 0) {
        reader.pushBack(tag);
        break;
      }
      this.dispatch(state, tag);
      tag = reader.nextTag();
    }

    this.finish(state, reader.line);
    return state.record;
  }

  /**
   * Decode consecutive records of one kind into a list.
   *
   * Stops at the first 0 tag naming another kind (left in the stream) or at
   * end of stream. A record with an empty required field is discarded with
   * a SkippedRecord diagnostic; every other error propagates.
   */
  readRecords<R extends DxfRecord>(
    schema: EntitySchema<R>,
    reader: DxfTagReader,
    version: FormatVersion,
  ): RecordList<R> {
    const records = new RecordList<R>();
    for (
      let next = reader.peekTag();
      next !== null && next.groupCode === 0 && next.value.trim() === schema.typeName;
      next = reader.peekTag()
    ) {
      try {
        records.append(this.decode(schema, reader, version));
      } catch (error) {
        if (!(error instanceof MissingRequiredFieldError)) {
          throw error;
        }
        this.report({
          kind: 'SkippedRecord',
          message: `Discarded ${schema.typeName} record at line ${next.line}: ${error.message}`,
          entityType: schema.typeName,
          groupCode: error.groupCode,
          line: next.line,
        });
      }
    }
    return records;
  }

  private dispatch<R extends DxfRecord>(state: DecodeState<R>, tag: DxfTag): void {
    switch (tag.groupCode) {
      case 5:
      case 105:
        this.readHandle(state, tag);
        return;
      case 102:
        this.readGroupBracket(state, tag);
        return;
      case 330:
        if (state.group === null || state.group === ACAD_REACTORS) {
          state.record.ownerSoft = tag.value.trim();
        } else {
          this.skipGroupData(state, tag);
        }
        return;
      case 360:
        if (state.group === null || state.group === ACAD_XDICTIONARY) {
          state.record.ownerHard = tag.value.trim();
        } else {
          this.skipGroupData(state, tag);
        }
        return;
      case 100:
        this.checkSubclassMarker(state, tag);
        return;
      case 999:
        this.diagnose(state, { kind: 'Comment', message: 'DXF comment', line: tag.line, value: tag.value });
        return;
    }

    if (state.group !== null) {
      this.skipGroupData(state, tag);
      return;
    }

    const rule = state.schema.ruleFor(tag.groupCode);
    if (!rule) {
      this.diagnose(state, {
        kind: 'UnknownGroupCode',
        message: `Unknown group code ${tag.groupCode} in ${state.schema.typeName} record`,
        groupCode: tag.groupCode,
        line: tag.line,
        value: tag.value,
      });
      return;
    }

    if (isOutsideWindow(rule, state.version)) {
      this.diagnose(state, {
        kind: 'VersionMismatch',
        message: `Group code ${tag.groupCode} (${rule.name}) is not expected in ${formatVersionName(state.version)}`,
        groupCode: tag.groupCode,
        line: tag.line,
      });
    }

    if (!rule.read(state.record, tag.value)) {
      throw new TypeMismatchError(
        `Value '${tag.value}' of group code ${tag.groupCode} is not a valid ${rule.valueClass}`,
        { source: state.source, line: tag.line + 1, groupCode: tag.groupCode },
        tag.value,
      );
    }
  }

  /** Data inside another application's group is not ours to interpret */
  private skipGroupData<R extends DxfRecord>(state: DecodeState<R>, tag: DxfTag): void {
    this.diagnose(state, {
      kind: 'ApplicationGroupData',
      message: `Skipped group code ${tag.groupCode} inside {${state.group ?? ''}`,
      groupCode: tag.groupCode,
      line: tag.line,
      value: tag.value,
    });
  }

  private readHandle<R extends DxfRecord>(state: DecodeState<R>, tag: DxfTag): void {
    const handle = parseHandle(tag.value);
    if (handle === null) {
      throw new TypeMismatchError(
        `Handle '${tag.value}' is not hexadecimal`,
        { source: state.source, line: tag.line + 1, groupCode: tag.groupCode },
        tag.value,
      );
    }
    state.record.idCode = handle;
  }

  private readGroupBracket<R extends DxfRecord>(state: DecodeState<R>, tag: DxfTag): void {
    const value = tag.value.trim();
    if (value === '}') {
      state.group = null;
      return;
    }
    if (value.startsWith('{')) {
      state.group = value.slice(1);
      if (state.version < REACTORS_VERSION) {
        this.diagnose(state, {
          kind: 'VersionMismatch',
          message: `Application-defined group {${state.group} is not expected in ${formatVersionName(state.version)}`,
          groupCode: tag.groupCode,
          line: tag.line,
        });
      }
      return;
    }
    this.diagnose(state, {
      kind: 'UnknownGroupCode',
      message: `Group code 102 with '${value}' is neither an opening nor a closing bracket`,
      groupCode: tag.groupCode,
      line: tag.line,
      value: tag.value,
    });
  }

  private checkSubclassMarker<R extends DxfRecord>(state: DecodeState<R>, tag: DxfTag): void {
    const marker = tag.value.trim();
    const since = state.schema.markers.get(marker);
    if (since === undefined) {
      this.diagnose(state, {
        kind: 'SubclassMismatch',
        message: `Unexpected subclass marker '${marker}' in ${state.schema.typeName} record`,
        groupCode: tag.groupCode,
        line: tag.line,
        value: marker,
      });
    } else if (state.version < since) {
      this.diagnose(state, {
        kind: 'VersionMismatch',
        message: `Subclass marker '${marker}' is not expected in ${formatVersionName(state.version)}`,
        groupCode: tag.groupCode,
        line: tag.line,
      });
    }
  }

  /** Fill fallbacks, then reject the record if a required field is empty */
  private finish<R extends DxfRecord>(state: DecodeState<R>, line: number): void {
    const { schema, record } = state;
    if (state.group !== null) {
      this.diagnose(state, {
        kind: 'UnclosedGroup',
        message: `Group {${state.group} was not closed before the end of the ${schema.typeName} record`,
        groupCode: 102,
        line,
      });
    }
    for (const rule of schema.rules) {
      if (rule.applyFallback(record)) {
        this.diagnose(state, {
          kind: 'DefaultApplied',
          message: `Empty ${rule.name} replaced by its default`,
          groupCode: rule.groupCode,
        });
      }
    }
    for (const rule of schema.rules) {
      if (rule.required && rule.isEmpty(record)) {
        throw new MissingRequiredFieldError(schema.typeName, rule.name, rule.groupCode, {
          source: state.source,
          line,
        });
      }
    }
  }

  private diagnose<R extends DxfRecord>(state: DecodeState<R>, diagnostic: Omit<DxfDiagnostic, 'entityType'>): void {
    this.report({ ...diagnostic, entityType: state.schema.typeName });
  }
}

/**
 * Decode one record with a default decoder
 */
export function decodeRecord<R extends DxfRecord>(
  schema: EntitySchema<R>,
  reader: DxfTagReader,
  version: FormatVersion,
  options?: DecodeOptions,
): R {
  return new RecordDecoder(options).decode(schema, reader, version);
}

/**
 * Read consecutive records of one kind with a default decoder
 */
export function readRecords<R extends DxfRecord>(
  schema: EntitySchema<R>,
  reader: DxfTagReader,
  version: FormatVersion,
  options?: DecodeOptions,
): RecordList<R> {
  return new RecordDecoder(options).readRecords(schema, reader, version);
}
