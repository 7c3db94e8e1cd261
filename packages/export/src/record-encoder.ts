/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Record encoder - writes records as tag streams using a schema's field table
 *
 * A record is validated before any tag is produced; the complete tag list
 * then goes to the sink in one call, so a failed record leaves the sink
 * untouched. The record itself is never modified.
 */

import {
  InvariantViolationError,
  MissingRequiredFieldError,
  NULL_HANDLE,
  REACTORS_VERSION,
  SUBCLASS_MARKER_VERSION,
  createLogger,
  loggingDiagnosticHandler,
  type DiagnosticHandler,
  type FormatVersion,
  type DxfRecord,
} from '@dxfio/data';
import { formatHandle } from '@dxfio/encoding';
import type { RecordList } from '@dxfio/lists';
import type { ElementGroup, EntitySchema, FieldRule } from '@dxfio/schema';
import type { EncodedTag, TagSink } from './tag-sink.js';

const log = createLogger('RecordEncoder');

export interface EncoderOptions {
  /** Receives DefaultApplied and SkippedRecord diagnostics; defaults to the logger */
  onDiagnostic?: DiagnosticHandler;
}

export interface EncodeOptions {
  /** Write the handle (group code 5); 'omit' for handle-less output. Default 'emit' */
  handles?: 'emit' | 'omit';
}

function inWindow<R>(rule: FieldRule<R>, version: FormatVersion): boolean {
  return (
    (rule.minVersion === undefined || version >= rule.minVersion) &&
    (rule.maxVersion === undefined || version <= rule.maxVersion)
  );
}

const LINE_BREAK = /[\r\n]/;

/** Empty even after its fallback is substituted */
function isMissing<R>(rule: FieldRule<R>, record: R): boolean {
  return rule.isEmpty(record) && rule.write(record).every((value) => value.length === 0);
}

export class RecordEncoder {
  private readonly report: DiagnosticHandler;

  constructor(options: EncoderOptions = {}) {
    this.report = options.onDiagnostic ?? loggingDiagnosticHandler(log);
  }

  /**
   * Encode one record into the sink.
   * @throws MissingRequiredFieldError when a required field is empty
   * @throws InvariantViolationError when a value contains a line break
   * The sink receives nothing when either is thrown.
   */
  encode<R extends DxfRecord>(
    schema: EntitySchema<R>,
    record: R,
    version: FormatVersion,
    sink: TagSink,
    options: EncodeOptions = {},
  ): void {
    this.validate(schema, record);
    this.checkOwners(schema, record);

    const tags: EncodedTag[] = [{ groupCode: 0, value: schema.typeName }];
    if (options.handles !== 'omit') {
      tags.push({ groupCode: 5, value: formatHandle(record.idCode) });
    }
    this.writeOwners(record, version, tags);

    for (const section of schema.sections) {
      if (section.marker !== undefined && version >= (section.markerMinVersion ?? SUBCLASS_MARKER_VERSION)) {
        tags.push({ groupCode: 100, value: section.marker });
      }
      for (const rule of section.fields) {
        if (!inWindow(rule, version)) continue;
        for (const value of rule.write(record)) {
          tags.push({ groupCode: rule.groupCode, value });
        }
      }
      for (const group of section.elements ?? []) {
        this.writeElements(schema, group, record, version, tags);
      }
    }

    sink.writeTags(tags);
  }

  /**
   * Encode every record of a list. Records that fail validation are skipped
   * with a SkippedRecord diagnostic.
   * @returns number of records written
   */
  encodeAll<R extends DxfRecord>(
    schema: EntitySchema<R>,
    records: RecordList<R>,
    version: FormatVersion,
    sink: TagSink,
    options: EncodeOptions = {},
  ): number {
    let written = 0;
    for (const record of records) {
      try {
        this.encode(schema, record, version, sink, options);
        written++;
      } catch (error) {
        if (!(error instanceof MissingRequiredFieldError || error instanceof InvariantViolationError)) {
          throw error;
        }
        this.report({
          kind: 'SkippedRecord',
          message: `Skipped ${schema.typeName} record #${formatHandle(record.idCode)}: ${error.message}`,
          entityType: schema.typeName,
          groupCode: error.groupCode,
        });
      }
    }
    return written;
  }

  private validate<R extends DxfRecord>(schema: EntitySchema<R>, record: R): void {
    for (const rule of schema.rules) {
      if (rule.required && isMissing(rule, record)) {
        throw new MissingRequiredFieldError(schema.typeName, rule.name, rule.groupCode);
      }
      if (rule.write(record).some((value) => LINE_BREAK.test(value))) {
        throw new InvariantViolationError(
          `${schema.typeName} field '${rule.name}' (group code ${rule.groupCode}) contains a line break`,
          { groupCode: rule.groupCode },
        );
      }
      if (!rule.repeatable && rule.isEmpty(record) && !isMissing(rule, record)) {
        this.report({
          kind: 'DefaultApplied',
          message: `Empty ${rule.name} written as its default`,
          entityType: schema.typeName,
          groupCode: rule.groupCode,
        });
      }
    }
  }

  private checkOwners<R extends DxfRecord>(schema: EntitySchema<R>, record: R): void {
    for (const [groupCode, handle] of [
      [330, record.ownerSoft],
      [360, record.ownerHard],
    ] as const) {
      if (LINE_BREAK.test(handle)) {
        throw new InvariantViolationError(`${schema.typeName} owner handle (group code ${groupCode}) contains a line break`, {
          groupCode,
        });
      }
    }
  }

  /**
   * Owner handles. From R14 a real soft owner goes in {ACAD_REACTORS and the
   * hard owner in {ACAD_XDICTIONARY; a soft owner equal to the null handle
   * is written bare after both groups. R13 writes a bare 330 only.
   */
  private writeOwners(record: DxfRecord, version: FormatVersion, tags: EncodedTag[]): void {
    const { ownerSoft, ownerHard } = record;
    if (version >= REACTORS_VERSION) {
      if (ownerSoft !== '' && ownerSoft !== NULL_HANDLE) {
        tags.push(
          { groupCode: 102, value: '{ACAD_REACTORS' },
          { groupCode: 330, value: ownerSoft },
          { groupCode: 102, value: '}' },
        );
      }
      if (ownerHard !== '') {
        tags.push(
          { groupCode: 102, value: '{ACAD_XDICTIONARY' },
          { groupCode: 360, value: ownerHard },
          { groupCode: 102, value: '}' },
        );
      }
      if (ownerSoft === NULL_HANDLE) {
        tags.push({ groupCode: 330, value: ownerSoft });
      }
    } else if (version >= SUBCLASS_MARKER_VERSION && ownerSoft !== '') {
      tags.push({ groupCode: 330, value: ownerSoft });
    }
  }

  /**
   * Interleave an element group: each lead value is followed by the next
   * unwritten value of every member that includes that element.
   */
  private writeElements<R extends DxfRecord>(
    schema: EntitySchema<R>,
    group: ElementGroup<R>,
    record: R,
    version: FormatVersion,
    tags: EncodedTag[],
  ): void {
    if (!inWindow(group.lead, version)) return;

    const members = group.members
      .filter((member) => inWindow(member.rule, version))
      .map((member) => ({ member, values: member.rule.write(record), cursor: 0 }));

    group.lead.write(record).forEach((leadValue, index) => {
      tags.push({ groupCode: group.lead.groupCode, value: leadValue });
      for (const entry of members) {
        const { member, values } = entry;
        if (member.includes && !member.includes(record, index)) continue;
        if (entry.cursor < values.length) {
          tags.push({ groupCode: member.rule.groupCode, value: values[entry.cursor++] });
        }
      }
    });

    for (const { member, values, cursor } of members) {
      if (cursor < values.length) {
        log.warn(`${values.length - cursor} ${member.rule.name} value(s) match no element of ${group.name}`, {
          entityType: schema.typeName,
          handle: record.idCode,
        });
      }
    }
  }
}

/**
 * Encode one record with a default encoder
 */
export function encodeRecord<R extends DxfRecord>(
  schema: EntitySchema<R>,
  record: R,
  version: FormatVersion,
  sink: TagSink,
  options?: EncodeOptions,
): void {
  new RecordEncoder().encode(schema, record, version, sink, options);
}
