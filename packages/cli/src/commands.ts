/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Command implementations behind the dxfio CLI. They take readers and
 * return values; cli.ts owns argument parsing and process I/O.
 */

import {
  DxfError,
  FormatVersion,
  InvariantViolationError,
  createLogger,
  parseFormatVersion,
  type DiagnosticHandler,
  type DxfRecord,
  type Logger,
} from '@dxfio/data';
import { classify } from '@dxfio/encoding';
import { RecordList } from '@dxfio/lists';
import { RecordDecoder, type DxfTagReader } from '@dxfio/parser';
import { RecordEncoder, StringTagSink, type EncodeOptions } from '@dxfio/export';
import { createSchemaRegistry, type EntitySchema } from '@dxfio/schema';

const log = createLogger('CLI');

export const DEFAULT_FORMAT_VERSION = FormatVersion.AC2000;

/** Header variable naming the drawing's format version */
const ACADVER = '$ACADVER';

export interface DecodeCommandOptions {
  /** Fixed format version; otherwise taken from $ACADVER, else AC2000 */
  version?: FormatVersion;
  onDiagnostic?: DiagnosticHandler;
}

export interface DecodeCommandResult {
  records: RecordList<DxfRecord>;
  version: FormatVersion;
}

/**
 * One line per code: the code and its scalar class
 */
export function classifyCommand(codes: readonly number[]): string[] {
  return codes.map((code) => `${code}\t${classify(code) ?? 'unclassified'}`);
}

/**
 * Look up a record kind by its type name
 * @throws InvariantViolationError naming the known kinds
 */
export function schemaFor(kind: string): EntitySchema<DxfRecord> {
  const registry = createSchemaRegistry();
  const schema = registry.get(kind.toUpperCase());
  if (!schema) {
    throw new InvariantViolationError(
      `Unknown record kind '${kind}'; expected one of ${[...registry.keys()].join(', ')}`,
    );
  }
  return schema;
}

/**
 * Collect every record of one kind from a drawing, wherever it appears.
 * Tags of other kinds are skipped.
 */
export function decodeCommand(
  reader: DxfTagReader,
  schema: EntitySchema<DxfRecord>,
  options: DecodeCommandOptions = {},
): DecodeCommandResult {
  const decoder = new RecordDecoder({ onDiagnostic: options.onDiagnostic });
  const records = new RecordList<DxfRecord>();
  let version = options.version;

  for (let tag = reader.peekTag(); tag !== null; tag = reader.peekTag()) {
    if (tag.groupCode === 0 && tag.value.trim() === schema.typeName) {
      const current = version ?? DEFAULT_FORMAT_VERSION;
      for (const record of decoder.readRecords(schema, reader, current)) {
        records.append(record);
      }
      continue;
    }

    reader.nextTag();
    if (options.version === undefined && tag.groupCode === 9 && tag.value.trim() === ACADVER) {
      const value = reader.nextTag();
      const detected = value ? parseFormatVersion(value.value) : null;
      if (detected !== null) {
        version = detected;
        log.debug(`Format version ${value?.value.trim()} from header`);
      } else {
        log.warn(`Unrecognized ${ACADVER} value, using the default`, { line: value?.line });
      }
    }
  }

  return { records, version: version ?? DEFAULT_FORMAT_VERSION };
}

/** Records as pretty-printed JSON */
export function recordsToJson(records: RecordList<DxfRecord>): string {
  return JSON.stringify(records, null, 2);
}

/**
 * Decode every record of one kind and encode it again as DXF text
 */
export function roundTripCommand(
  reader: DxfTagReader,
  schema: EntitySchema<DxfRecord>,
  options: DecodeCommandOptions & EncodeOptions = {},
): { text: string; written: number; version: FormatVersion } {
  const { records, version } = decodeCommand(reader, schema, options);
  const sink = new StringTagSink();
  const written = new RecordEncoder({ onDiagnostic: options.onDiagnostic }).encodeAll(
    schema,
    records,
    version,
    sink,
    { handles: options.handles },
  );
  return { text: sink.toString(), written, version };
}

/** Log a command failure; DXF errors carry their file and line */
export function reportFailure(logger: Logger, error: unknown): void {
  if (error instanceof DxfError) {
    logger.error(error.message, undefined, { line: error.line, data: { source: error.source } });
  } else {
    logger.error('Command failed', error);
  }
}
