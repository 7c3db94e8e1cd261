#!/usr/bin/env node
/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * dxfio - inspect and re-encode DXF records
 */

import * as fs from 'fs';
import { Command, InvalidArgumentError } from 'commander';
import { createLogger, parseFormatVersion, type FormatVersion } from '@dxfio/data';
import { DxfTagReader, FileLineSource } from '@dxfio/parser';
import {
  classifyCommand,
  decodeCommand,
  recordsToJson,
  reportFailure,
  roundTripCommand,
  schemaFor,
} from './commands.js';

const log = createLogger('dxfio');

function parseGroupCode(value: string): number {
  if (!/^[+-]?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(`'${value}' is not an integer group code`);
  }
  return parseInt(value, 10);
}

function parseVersionOption(value: string): FormatVersion {
  const version = parseFormatVersion(value);
  if (version === null) {
    throw new InvalidArgumentError(`'${value}' is not a known format version (try AC1015 or R14)`);
  }
  return version;
}

function openReader(file: string): { reader: DxfTagReader; source: FileLineSource } {
  const source = new FileLineSource(file);
  return { reader: new DxfTagReader(source), source };
}

function fail(error: unknown): never {
  reportFailure(log, error);
  process.exit(1);
}

interface RecordOptions {
  kind: string;
  formatVersion?: FormatVersion;
}

const program = new Command();

program
  .name('dxfio')
  .description('Decode and encode DXF records')
  .version('0.1.0');

program
  .command('classify')
  .description('Print the value class of each group code')
  .argument('<codes...>', 'Group codes', (value: string, previous: number[] = []) => [
    ...previous,
    parseGroupCode(value),
  ])
  .action((codes: number[]) => {
    for (const line of classifyCommand(codes)) {
      console.log(line);
    }
  });

program
  .command('decode')
  .description('Decode every record of one kind and print it as JSON')
  .argument('<file>', 'DXF file')
  .requiredOption('-k, --kind <type>', 'Record kind, e.g. TEXT or LTYPE')
  .option('-f, --format-version <version>', 'Format version (default: $ACADVER, else AC1015)', parseVersionOption)
  .action((file: string, options: RecordOptions) => {
    try {
      const schema = schemaFor(options.kind);
      const { reader, source } = openReader(file);
      try {
        const { records } = decodeCommand(reader, schema, { version: options.formatVersion });
        process.stdout.write(`${recordsToJson(records)}\n`);
      } finally {
        source.close();
      }
    } catch (error) {
      fail(error);
    }
  });

program
  .command('roundtrip')
  .description('Decode every record of one kind and write it back as DXF')
  .argument('<file>', 'DXF file')
  .requiredOption('-k, --kind <type>', 'Record kind, e.g. TEXT or LTYPE')
  .option('-f, --format-version <version>', 'Format version (default: $ACADVER, else AC1015)', parseVersionOption)
  .option('-o, --output <file>', 'Write to a file instead of stdout')
  .option('--no-handles', 'Leave out group code 5')
  .action((file: string, options: RecordOptions & { output?: string; handles: boolean }) => {
    try {
      const schema = schemaFor(options.kind);
      const { reader, source } = openReader(file);
      try {
        const { text, written } = roundTripCommand(reader, schema, {
          version: options.formatVersion,
          handles: options.handles ? 'emit' : 'omit',
        });
        if (options.output) {
          fs.writeFileSync(options.output, text);
          console.error(`Wrote ${written} ${schema.typeName} record(s) to ${options.output}`);
        } else {
          process.stdout.write(text);
        }
      } finally {
        source.close();
      }
    } catch (error) {
      fail(error);
    }
  });

program.parse();
