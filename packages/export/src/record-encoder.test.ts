/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_DXF_DEFAULTS,
  FormatVersion,
  InvariantViolationError,
  MissingRequiredFieldError,
  collectDiagnostics,
  type DxfRecord,
} from '@dxfio/data';
import { RecordList } from '@dxfio/lists';
import { DxfTagReader, RecordDecoder, StringLineSource } from '@dxfio/parser';
import {
  ComplexElementType,
  createAppIdSchema,
  createDictionarySchema,
  createLinetypeSchema,
  createObjectPtrSchema,
  createPointSchema,
  createRegionSchema,
  createTextSchema,
  type DictionaryRecord,
  type EntitySchema,
  type LinetypeRecord,
} from '@dxfio/schema';
import { RecordEncoder } from './record-encoder.js';
import { ArrayTagSink, StringTagSink } from './tag-sink.js';

const dictionarySchema = createDictionarySchema();
const linetypeSchema = createLinetypeSchema(DEFAULT_DXF_DEFAULTS);
const textSchema = createTextSchema(DEFAULT_DXF_DEFAULTS);

function dictionary(): DictionaryRecord {
  const record = dictionarySchema.create();
  record.idCode = 0x1a;
  record.ownerSoft = '0';
  record.entryName = 'ENTRY1';
  record.entryObjectHandle = '2B';
  return record;
}

function gasLine(): LinetypeRecord {
  const record = linetypeSchema.create();
  record.idCode = 0x14;
  record.linetypeName = 'GAS_LINE';
  record.description = 'Gas line';
  record.elementCount = 3;
  record.totalPatternLength = 1.2;
  record.dashLengths.append(0.5).append(-0.2).append(-0.5);
  record.complexTypes.append(ComplexElementType.None).append(ComplexElementType.Text).append(ComplexElementType.None);
  record.shapeNumbers.append(0);
  record.stylePointers.append('11');
  record.scales.append(0.1);
  record.rotations.append(0);
  record.xOffsets.append(-0.1);
  record.yOffsets.append(-0.05);
  record.textStrings.append('GAS');
  return record;
}

function tagsOf<R extends DxfRecord>(schema: EntitySchema<R>, record: R, version: FormatVersion): Array<[number, string]> {
  const sink = new ArrayTagSink();
  new RecordEncoder().encode(schema, record, version, sink);
  return sink.tags.map((tag) => [tag.groupCode, tag.value]);
}

function roundTrip<R extends DxfRecord>(schema: EntitySchema<R>, record: R, version: FormatVersion): R {
  const sink = new StringTagSink();
  new RecordEncoder().encode(schema, record, version, sink);
  const { handler, diagnostics } = collectDiagnostics();
  const reader = new DxfTagReader(new StringLineSource(`${sink.toString()}  0\nEOF\n`));
  const decoded = new RecordDecoder({ onDiagnostic: handler }).decode(schema, reader, version);
  expect(diagnostics).toEqual([]);
  return decoded;
}

describe('RecordEncoder', () => {
  it('brackets the extension dictionary right after the handle', () => {
    const record = dictionary();
    record.ownerHard = '3C';

    expect(tagsOf(dictionarySchema, record, FormatVersion.R14)).toEqual([
      [0, 'DICTIONARY'],
      [5, '1a'],
      [102, '{ACAD_XDICTIONARY'],
      [360, '3C'],
      [102, '}'],
      [330, '0'],
      [100, 'AcDbDictionary'],
      [3, 'ENTRY1'],
      [350, '2B'],
    ]);
  });

  it('writes a real soft owner as a reactor', () => {
    const record = dictionary();
    record.ownerSoft = 'C';

    expect(tagsOf(dictionarySchema, record, FormatVersion.AC2000).slice(2, 5)).toEqual([
      [102, '{ACAD_REACTORS'],
      [330, 'C'],
      [102, '}'],
    ]);
  });

  it('writes a bare soft owner before reactors existed', () => {
    const record = dictionary();
    record.ownerHard = '3C';

    expect(tagsOf(dictionarySchema, record, FormatVersion.R13)).toEqual([
      [0, 'DICTIONARY'],
      [5, '1a'],
      [330, '0'],
      [100, 'AcDbDictionary'],
      [3, 'ENTRY1'],
      [350, '2B'],
    ]);
  });

  it('writes neither owners nor markers for R12', () => {
    const record = createAppIdSchema().create();
    record.idCode = 0x12;
    record.ownerSoft = '9';
    record.applicationName = 'ACAD';

    expect(tagsOf(createAppIdSchema(), record, FormatVersion.R12)).toEqual([
      [0, 'APPID'],
      [5, '12'],
      [2, 'ACAD'],
      [70, '0'],
    ]);
  });

  it('omits the handle on request', () => {
    const sink = new ArrayTagSink();
    new RecordEncoder().encode(dictionarySchema, dictionary(), FormatVersion.R13, sink, { handles: 'omit' });
    expect(sink.tags.map((tag) => tag.groupCode)).toEqual([0, 330, 100, 3, 350]);
  });

  it('writes TEXT with right-aligned group codes and fixed-point doubles', () => {
    const record = textSchema.create();
    record.idCode = 0x2f;
    record.textValue = 'Hello';
    record.x0 = 1;
    record.y0 = 2;
    record.height = 2.5;

    const sink = new StringTagSink();
    new RecordEncoder().encode(textSchema, record, FormatVersion.AC2000, sink);

    expect(sink.tagCount).toBe(11);
    expect(sink.toString()).toBe(
      [
        '  0', 'TEXT',
        '  5', '2f',
        '100', 'AcDbEntity',
        '  8', '0',
        '100', 'AcDbText',
        ' 10', '1.000000',
        ' 20', '2.000000',
        ' 30', '0.000000',
        ' 40', '2.500000',
        '  1', 'Hello',
        '100', 'AcDbText',
      ].join('\n') + '\n',
    );
  });

  it('writes CRLF line endings when asked', () => {
    const sink = new StringTagSink('\r\n');
    sink.writeTags([{ groupCode: 1001, value: 'ACAD' }]);
    expect(sink.toString()).toBe('1001\r\nACAD\r\n');
  });

  it('substitutes fallbacks without modifying the record', () => {
    const { handler, diagnostics } = collectDiagnostics();
    const record = textSchema.create();
    record.textValue = 'x';
    record.layer = '';

    const sink = new ArrayTagSink();
    new RecordEncoder({ onDiagnostic: handler }).encode(textSchema, record, FormatVersion.AC2000, sink);

    expect(sink.tags.find((tag) => tag.groupCode === 8)?.value).toBe('0');
    expect(record.layer).toBe('');
    expect(diagnostics.map((diag) => [diag.kind, diag.groupCode])).toEqual([['DefaultApplied', 8]]);
  });

  it('leaves the sink untouched when a required field is empty', () => {
    const record = dictionary();
    record.entryName = '';
    const sink = new StringTagSink();

    expect(() => new RecordEncoder().encode(dictionarySchema, record, FormatVersion.AC2000, sink)).toThrow(
      MissingRequiredFieldError,
    );
    expect(sink.toString()).toBe('');
  });

  it('rejects a value with a line break before writing anything', () => {
    const record = textSchema.create();
    record.textValue = 'line1\nline2';
    const sink = new StringTagSink();

    let caught: unknown;
    try {
      new RecordEncoder().encode(textSchema, record, FormatVersion.AC2000, sink);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(InvariantViolationError);
    expect(caught).toMatchObject({ groupCode: 1 });
    expect(sink.toString()).toBe('');
  });

  it('rejects line breaks in list values and owner handles', () => {
    const region = createRegionSchema(DEFAULT_DXF_DEFAULTS).create();
    region.proprietaryData.append('ABC\r\nDEF');
    expect(() => tagsOf(createRegionSchema(DEFAULT_DXF_DEFAULTS), region, FormatVersion.AC2000)).toThrow(InvariantViolationError);

    const record = dictionary();
    record.ownerHard = '3C\n';
    expect(() => tagsOf(dictionarySchema, record, FormatVersion.AC2000)).toThrow(InvariantViolationError);
  });

  it('writes version-gated fields only inside their window', () => {
    const record = textSchema.create();
    record.textValue = 'x';
    record.elevation = 3;
    record.lineweight = 25;

    const r12 = tagsOf(textSchema, record, FormatVersion.R12).map(([code]) => code);
    expect(r12).toContain(38);
    expect(r12).not.toContain(370);
    expect(r12).not.toContain(100);

    const ac2004 = tagsOf(textSchema, record, FormatVersion.AC2004).map(([code]) => code);
    expect(ac2004).not.toContain(38);
    expect(ac2004).toContain(370);
  });

  it('interleaves LTYPE pattern elements', () => {
    expect(tagsOf(linetypeSchema, gasLine(), FormatVersion.AC2000)).toEqual([
      [0, 'LTYPE'],
      [5, '14'],
      [100, 'AcDbSymbolTableRecord'],
      [100, 'AcDbLinetypeTableRecord'],
      [2, 'GAS_LINE'],
      [70, '0'],
      [3, 'Gas line'],
      [72, '65'],
      [73, '3'],
      [40, '1.200000'],
      [49, '0.500000'],
      [74, '0'],
      [49, '-0.200000'],
      [74, '2'],
      [75, '0'],
      [340, '11'],
      [46, '0.100000'],
      [50, '0.000000'],
      [44, '-0.100000'],
      [45, '-0.050000'],
      [9, 'GAS'],
      [49, '-0.500000'],
      [74, '0'],
    ]);
  });

  it('writes no complex linetype data before R13', () => {
    expect(tagsOf(linetypeSchema, gasLine(), FormatVersion.R12)).toEqual([
      [0, 'LTYPE'],
      [5, '14'],
      [2, 'GAS_LINE'],
      [70, '0'],
      [3, 'Gas line'],
      [72, '65'],
      [73, '3'],
      [40, '1.200000'],
      [49, '0.500000'],
      [49, '-0.200000'],
      [49, '-0.500000'],
    ]);
  });

  it('derives the LTYPE element count from the dash list', () => {
    const record = gasLine();
    record.elementCount = 7;
    expect(tagsOf(linetypeSchema, record, FormatVersion.AC2000)).toContainEqual([73, '3']);
  });
});

describe('RecordEncoder.encodeAll', () => {
  it('skips records that fail validation and counts the rest', () => {
    const { handler, diagnostics } = collectDiagnostics();
    const broken = dictionary();
    broken.entryName = '';
    const records = new RecordList<DictionaryRecord>().append(dictionary()).append(broken).append(dictionary());

    const sink = new ArrayTagSink();
    const written = new RecordEncoder({ onDiagnostic: handler }).encodeAll(
      dictionarySchema,
      records,
      FormatVersion.R13,
      sink,
    );

    expect(written).toBe(2);
    expect(sink.tags.filter((tag) => tag.groupCode === 0)).toHaveLength(2);
    expect(diagnostics.map((diag) => [diag.kind, diag.groupCode])).toEqual([['SkippedRecord', 3]]);
  });

  it('skips records whose values contain line breaks', () => {
    const { handler, diagnostics } = collectDiagnostics();
    const broken = dictionary();
    broken.entryObjectHandle = '2B\r';
    const records = new RecordList<DictionaryRecord>().append(broken).append(dictionary());

    const sink = new ArrayTagSink();
    const written = new RecordEncoder({ onDiagnostic: handler }).encodeAll(
      dictionarySchema,
      records,
      FormatVersion.R13,
      sink,
    );

    expect(written).toBe(1);
    expect(diagnostics.map((diag) => [diag.kind, diag.groupCode])).toEqual([['SkippedRecord', 350]]);
  });
});

describe('round trip', () => {
  it('DICTIONARY', () => {
    const record = dictionary();
    record.ownerSoft = 'C';
    record.ownerHard = '3C';
    record.hardOwnerFlag = 1;
    record.cloningFlag = 1;
    expect(roundTrip(dictionarySchema, record, FormatVersion.AC2000)).toEqual(record);
  });

  it('LTYPE with complex elements', () => {
    const record = gasLine();
    expect(roundTrip(linetypeSchema, record, FormatVersion.AC2000)).toEqual(record);
  });

  it('TEXT with justification and extrusion', () => {
    const record = textSchema.create();
    record.idCode = 0x30;
    record.layer = 'NOTES';
    record.linetype = 'DASHED';
    record.color = 1;
    record.lineweight = 25;
    record.colorValue = 0xff0000;
    record.textValue = 'Centered';
    record.textStyle = 'ROMANS';
    record.x0 = 1.5;
    record.y0 = 2.25;
    record.x1 = 3.5;
    record.y1 = 2.25;
    record.height = 0.25;
    record.rotationAngle = 90;
    record.relativeXScale = 0.75;
    record.horizontalJustification = 1;
    record.verticalJustification = 2;
    record.extrusionZ = -1;
    record.xdataApplications.append('ACAD');
    expect(roundTrip(textSchema, record, FormatVersion.AC2004)).toEqual(record);
  });

  it('REGION', () => {
    const schema = createRegionSchema(DEFAULT_DXF_DEFAULTS);
    const record = schema.create();
    record.idCode = 0x41;
    record.paperspace = 1;
    record.proprietaryData.append('opq rst').append('uvw');
    record.additionalProprietaryData.append('xyz');
    expect(roundTrip(schema, record, FormatVersion.AC2000)).toEqual(record);
  });

  it('OBJECT_PTR', () => {
    const schema = createObjectPtrSchema();
    const record = schema.create();
    record.idCode = 0x52;
    record.xdataApplications.append('ASE');
    expect(roundTrip(schema, record, FormatVersion.AC2000)).toEqual(record);
  });

  it('APPID', () => {
    const schema = createAppIdSchema();
    const record = schema.create();
    record.idCode = 0x12;
    record.ownerSoft = '9';
    record.applicationName = 'ACAD_PSEXT';
    expect(roundTrip(schema, record, FormatVersion.R14)).toEqual(record);
  });

  it('POINT', () => {
    const schema = createPointSchema(DEFAULT_DXF_DEFAULTS);
    const record = schema.create();
    record.idCode = 0x60;
    record.x0 = 10;
    record.y0 = -4.5;
    record.z0 = 0.125;
    record.thickness = 2;
    record.xAxisAngle = 30;
    record.extrusionX = 1;
    record.extrusionZ = 0;
    expect(roundTrip(schema, record, FormatVersion.AC2000)).toEqual(record);
  });
});
