/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Members common to all drawable entities (AcDbEntity)
 */

import {
  FormatVersion,
  MODELSPACE,
  createRecordHeader,
  type DxfDefaults,
  type DxfRecord,
} from '@dxfio/data';
import { ScalarList } from '@dxfio/lists';
import { fieldsFor } from '../builder.js';
import type { SchemaSection } from '../types.js';

export interface DxfEntityRecord extends DxfRecord {
  /** 67: 1 when the entity lives in paper space */
  paperspace: number;
  /** 8 */
  layer: string;
  /** 6 */
  linetype: string;
  /** 38: only written up to R12; later releases fold it into the Z coordinate */
  elevation: number;
  /** 62: ACI color, 256 = by layer, 0 = by block */
  color: number;
  /** 48 */
  linetypeScale: number;
  /** 60: 0 = visible, 1 = invisible */
  visibility: number;
  /** 92 (or 160 on 64-bit writers): byte count of the proxy graphics */
  graphicsDataSize: number;
  /** 310: proxy graphics, one hex chunk per tag */
  binaryGraphicsData: ScalarList<string>;
  /** 347: hard pointer to a MATERIAL object */
  material: string;
  /** 284: 0 = casts and receives, 1 = casts, 2 = receives, 3 = ignores */
  shadowMode: number;
  /** 370: lineweight enum */
  lineweight: number;
  /** 390: hard pointer to a PLOTSTYLENAME object */
  plotStyleName: string;
  /** 420: 24-bit true color */
  colorValue: number;
  /** 430 */
  colorName: string;
  /** 440 */
  transparency: number;
  /** 1001: registered application names of attached extended data */
  xdataApplications: ScalarList<string>;
}

export function createEntityRecord(defaults: DxfDefaults): DxfEntityRecord {
  return {
    ...createRecordHeader(),
    paperspace: MODELSPACE,
    layer: defaults.layer,
    linetype: defaults.linetype,
    elevation: 0,
    color: defaults.color,
    linetypeScale: defaults.linetypeScale,
    visibility: defaults.visibility,
    graphicsDataSize: 0,
    binaryGraphicsData: new ScalarList<string>(),
    material: '',
    shadowMode: 0,
    lineweight: 0,
    plotStyleName: '',
    colorValue: 0,
    colorName: '',
    transparency: 0,
    xdataApplications: new ScalarList<string>(),
  };
}

const f = fieldsFor<DxfEntityRecord>();

/**
 * The AcDbEntity section shared by every drawable entity
 */
export function entityCommonSection(defaults: DxfDefaults): SchemaSection<DxfEntityRecord> {
  return {
    marker: 'AcDbEntity',
    fields: [
      f.int(67, f.prop('paperspace'), { omitIf: MODELSPACE }),
      f.string(8, f.prop('layer'), { fallback: defaults.layer }),
      f.string(6, f.prop('linetype'), { fallback: defaults.linetype, omitIf: defaults.linetype }),
      f.double(38, f.prop('elevation'), { maxVersion: FormatVersion.R12, omitIf: 0 }),
      f.int(62, f.prop('color'), { omitIf: defaults.color }),
      f.double(48, f.prop('linetypeScale'), { omitIf: defaults.linetypeScale }),
      f.int(60, f.prop('visibility'), { omitIf: defaults.visibility }),
      f.int(92, f.prop('graphicsDataSize'), { minVersion: FormatVersion.AC2000, omitIf: 0 }),
      // 64-bit writers use 160 for the same count; read it, write 92
      f.int(160, f.prop('graphicsDataSize'), { minVersion: FormatVersion.AC2000, emitWhen: () => false }),
      f.stringList(310, f.prop('binaryGraphicsData'), { minVersion: FormatVersion.AC2000 }),
      f.string(347, f.prop('material'), { minVersion: FormatVersion.AC2008, omitIf: '' }),
      f.int(284, f.prop('shadowMode'), { minVersion: FormatVersion.AC2009, omitIf: 0 }),
      f.int(370, f.prop('lineweight'), { minVersion: FormatVersion.AC2002, omitIf: 0 }),
      f.string(390, f.prop('plotStyleName'), { minVersion: FormatVersion.AC2009, omitIf: '' }),
      f.int(420, f.prop('colorValue'), { minVersion: FormatVersion.AC2004, omitIf: 0 }),
      f.string(430, f.prop('colorName'), { minVersion: FormatVersion.AC2004, omitIf: '' }),
      f.int(440, f.prop('transparency'), { minVersion: FormatVersion.AC2004, omitIf: 0 }),
    ],
  };
}

/**
 * Trailing extended data: application names (1001) registered on the record
 */
export function extendedDataSection<R extends { xdataApplications: ScalarList<string> }>(): SchemaSection<R> {
  const x = fieldsFor<R>();
  return {
    fields: [x.stringList(1001, x.prop('xdataApplications'))],
  };
}

/** Extrusion direction default (0, 0, 1) */
export interface Extrusion {
  extrusionX: number;
  extrusionY: number;
  extrusionZ: number;
}

export function hasDefaultExtrusion(record: Extrusion): boolean {
  return record.extrusionX === 0 && record.extrusionY === 0 && record.extrusionZ === 1;
}
