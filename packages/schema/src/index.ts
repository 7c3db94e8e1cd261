/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @dxfio/schema - Declarative field tables for DXF record kinds
 */

export type {
  Accessor,
  FieldRule,
  ElementGroup,
  ElementMember,
  SchemaSection,
  SchemaDefinition,
  EntitySchema,
} from './types.js';
export { fieldsFor } from './builder.js';
export type { ScalarFieldOptions, ListFieldOptions } from './builder.js';
export { defineSchema, RESERVED_GROUP_CODES } from './define.js';
export { createSchemaRegistry } from './registry.js';

// Entity schemas
export {
  createEntityRecord,
  entityCommonSection,
  extendedDataSection,
  hasDefaultExtrusion,
} from './entities/common.js';
export type { DxfEntityRecord, Extrusion } from './entities/common.js';
export { createDictionarySchema } from './entities/dictionary.js';
export type { DictionaryRecord } from './entities/dictionary.js';
export {
  createLinetypeSchema,
  ComplexElementType,
  isComplexElement,
  isTextElement,
} from './entities/ltype.js';
export type { LinetypeRecord } from './entities/ltype.js';
export { createRegionSchema } from './entities/region.js';
export type { RegionRecord } from './entities/region.js';
export { createTextSchema } from './entities/text.js';
export type { TextRecord } from './entities/text.js';
export { createObjectPtrSchema } from './entities/object-ptr.js';
export type { ObjectPtrRecord } from './entities/object-ptr.js';
export { createAppIdSchema } from './entities/appid.js';
export type { AppIdRecord } from './entities/appid.js';
export { createPointSchema } from './entities/point.js';
export type { PointRecord } from './entities/point.js';
