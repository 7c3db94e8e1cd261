/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { DEFAULT_DXF_DEFAULTS, type DxfDefaults, type DxfRecord } from '@dxfio/data';
import type { EntitySchema } from './types.js';
import { createAppIdSchema } from './entities/appid.js';
import { createDictionarySchema } from './entities/dictionary.js';
import { createLinetypeSchema } from './entities/ltype.js';
import { createObjectPtrSchema } from './entities/object-ptr.js';
import { createPointSchema } from './entities/point.js';
import { createRegionSchema } from './entities/region.js';
import { createTextSchema } from './entities/text.js';

/**
 * Every built-in schema, keyed by the type name written with group code 0
 */
export function createSchemaRegistry(
  defaults: DxfDefaults = DEFAULT_DXF_DEFAULTS,
): ReadonlyMap<string, EntitySchema<DxfRecord>> {
  const schemas: EntitySchema<DxfRecord>[] = [
    createAppIdSchema(),
    createDictionarySchema(),
    createLinetypeSchema(defaults),
    createObjectPtrSchema(),
    createPointSchema(defaults),
    createRegionSchema(defaults),
    createTextSchema(defaults),
  ];
  return new Map(schemas.map((schema) => [schema.typeName, schema]));
}
