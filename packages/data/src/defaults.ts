/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Drawing-wide default values, passed into schema factories.
 */

/** ACI color index meaning "by block" */
export const COLOR_BYBLOCK = 0;
/** ACI color index meaning "by layer" */
export const COLOR_BYLAYER = 256;

export const MODELSPACE = 0;
export const PAPERSPACE = 1;

export interface DxfDefaults {
  /** Layer name used when a drawable entity names none */
  layer: string;
  /** Linetype name used when a drawable entity names none */
  linetype: string;
  /** Text style used when a TEXT entity names none */
  textStyle: string;
  linetypeScale: number;
  color: number;
  visibility: number;
  /** LTYPE alignment code; DXF only knows 65 ('A') */
  linetypeAlignment: number;
  /** Modeler format version written for REGION entities */
  modelerFormatVersion: number;
  /** TEXT relative X scale factor */
  relativeXScale: number;
}

export const DEFAULT_DXF_DEFAULTS: Readonly<DxfDefaults> = Object.freeze({
  layer: '0',
  linetype: 'BYLAYER',
  textStyle: 'STANDARD',
  linetypeScale: 1.0,
  color: COLOR_BYLAYER,
  visibility: 0,
  linetypeAlignment: 65,
  modelerFormatVersion: 1,
  relativeXScale: 1.0,
});

/**
 * Merge caller overrides onto the standard defaults
 */
export function resolveDefaults(overrides: Partial<DxfDefaults> = {}): Readonly<DxfDefaults> {
  return Object.freeze({ ...DEFAULT_DXF_DEFAULTS, ...overrides });
}
