/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * DXF format version ordinals.
 *
 * Values follow the $ACADVER numbering (AC1009, AC1015, ...) so that
 * comparisons are plain integer comparisons.
 */
export enum FormatVersion {
  R10 = 1006,
  /** R11 and R12 share a format */
  R12 = 1009,
  R13 = 1012,
  R14 = 1014,
  AC2000 = 1015,
  AC2000i = 1016,
  AC2002 = 1017,
  AC2004 = 1018,
  AC2005 = 1019,
  AC2006 = 1020,
  AC2007 = 1021,
  AC2008 = 1022,
  AC2009 = 1023,
  AC2010 = 1024,
  AC2011 = 1025,
  AC2012 = 1026,
  AC2013 = 1027,
}

/** Subclass markers (group code 100) appear from R13 on */
export const SUBCLASS_MARKER_VERSION = FormatVersion.R13;

/** {ACAD_REACTORS} and {ACAD_XDICTIONARY} groups appear from R14 on */
export const REACTORS_VERSION = FormatVersion.R14;

const RELEASE_NAMES: Record<string, FormatVersion> = {
  R10: FormatVersion.R10,
  R11: FormatVersion.R12,
  R12: FormatVersion.R12,
  R13: FormatVersion.R13,
  R14: FormatVersion.R14,
  '2000': FormatVersion.AC2000,
  '2000I': FormatVersion.AC2000i,
  '2002': FormatVersion.AC2002,
  '2004': FormatVersion.AC2004,
  '2005': FormatVersion.AC2005,
  '2006': FormatVersion.AC2006,
  '2007': FormatVersion.AC2007,
  '2008': FormatVersion.AC2008,
  '2009': FormatVersion.AC2009,
  '2010': FormatVersion.AC2010,
  '2011': FormatVersion.AC2011,
  '2012': FormatVersion.AC2012,
  '2013': FormatVersion.AC2013,
};

function isFormatVersion(value: number): value is FormatVersion {
  return typeof FormatVersion[value] === 'string';
}

/**
 * Parse a format version from an $ACADVER string ('AC1015'), a release
 * name ('R14', '2004') or a bare ordinal ('1018').
 * Returns null when the text names no known version.
 */
export function parseFormatVersion(text: string): FormatVersion | null {
  const normalized = text.trim().toUpperCase();
  const acadver = normalized.match(/^AC(\d{4})$/);
  if (acadver) {
    const ordinal = parseInt(acadver[1], 10);
    return isFormatVersion(ordinal) ? ordinal : null;
  }
  const release = RELEASE_NAMES[normalized];
  if (release !== undefined) {
    return release;
  }
  if (/^\d{4}$/.test(normalized)) {
    const ordinal = parseInt(normalized, 10);
    return isFormatVersion(ordinal) ? ordinal : null;
  }
  return null;
}

/** Name of a version as used in diagnostics */
export function formatVersionName(version: FormatVersion): string {
  return FormatVersion[version] ?? `AC${version}`;
}
