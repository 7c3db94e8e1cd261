/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { InvariantViolationError, SUBCLASS_MARKER_VERSION, type DxfRecord, type FormatVersion } from '@dxfio/data';
import type { EntitySchema, FieldRule, SchemaDefinition } from './types.js';

/**
 * Group codes the codec handles itself for every record kind:
 * 0 (record boundary), 5/105 (handle), 100 (subclass marker),
 * 102 (application group), 330/360 (owner handles), 999 (comment).
 */
export const RESERVED_GROUP_CODES: ReadonlySet<number> = new Set([0, 5, 100, 102, 105, 330, 360, 999]);

/**
 * Freeze a schema definition and index its rules by group code.
 * @throws InvariantViolationError on a duplicate or reserved group code
 */
export function defineSchema<R extends DxfRecord>(definition: SchemaDefinition<R>): EntitySchema<R> {
  const rules: FieldRule<R>[] = [];
  const byCode = new Map<number, FieldRule<R>>();
  const markers = new Map<string, FormatVersion>();

  const register = (rule: FieldRule<R>): void => {
    if (RESERVED_GROUP_CODES.has(rule.groupCode)) {
      throw new InvariantViolationError(
        `${definition.typeName}: group code ${rule.groupCode} (${rule.name}) is reserved`,
      );
    }
    if (byCode.has(rule.groupCode)) {
      throw new InvariantViolationError(
        `${definition.typeName}: group code ${rule.groupCode} is declared twice`,
      );
    }
    byCode.set(rule.groupCode, rule);
    rules.push(rule);
  };

  for (const section of definition.sections) {
    if (section.marker !== undefined && !markers.has(section.marker)) {
      markers.set(section.marker, section.markerMinVersion ?? SUBCLASS_MARKER_VERSION);
    }
    section.fields.forEach(register);
    for (const group of section.elements ?? []) {
      if (!group.lead.repeatable || group.members.some((member) => !member.rule.repeatable)) {
        throw new InvariantViolationError(
          `${definition.typeName}: element group ${group.name} must only contain repeatable rules`,
        );
      }
      register(group.lead);
      group.members.forEach((member) => register(member.rule));
    }
  }

  return Object.freeze({
    typeName: definition.typeName,
    minVersion: definition.minVersion,
    sections: definition.sections,
    create: definition.create,
    rules,
    markers,
    ruleFor(groupCode: number): FieldRule<R> | undefined {
      return byCode.get(groupCode);
    },
  });
}
