/**
 * UI option enum
 *
 * Each raw option string gets one enumerant; the enum value is the raw string
 * itself, and the identifiers are kept distinct so the mapping can be
 * reversed.
 */

import { pascalCase, quote, safeIdentifier, uniqueName } from './identifiers';

export interface UiOptionMember {
  identifier: string;
  raw: string;
}

/**
 * `ext_cmdline` -> `ExtCmdline`, `3d` -> `_3d`. Repeated raw strings keep their
 * first occurrence; identifiers that collide take a numeric suffix.
 */
export function uiOptionMembers(options: readonly string[]): UiOptionMember[] {
  const seen = new Set<string>();
  const identifiers = new Set<string>();
  const members: UiOptionMember[] = [];
  for (const raw of options) {
    if (seen.has(raw)) {
      continue;
    }
    seen.add(raw);
    members.push({ raw, identifier: uniqueName(safeIdentifier(pascalCase(raw)), identifiers) });
  }
  return members;
}

export function emitUiOptions(options: readonly string[]): string[] {
  const members = uiOptionMembers(options);
  const lines: string[] = [];

  lines.push('export enum UiOption {');
  for (const member of members) {
    lines.push(`  ${member.identifier} = ${quote(member.raw)},`);
  }
  lines.push('}');
  lines.push('');
  lines.push('export const UI_OPTIONS: ReadonlyMap<string, UiOption> = new Map<string, UiOption>([');
  for (const member of members) {
    lines.push(`  [${quote(member.raw)}, UiOption.${member.identifier}],`);
  }
  lines.push(']);');
  lines.push('');
  lines.push('export function parseUiOption(name: string): UiOption | undefined {');
  lines.push('  return UI_OPTIONS.get(name);');
  lines.push('}');
  return lines;
}
