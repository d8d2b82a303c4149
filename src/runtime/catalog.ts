import type { Block } from '../program/block.js';
import { neslibRoutines } from './neslib.js';
import type { BuildContext, Routine, Section } from './routine.js';
import { startupRoutines } from './startup.js';
import { supportRoutines } from './support.js';

/**
 * Every runtime routine, in canonical image order within each section.
 */
export const catalogRoutines: readonly Routine[] = [
  ...startupRoutines,
  ...neslibRoutines,
  ...supportRoutines,
];

const byName = new Map<string, Routine>(catalogRoutines.map((r) => [r.name, r]));

function globalLabels(blocks: readonly Block[]): string[] {
  const names: string[] = [];
  for (const block of blocks) {
    if (block.label !== undefined) names.push(block.label);
    if (block.kind !== 'code') continue;
    for (const line of block.lines) {
      for (const name of line.labels ?? []) if (!name.startsWith('@')) names.push(name);
    }
  }
  return names;
}

// Secondary entry points (`pusha`, `flush_vram_update_nmi`, ...) map to the routine that defines them.
const byEntry = new Map<string, Routine>();
for (const r of catalogRoutines) {
  for (const label of globalLabels(r.build({ localBytes: 0 }))) byEntry.set(label, r);
}

/**
 * Find the routine that defines `name`, either as its key or as a secondary entry point.
 */
export function lookupRoutine(name: string): Routine | undefined {
  return byName.get(name) ?? byEntry.get(name);
}

export function hasSubroutine(name: string): boolean {
  return lookupRoutine(name) !== undefined;
}

/**
 * Transitive dependency closure of `names`, returned in catalog order.
 *
 * Unknown names are ignored; callers check them with `lookupRoutine` first.
 */
export function closure(names: Iterable<string>): Routine[] {
  const seen = new Set<Routine>();
  const pending: Routine[] = [];
  for (const name of names) {
    const r = lookupRoutine(name);
    if (r !== undefined) pending.push(r);
  }
  while (pending.length > 0) {
    const r = pending.pop();
    if (r === undefined || seen.has(r)) continue;
    seen.add(r);
    for (const dep of r.requires) {
      const next = lookupRoutine(dep);
      if (next !== undefined && !seen.has(next)) pending.push(next);
    }
  }
  return catalogRoutines.filter((r) => seen.has(r));
}

/**
 * Blocks of every routine in `section`, or only of those in `only` when given.
 */
export function sectionBlocks(
  section: Section,
  ctx: BuildContext,
  only?: readonly Routine[],
): Block[] {
  const members = (only ?? catalogRoutines).filter((r) => r.section === section);
  return members.flatMap((r) => r.build(ctx));
}
