import table from './capabilities.json' with { type: 'json' };

/**
 * How an argument is passed: `byte` in A, `word` in A/X, `ptr` a 16-bit address in A/X.
 */
export type ArgWidth = 'byte' | 'word' | 'ptr';
export type ReturnWidth = 'void' | 'byte' | 'word';

/** Compile-time evaluation of a call whose arguments are all constants. */
export interface NametableFold {
  kind: 'nametable';
  /** Nametable base address; the result is `base | (y << 5) | x`. */
  base: number;
}

/**
 * One declared overload of a library call.
 */
export interface Capability {
  readonly name: string;
  readonly params: readonly ArgWidth[];
  readonly returns: ReturnWidth;
  /**
   * The byte length of the pointer argument is appended as a trailing word argument.
   */
  readonly implicitLength: boolean;
  readonly fold?: NametableFold;
}

/** Type that owns every recognized library call. */
export const LIBRARY_OWNER: string = table.owner;

function isArgWidth(value: string): value is ArgWidth {
  return value === 'byte' || value === 'word' || value === 'ptr';
}

function isReturnWidth(value: string): value is ReturnWidth {
  return value === 'void' || value === 'byte' || value === 'word';
}

interface RawCall {
  name: string;
  params: string[];
  returns: string;
  implicitLength?: boolean;
  fold?: { kind: string; base: number };
}

function parseCapability(raw: RawCall): Capability {
  const params = raw.params.map((p) => {
    if (!isArgWidth(p)) throw new Error(`capabilities.json: ${raw.name}: bad argument width "${p}"`);
    return p;
  });
  if (!isReturnWidth(raw.returns)) {
    throw new Error(`capabilities.json: ${raw.name}: bad return width "${raw.returns}"`);
  }
  const capability: Capability = {
    name: raw.name,
    params,
    returns: raw.returns,
    implicitLength: raw.implicitLength === true,
  };
  if (raw.fold === undefined) return capability;
  if (raw.fold.kind !== 'nametable') {
    throw new Error(`capabilities.json: ${raw.name}: unknown fold "${raw.fold.kind}"`);
  }
  return { ...capability, fold: { kind: 'nametable', base: raw.fold.base } };
}

const calls: RawCall[] = table.calls;
const overloads = new Map<string, Capability[]>();
for (const raw of calls) {
  const capability = parseCapability(raw);
  const list = overloads.get(capability.name) ?? [];
  list.push(capability);
  overloads.set(capability.name, list);
}

export type CapabilityLookup =
  | { kind: 'ok'; capability: Capability }
  | { kind: 'unknown' }
  | { kind: 'arity'; expected: number[] };

/**
 * Select the overload of `name` taking `arity` arguments.
 */
export function lookupCapability(name: string, arity: number): CapabilityLookup {
  const list = overloads.get(name);
  if (list === undefined) return { kind: 'unknown' };
  const match = list.find((c) => c.params.length === arity);
  if (match === undefined) return { kind: 'arity', expected: list.map((c) => c.params.length) };
  return { kind: 'ok', capability: match };
}
