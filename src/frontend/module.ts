import { parseHexBytes } from '../bytes.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { Mirroring } from '../formats/types.js';

/** Method reference: a library call target. */
export interface MethodToken {
  kind: 'method';
  name: string;
  /** Declaring type. */
  owner: string;
  /** Parameter count. */
  params: number;
}

export interface StringToken {
  kind: 'string';
  value: string;
}

/** Field reference; `data` is the initial value blob of a static array field. */
export interface FieldToken {
  kind: 'field';
  name: string;
  data?: Uint8Array;
}

export interface TypeToken {
  kind: 'type';
  name: string;
}

export type TokenEntry = MethodToken | StringToken | FieldToken | TypeToken;

/** Metadata token (as a 32-bit unsigned number) to resolved entry. */
export type TokenTable = ReadonlyMap<number, TokenEntry>;

/**
 * The entry procedure and its metadata, as handed over by the extractor.
 */
export interface ProgramModule {
  name: string;
  mirroring: Mirroring;
  /** Tile data path, relative to the module file. */
  chr?: string;
  entry: {
    name: string;
    code: Uint8Array;
    /** Local variable type names in declaration order. */
    locals?: string[];
  };
  tokens: TokenTable;
}

export const MODULE_FORMAT = 'nesbake-module';
export const MODULE_VERSION = 1;

type Fields = Record<string, unknown>;

function isFields(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class ModuleFormatError extends Error {}

function str(obj: Fields, key: string, where: string): string {
  const v = obj[key];
  if (typeof v !== 'string') throw new ModuleFormatError(`${where}.${key} must be a string`);
  return v;
}

function optionalStr(obj: Fields, key: string, where: string): string | undefined {
  return obj[key] === undefined ? undefined : str(obj, key, where);
}

function hex(obj: Fields, key: string, where: string): Uint8Array {
  const bytes = parseHexBytes(str(obj, key, where));
  if (bytes === undefined) throw new ModuleFormatError(`${where}.${key} is not a hex byte string`);
  return bytes;
}

function parseToken(value: unknown, where: string): TokenEntry {
  if (!isFields(value)) throw new ModuleFormatError(`${where} must be an object`);
  const kind = str(value, 'kind', where);
  switch (kind) {
    case 'method': {
      const params = value['params'];
      if (typeof params !== 'number' || !Number.isInteger(params) || params < 0) {
        throw new ModuleFormatError(`${where}.params must be a non-negative integer`);
      }
      return { kind, name: str(value, 'name', where), owner: str(value, 'owner', where), params };
    }
    case 'string':
      return { kind, value: str(value, 'value', where) };
    case 'field': {
      const name = str(value, 'name', where);
      return value['data'] === undefined ? { kind, name } : { kind, name, data: hex(value, 'data', where) };
    }
    case 'type':
      return { kind, name: str(value, 'name', where) };
    default:
      throw new ModuleFormatError(`${where}.kind "${kind}" is not one of method, string, field, type`);
  }
}

function parseTokens(value: unknown): Map<number, TokenEntry> {
  if (!isFields(value)) throw new ModuleFormatError('tokens must be an object');
  const tokens = new Map<number, TokenEntry>();
  for (const [key, entry] of Object.entries(value)) {
    if (!/^[0-9A-Fa-f]{8}$/.test(key)) {
      throw new ModuleFormatError(`token key "${key}" must be 8 hex digits`);
    }
    tokens.set(Number.parseInt(key, 16), parseToken(entry, `tokens.${key}`));
  }
  return tokens;
}

function parseLocals(value: unknown): string[] {
  if (!Array.isArray(value)) throw new ModuleFormatError('entry.locals must be an array');
  return value.map((item, i) => {
    if (typeof item !== 'string') throw new ModuleFormatError(`entry.locals[${i}] must be a string`);
    return item;
  });
}

function parseMirroring(value: unknown): Mirroring {
  if (value === undefined || value === 'horizontal') return 'horizontal';
  if (value === 'vertical') return 'vertical';
  throw new ModuleFormatError('mirroring must be "horizontal" or "vertical"');
}

/**
 * Validate a parsed module document.
 *
 * Reports a single `ModuleFormat` diagnostic and returns `undefined` on the first problem.
 */
export function parseProgramModule(
  doc: unknown,
  file: string,
  diagnostics: Diagnostic[],
): ProgramModule | undefined {
  try {
    if (!isFields(doc)) throw new ModuleFormatError('module must be a JSON object');
    if (doc['format'] !== MODULE_FORMAT) {
      throw new ModuleFormatError(`format must be "${MODULE_FORMAT}"`);
    }
    if (doc['version'] !== MODULE_VERSION) {
      throw new ModuleFormatError(`unsupported version ${String(doc['version'])}`);
    }
    const entry = doc['entry'];
    if (!isFields(entry)) throw new ModuleFormatError('entry must be an object');
    const chr = optionalStr(doc, 'chr', 'module');
    return {
      name: str(doc, 'name', 'module'),
      mirroring: parseMirroring(doc['mirroring']),
      ...(chr !== undefined ? { chr } : {}),
      entry: {
        name: str(entry, 'name', 'entry'),
        code: hex(entry, 'code', 'entry'),
        ...(entry['locals'] !== undefined ? { locals: parseLocals(entry['locals']) } : {}),
      },
      tokens: parseTokens(doc['tokens'] ?? {}),
    };
  } catch (err) {
    if (!(err instanceof ModuleFormatError)) throw err;
    diagnostics.push({
      id: DiagnosticIds.ModuleFormat,
      severity: 'error',
      message: err.message,
      file,
    });
    return undefined;
  }
}

/**
 * Parse module JSON text; syntax errors are reported as `ModuleFormat`.
 */
export function parseProgramModuleText(
  text: string,
  file: string,
  diagnostics: Diagnostic[],
): ProgramModule | undefined {
  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.ModuleFormat,
      severity: 'error',
      message: `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
      file,
    });
    return undefined;
  }
  return parseProgramModule(doc, file, diagnostics);
}
