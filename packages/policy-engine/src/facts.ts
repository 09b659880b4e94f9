/**
 * Fact Model
 *
 * Immutable, ordered mapping from dotted paths (`from[0].base_image`,
 * `env[2].key`) to scalar or list-of-scalar values. buildFactModel flattens a
 * parsed document into this shape; keys that already look like paths are
 * taken literally, so pre-flattened input round-trips unchanged.
 */

import { DEFAULT_MAX_DEPTH } from './constants';
import { CyclicInputError, MalformedInputError } from './errors';
import { FactModelOptions, FactScalar, FactValue } from './types';

type ValueKind = 'string' | 'number' | 'boolean' | 'list';

export class FactModel {
  private readonly values: ReadonlyMap<string, FactValue>;

  private constructor(values: Map<string, FactValue>) {
    this.values = values;
    Object.freeze(this);
  }

  /**
   * Build from already-flattened path/value pairs.
   * @throws MalformedInputError on duplicate paths, invalid values, or a
   * value whose path is also the parent of other entries
   */
  static fromEntries(entries: Iterable<readonly [string, FactValue]>): FactModel {
    const values = new Map<string, FactValue>();

    for (const [path, value] of entries) {
      if (path.length === 0) {
        throw new MalformedInputError(path, 'empty path');
      }
      const kind = kindOf(path, value);
      const previous = values.get(path);
      if (previous !== undefined) {
        throw new MalformedInputError(
          path,
          `path defined more than once (${kindOf(path, previous)} and ${kind})`
        );
      }
      if (Array.isArray(value)) {
        const copy = [...value];
        Object.freeze(copy);
        values.set(path, copy);
      } else {
        values.set(path, value);
      }
    }

    for (const path of values.keys()) {
      for (const prefix of ancestorPaths(path)) {
        const parent = values.get(prefix);
        if (parent !== undefined) {
          throw new MalformedInputError(
            prefix,
            `${kindOf(prefix, parent)} value conflicts with nested entry '${path}'`
          );
        }
      }
    }

    return new FactModel(values);
  }

  static empty(): FactModel {
    return new FactModel(new Map());
  }

  get size(): number {
    return this.values.size;
  }

  get(path: string): FactValue | undefined {
    return this.values.get(path);
  }

  has(path: string): boolean {
    return this.values.has(path);
  }

  /**
   * True when the path itself or any entry nested below it exists
   */
  hasPrefix(path: string): boolean {
    if (path.length === 0) {
      return this.values.size > 0;
    }
    if (this.values.has(path)) {
      return true;
    }
    for (const key of this.values.keys()) {
      if (isNestedUnder(key, path)) {
        return true;
      }
    }
    return false;
  }

  /**
   * Indices `i` for which `path[i]` or an entry below it exists, ascending
   */
  elementIndices(path: string): number[] {
    const prefix = `${path}[`;
    const indices = new Set<number>();
    for (const key of this.values.keys()) {
      if (!key.startsWith(prefix)) {
        continue;
      }
      const close = key.indexOf(']', prefix.length);
      if (close === -1) {
        continue;
      }
      const raw = key.slice(prefix.length, close);
      if (/^\d+$/.test(raw)) {
        indices.add(Number(raw));
      }
    }
    return [...indices].sort((a, b) => a - b);
  }

  paths(): string[] {
    return [...this.values.keys()];
  }

  entries(): Array<[string, FactValue]> {
    return [...this.values.entries()];
  }

  toJSON(): Record<string, FactValue> {
    const out: Record<string, FactValue> = {};
    for (const [path, value] of this.values) {
      out[path] = value;
    }
    return out;
  }
}

/**
 * Flatten a parsed document into a fact model.
 *
 * - nested objects join keys with `.`
 * - lists of objects produce indexed paths `key[i]`
 * - lists of scalars are stored as a single list value
 * - null and undefined are omitted; Date becomes an ISO-8601 string
 *
 * @throws CyclicInputError when an object or list contains itself
 * @throws MalformedInputError on excess depth, collisions or unsupported values
 */
export function buildFactModel(document: unknown, options: FactModelOptions = {}): FactModel {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (!isPlainObject(document)) {
    throw new MalformedInputError('', 'document root must be an object');
  }

  const entries: Array<[string, FactValue]> = [];
  const ancestors: object[] = [];

  const walk = (value: unknown, path: string, depth: number): void => {
    if (value === null || value === undefined) {
      return;
    }

    const scalar = toScalar(value, path);
    if (scalar !== undefined) {
      entries.push([path, scalar]);
      return;
    }

    if (typeof value !== 'object') {
      throw new MalformedInputError(path, `unsupported value of type ${typeof value}`);
    }
    if (ancestors.includes(value)) {
      throw new CyclicInputError(path);
    }
    if (depth >= maxDepth) {
      throw new MalformedInputError(path, `nesting exceeds maximum depth of ${maxDepth}`);
    }

    ancestors.push(value);
    if (Array.isArray(value)) {
      walkList(value, path, depth);
    } else if (isPlainObject(value)) {
      for (const [key, child] of Object.entries(value)) {
        if (key.length === 0) {
          throw new MalformedInputError(path, 'empty key');
        }
        walk(child, path ? `${path}.${key}` : key, depth + 1);
      }
    } else {
      throw new MalformedInputError(path, `unsupported object ${value.constructor.name}`);
    }
    ancestors.pop();
  };

  const walkList = (list: unknown[], path: string, depth: number): void => {
    const scalars = list.map((item, index) => toScalar(item, `${path}[${index}]`));
    const scalarCount = scalars.filter((item) => item !== undefined).length;

    if (scalarCount === list.length) {
      entries.push([path, scalars.filter(isScalar)]);
      return;
    }
    if (scalarCount > 0) {
      throw new MalformedInputError(path, 'list mixes scalar and structured elements');
    }
    list.forEach((item, index) => walk(item, `${path}[${index}]`, depth + 1));
  };

  walk(document, '', 0);
  return FactModel.fromEntries(entries);
}

/**
 * Render a fact value for messages and text reports
 */
export function formatFactValue(value: FactValue): string {
  return Array.isArray(value) ? value.map(String).join(', ') : String(value);
}

function toScalar(value: unknown, path: string): FactScalar | undefined {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      if (!Number.isFinite(value)) {
        throw new MalformedInputError(path, `non-finite number ${value}`);
      }
      return value;
    default:
      break;
  }
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new MalformedInputError(path, 'invalid date');
    }
    return value.toISOString();
  }
  return undefined;
}

function isScalar(value: FactScalar | undefined): value is FactScalar {
  return value !== undefined;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function kindOf(path: string, value: FactValue): ValueKind {
  if (Array.isArray(value)) {
    value.forEach((item, index) => assertScalar(`${path}[${index}]`, item));
    return 'list';
  }
  return assertScalar(path, value);
}

function assertScalar(path: string, value: unknown): Exclude<ValueKind, 'list'> {
  if (typeof value === 'string' || typeof value === 'boolean') {
    return typeof value === 'string' ? 'string' : 'boolean';
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return 'number';
  }
  throw new MalformedInputError(path, `unsupported fact value ${String(value)}`);
}

/**
 * `a.b[0].c` -> `a`, `a.b`, `a.b[0]`
 */
function ancestorPaths(path: string): string[] {
  const prefixes: string[] = [];
  for (let i = 1; i < path.length; i++) {
    const ch = path[i];
    if (ch === '.' || ch === '[') {
      prefixes.push(path.slice(0, i));
    }
  }
  return prefixes;
}

function isNestedUnder(key: string, path: string): boolean {
  return key.length > path.length && key.startsWith(path) && (key[path.length] === '.' || key[path.length] === '[');
}
