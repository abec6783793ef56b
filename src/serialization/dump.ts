/**
 * Table literal serializer
 *
 * Writes plain data as a host-table literal the editor can load back with
 * a single evaluation: arrays become positional tables, plain objects
 * become keyed tables with `["key"]=` fields, null becomes `nil`.
 */

import { UnsupportedValueError } from '../core/errors.js';

/**
 * Quote a string the way the host's `%q` format does
 */
export function quoteString(value: string): string {
  let out = '"';
  for (const ch of value) {
    switch (ch) {
      case '"':
        out += '\\"';
        break;
      case '\\':
        out += '\\\\';
        break;
      case '\n':
        out += '\\\n';
        break;
      case '\r':
        out += '\\r';
        break;
      case '\0':
        out += '\\000';
        break;
      default:
        out += ch;
    }
  }
  return out + '"';
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function dumpInto(value: unknown, result: string[], path: Set<object>): void {
  if (value === null) {
    result.push('nil');
    return;
  }

  switch (typeof value) {
    case 'boolean':
      result.push(String(value));
      return;
    case 'number':
      if (!Number.isFinite(value)) {
        throw new UnsupportedValueError('number', `${value} has no literal form`);
      }
      result.push(String(value));
      return;
    case 'string':
      result.push(quoteString(value));
      return;
    case 'object':
      break;
    default:
      throw new UnsupportedValueError(typeof value);
  }

  if (path.has(value)) {
    throw new UnsupportedValueError('table', 'cyclic reference');
  }
  path.add(value);

  result.push('{');
  if (Array.isArray(value)) {
    for (const item of value) {
      dumpInto(item, result, path);
      result.push(',');
    }
  } else if (isPlainObject(value)) {
    for (const [key, item] of Object.entries(value)) {
      result.push(`[${quoteString(key)}]=`);
      dumpInto(item, result, path);
      result.push(',');
    }
  } else {
    throw new UnsupportedValueError(value.constructor?.name ?? 'object');
  }
  result.push('}');

  path.delete(value);
}

/**
 * Serialize `value` to a table literal string
 */
export function dump(value: unknown): string {
  const result: string[] = [];
  dumpInto(value, result, new Set());
  return result.join('');
}
