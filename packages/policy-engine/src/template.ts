/**
 * Message template rendering
 *
 * Placeholders:
 *   {{path}}      matched path
 *   {{value}}     value at the matched path
 *   {{rule}}      rule id
 *   {{@name}}     sibling of the matched path (`env[0].key` -> `env[0].name`)
 *   {{a.b[0].c}}  any absolute fact path
 *
 * Values that are not present render as MISSING_VALUE_PLACEHOLDER.
 */

import { MISSING_VALUE_PLACEHOLDER } from './constants';
import { FactModel, formatFactValue } from './facts';
import { FactValue, MatchLocation } from './types';

const PLACEHOLDER = /\{\{\s*([^{}]+?)\s*\}\}/g;
const LIST_ELEMENT = /^(.*)\[(\d+)\]$/;

export function renderMessage(
  template: string,
  facts: FactModel,
  location: MatchLocation,
  ruleId: string
): string {
  return template.replace(PLACEHOLDER, (_match, token: string) => {
    if (token === 'path') {
      return location.path;
    }
    if (token === 'rule') {
      return ruleId;
    }
    if (token === 'value') {
      return display(lookupFact(facts, location.path));
    }
    if (token.startsWith('@')) {
      return display(lookupFact(facts, siblingPath(location.path, token.slice(1))));
    }
    return display(lookupFact(facts, token));
  });
}

/**
 * Read a fact, also resolving `list[i]` into an element of a scalar list
 */
export function lookupFact(facts: FactModel, path: string): FactValue | undefined {
  const direct = facts.get(path);
  if (direct !== undefined) {
    return direct;
  }
  const element = LIST_ELEMENT.exec(path);
  if (!element) {
    return undefined;
  }
  const list = facts.get(element[1]);
  return Array.isArray(list) ? list[Number(element[2])] : undefined;
}

export function siblingPath(path: string, name: string): string {
  const parent = parentPath(path);
  return parent ? `${parent}.${name}` : name;
}

function parentPath(path: string): string {
  const dot = path.lastIndexOf('.');
  const bracket = path.lastIndexOf('[');
  const cut = Math.max(dot, bracket);
  return cut > 0 ? path.slice(0, cut) : '';
}

function display(value: FactValue | undefined): string {
  return value === undefined ? MISSING_VALUE_PLACEHOLDER : formatFactValue(value);
}
