import { DiscoverError, DiscoverErrorCode } from '../shared/errors.js';

function attributeValues(value: unknown): string[] {
  if (Array.isArray(value)) return value.map(item => String(item));
  return [String(value)];
}

function matchLiteral(literal: string, data: Record<string, unknown>, expression: string): boolean {
  const match = literal.match(/^\s*([^:]+?)\s*:\s*(.*?)\s*$/);
  if (!match?.[1]) {
    throw new DiscoverError(DiscoverErrorCode.TREE_QUERY_FAILED, `Invalid filter '${expression}'`, { literal });
  }
  const key = match[1];
  let raw = match[2] ?? '';
  const negative = raw.startsWith('-');
  if (negative) raw = raw.slice(1);
  const wanted = raw.split(',').map(v => v.trim()).filter(v => v.length > 0);

  if (!(key in data) || data[key] === undefined || data[key] === null) return negative;
  const actual = attributeValues(data[key]);
  const hit = wanted.some(v => actual.includes(v));
  return negative ? !hit : hit;
}

// "key: value" literals; '&' binds tighter than '|'; "a, b" lists alternatives
// and a leading '-' negates the literal.
export function matchesFilter(expression: string, data: Record<string, unknown>): boolean {
  return expression
    .split('|')
    .some(clause => clause.split('&').every(literal => matchLiteral(literal, data, expression)));
}
