import neo4j from 'neo4j-driver';

const LUCENE_SPECIAL_CHARACTERS = /[+\-&|!(){}[\]^"~*?:\\/]/g;
const LUCENE_OPERATORS = /\b(AND|OR|NOT)\b/g;
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Escapes Lucene syntax so user text is matched literally by fulltext indexes. */
export function escapeLucene(query: string): string {
  return query
    .replace(LUCENE_SPECIAL_CHARACTERS, '\\$&')
    .replace(LUCENE_OPERATORS, (operator) => operator.toLowerCase())
    .replace(/\s+/g, ' ')
    .trim();
}

export function isPlainIdentifier(name: string): boolean {
  return IDENTIFIER_PATTERN.test(name);
}

export function toNumber(value: unknown, fallback = 0): number {
  if (neo4j.isInt(value)) return value.toNumber();
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  return fallback;
}

export function toStringValue(value: unknown, fallback = ''): string {
  return typeof value === 'string' ? value : fallback;
}

export function toOptionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function toStringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

export function toOptionalDate(value: unknown): Date | undefined {
  if (value instanceof Date) return value;
  if (neo4j.isDateTime(value) || neo4j.isLocalDateTime(value) || neo4j.isDate(value)) {
    return value.toStandardDate();
  }
  if (typeof value === 'string' || typeof value === 'number') {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? undefined : parsed;
  }
  return undefined;
}

export function toDate(value: unknown, fallback: Date = new Date(0)): Date {
  return toOptionalDate(value) ?? fallback;
}

/** Converts driver values (integers, temporals, nested lists) into plain JavaScript values. */
export function toPlainValue(value: unknown): unknown {
  if (neo4j.isInt(value)) return value.toNumber();
  if (neo4j.isDateTime(value) || neo4j.isLocalDateTime(value) || neo4j.isDate(value)) {
    return value.toStandardDate();
  }
  if (Array.isArray(value)) return value.map(toPlainValue);
  return value;
}

export function toPlainProperties(
  value: unknown,
  omit: ReadonlySet<string> = new Set(),
): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return {};
  const properties: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) {
    if (omit.has(key) || key.endsWith('_embedding')) continue;
    properties[key] = toPlainValue(item);
  }
  return properties;
}
