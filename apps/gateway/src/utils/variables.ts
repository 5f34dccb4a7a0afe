import { Document } from '@taskgate/sdk';

// Typed-value format of the engine's REST API.
export type VariableType = 'Boolean' | 'Integer' | 'Long' | 'Double' | 'String' | 'Json' | 'Null';

export interface TypedValue {
  value: unknown;
  type: VariableType;
}

export type VariableMap = Record<string, TypedValue>;

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

export function inferType(value: unknown): TypedValue {
  if (value === null || value === undefined) return { value: null, type: 'Null' };
  if (typeof value === 'boolean') return { value, type: 'Boolean' };
  if (typeof value === 'number') {
    if (!Number.isInteger(value)) return { value, type: 'Double' };
    return { value, type: value >= INT32_MIN && value <= INT32_MAX ? 'Integer' : 'Long' };
  }
  if (typeof value === 'string') return { value, type: 'String' };
  return { value: JSON.stringify(value), type: 'Json' };
}

export function toVariables(doc: Document, prefix: string = ''): VariableMap {
  const variables: VariableMap = {};
  for (const [key, value] of Object.entries(doc)) {
    if (value === undefined) continue;
    variables[`${prefix}${key}`] = inferType(value);
  }
  return variables;
}

/** Plain values of an engine variable map; Json values are parsed back. */
export function fromVariables(variables: VariableMap): Document {
  const doc: Document = {};
  for (const [key, typed] of Object.entries(variables)) {
    doc[key] = typed.type === 'Json' && typeof typed.value === 'string' ? parseJson(typed.value) : typed.value;
  }
  return doc;
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}
