import { UnexpectedStructureError } from '../errors.js';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/**
 * One entry of the data source's payload. Keys and value types are whatever the API returned.
 */
export type JsonRecord = { [key: string]: JsonValue };

export type RecordBatch = readonly JsonRecord[];

export type DecodedPayload =
  | { kind: 'array'; items: JsonValue[] }
  | { kind: 'object'; record: JsonRecord }
  | { kind: 'other'; type: string };

export function isJsonRecord(value: JsonValue): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function describeJsonType(value: JsonValue): string {
  if (value === null) {
    return 'null';
  }
  return Array.isArray(value) ? 'array' : typeof value;
}

export function classifyPayload(value: JsonValue): DecodedPayload {
  if (Array.isArray(value)) {
    return { kind: 'array', items: value };
  }
  if (isJsonRecord(value)) {
    return { kind: 'object', record: value };
  }
  return { kind: 'other', type: describeJsonType(value) };
}

/**
 * Accepts a top-level array of objects or a single object, which becomes a batch of one.
 */
export function toRecordBatch(value: JsonValue): RecordBatch {
  const payload = classifyPayload(value);
  switch (payload.kind) {
    case 'array':
      return payload.items.map((item, index) => {
        if (!isJsonRecord(item)) {
          throw new UnexpectedStructureError(`element ${index} is ${describeJsonType(item)}, expected object`);
        }
        return item;
      });
    case 'object':
      return [payload.record];
    case 'other':
      throw new UnexpectedStructureError();
  }
}
