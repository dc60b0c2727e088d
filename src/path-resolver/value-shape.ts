import { Key } from '../types';
import { getDataType } from '../util/type-utils';
import { Outcome, success, lookupFailure, shapeMismatch } from './outcome';
import { RangeSelector, describeSegment } from './segments';

export type PlainRecord = Record<PropertyKey, unknown>;

export interface AssociativeShape {
  kind: 'associative';
  source:
    | { type: 'map'; map: ReadonlyMap<unknown, unknown> }
    | { type: 'record'; record: PlainRecord };
}

export interface OrderedShape {
  kind: 'ordered';
  items: readonly unknown[];
}

export interface ScalarShape {
  kind: 'scalar';
  value: unknown;
}

/**
 * The three capabilities a value can have
 */
export type ValueShape = AssociativeShape | OrderedShape | ScalarShape;

/**
 * Only plain objects are associative; dates, class instances and the like are scalars.
 */
export function isPlainRecord(value: unknown): value is PlainRecord {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Classify a value once. Strings are scalars even though they are indexable.
 */
export function inspectValue(value: unknown): ValueShape {
  if (typeof value === 'string') {
    return { kind: 'scalar', value };
  }
  if (Array.isArray(value)) {
    return { kind: 'ordered', items: value };
  }
  if (value instanceof Map) {
    return { kind: 'associative', source: { type: 'map', map: value } };
  }
  if (isPlainRecord(value)) {
    return { kind: 'associative', source: { type: 'record', record: value } };
  }
  return { kind: 'scalar', value };
}

/**
 * Values of an associative collection, in the collection's own order. Symbol
 * keys come last, after string keys.
 */
export function associativeValues(shape: AssociativeShape): unknown[] {
  if (shape.source.type === 'map') {
    return Array.from(shape.source.map.values());
  }
  const { record } = shape.source;
  return Reflect.ownKeys(record)
    .filter((key) => Object.prototype.propertyIsEnumerable.call(record, key))
    .map((key) => record[key]);
}

/**
 * The values a wildcard descends into, or undefined when the value is a scalar
 */
export function childrenOf(shape: ValueShape): unknown[] | undefined {
  switch (shape.kind) {
    case 'associative':
      return associativeValues(shape);
    case 'ordered':
      return [...shape.items];
    case 'scalar':
      return undefined;
  }
}

/**
 * Single key or index access, failing the way a native lookup would
 */
export function lookupKey(shape: ValueShape, key: Key): Outcome {
  switch (shape.kind) {
    case 'associative': {
      const { source } = shape;
      if (source.type === 'map') {
        return source.map.has(key)
          ? success(source.map.get(key))
          : lookupFailure(`No entry for key ${describeSegment(key)}`, key);
      }
      if (
        (typeof key === 'string' || typeof key === 'number' || typeof key === 'symbol') &&
        Object.prototype.hasOwnProperty.call(source.record, key)
      ) {
        return success(source.record[key]);
      }
      return lookupFailure(`No entry for key ${describeSegment(key)}`, key);
    }
    case 'ordered': {
      if (typeof key !== 'number' || !Number.isInteger(key)) {
        return shapeMismatch(`Sequence index must be an integer, got ${describeSegment(key)}`, key);
      }
      const { items } = shape;
      const index = key < 0 ? key + items.length : key;
      if (index < 0 || index >= items.length) {
        return lookupFailure(
          `Index ${key} is out of range for a sequence of length ${items.length}`,
          key,
        );
      }
      return success(items[index]);
    }
    case 'scalar':
      return shapeMismatch(
        `Cannot look up key ${describeSegment(key)} in a value of type ${getDataType(shape.value)}`,
        key,
      );
  }
}

/**
 * The sub-collection a range selects. Select-all on an associative value gives its values.
 */
export function selectRange(shape: ValueShape, selector: RangeSelector): Outcome<unknown[]> {
  switch (shape.kind) {
    case 'associative':
      if (!selector.selectsAll) {
        return shapeMismatch(
          `Only a select-all range applies to a ${shape.source.type}, got ${selector}`,
          selector,
        );
      }
      return success(associativeValues(shape));
    case 'ordered': {
      const { items } = shape;
      return success(selector.indices(items.length).map((index) => items[index]));
    }
    case 'scalar':
      return shapeMismatch(
        `Cannot apply range ${selector} to a value of type ${getDataType(shape.value)}`,
        selector,
      );
  }
}
