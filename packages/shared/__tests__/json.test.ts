import { describe, it, expect } from 'vitest';
import {
  isJsonObject,
  parseJsonObject,
  readBoolean,
  readJson,
  readNodes,
  readString,
} from '../src/utils/json.js';

describe('permissive JSON accessors', () => {
  const node = {
    name: 'Sales',
    count: 3,
    flag: 'True',
    nested: { a: 1 },
    items: [{ id: 'a' }, null, 'text', { id: 'b' }],
    empty: [],
  };

  it('should read scalars and default to null when missing or mistyped', () => {
    expect(readString(node, 'name')).toBe('Sales');
    expect(readString(node, 'count')).toBe('3');
    expect(readString(node, 'missing')).toBeNull();
    expect(readString(node, 'nested')).toBeNull();
    expect(readString(null, 'name')).toBeNull();

    expect(readBoolean(node, 'flag')).toBe(true);
    expect(readBoolean(node, 'name')).toBeNull();
  });

  it('should return only object entries of a collection', () => {
    expect(readNodes(node, 'items')).toEqual([{ id: 'a' }, { id: 'b' }]);
    expect(readNodes(node, 'missing')).toEqual([]);
    expect(readNodes(node, 'empty')).toEqual([]);
    expect(readNodes(node, 'name')).toEqual([]);
  });

  it('should serialize nested values for flat cells', () => {
    expect(readJson(node, 'nested')).toBe('{"a":1}');
    expect(readJson(node, 'name')).toBe('Sales');
    expect(readJson(node, 'missing')).toBeNull();
  });

  it('should parse only JSON objects', () => {
    expect(parseJsonObject('{"workspaces":[]}')).toEqual({ workspaces: [] });
    expect(parseJsonObject('[1,2]')).toBeNull();
    expect(parseJsonObject('not json')).toBeNull();
    expect(isJsonObject([])).toBe(false);
  });
});
