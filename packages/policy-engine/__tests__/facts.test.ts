/**
 * Tests for the Fact Model builder
 */

import { buildFactModel, FactModel, formatFactValue } from '../src/facts';
import { CyclicInputError, MalformedInputError } from '../src/errors';

describe('Fact Model', () => {
  describe('buildFactModel', () => {
    test('flattens nested objects and lists into dotted paths', () => {
      const facts = buildFactModel({
        from: [{ base_image: 'python:3.12', stage: 'build' }],
        env: [{ key: 'APP_ENV', value: 'production' }],
        user: 'app',
        ports: [80, 443],
        labels: { maintainer: 'platform-team' },
      });

      expect(facts.entries()).toEqual([
        ['from[0].base_image', 'python:3.12'],
        ['from[0].stage', 'build'],
        ['env[0].key', 'APP_ENV'],
        ['env[0].value', 'production'],
        ['user', 'app'],
        ['ports', [80, 443]],
        ['labels.maintainer', 'platform-team'],
      ]);
    });

    test('takes pre-flattened keys literally', () => {
      const flat = buildFactModel({ 'from[0].base_image': 'python:latest' });
      const nested = buildFactModel({ from: [{ base_image: 'python:latest' }] });

      expect(flat.toJSON()).toEqual({ 'from[0].base_image': 'python:latest' });
      expect(flat.toJSON()).toEqual(nested.toJSON());
    });

    test('omits null values and renders dates as ISO-8601', () => {
      const facts = buildFactModel({
        healthcheck: null,
        built: new Date('2024-06-01T12:00:00Z'),
      });

      expect(facts.has('healthcheck')).toBe(false);
      expect(facts.get('built')).toBe('2024-06-01T12:00:00.000Z');
      expect(facts.size).toBe(1);
    });

    test('accepts an empty document', () => {
      expect(buildFactModel({}).size).toBe(0);
    });

    test('rejects a root that is not an object', () => {
      expect(() => buildFactModel([1, 2])).toThrow(MalformedInputError);
      expect(() => buildFactModel('user: app')).toThrow("Malformed input at '(root)': document root must be an object");
    });

    test('rejects a path given both flattened and nested', () => {
      expect(() => buildFactModel({ 'a.b': 1, a: { b: 'x' } })).toThrow(
        "Malformed input at 'a.b': path defined more than once (number and string)"
      );
    });

    test('rejects a value whose path is also a parent', () => {
      expect(() => buildFactModel({ env: ['A'], 'env[0].key': 'A' })).toThrow(
        "Malformed input at 'env': list value conflicts with nested entry 'env[0].key'"
      );
    });

    test('rejects lists mixing scalars and objects', () => {
      expect(() => buildFactModel({ tags: ['a', { b: 1 }] })).toThrow(
        "Malformed input at 'tags': list mixes scalar and structured elements"
      );
    });

    test('rejects non-finite numbers', () => {
      expect(() => buildFactModel({ limits: { cpu: Infinity } })).toThrow(
        "Malformed input at 'limits.cpu': non-finite number Infinity"
      );
    });

    test('enforces the maximum nesting depth', () => {
      expect(buildFactModel({ a: { b: 1 } }, { maxDepth: 2 }).get('a.b')).toBe(1);

      let caught: unknown;
      try {
        buildFactModel({ a: { b: { c: 1 } } }, { maxDepth: 2 });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(MalformedInputError);
      expect(caught).not.toBeInstanceOf(CyclicInputError);
      if (caught instanceof MalformedInputError) {
        expect(caught.path).toBe('a.b');
        expect(caught.message).toBe("Malformed input at 'a.b': nesting exceeds maximum depth of 2");
      }
    });

    test('detects an object that contains itself', () => {
      const doc: Record<string, unknown> = { name: 'loop' };
      doc.self = doc;

      let caught: unknown;
      try {
        buildFactModel(doc);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(CyclicInputError);
      if (caught instanceof CyclicInputError) {
        expect(caught.path).toBe('self');
        expect(caught.code).toBe('CYCLIC_INPUT');
      }
    });

    test('detects a list that contains itself', () => {
      const list: unknown[] = [];
      list.push(list);

      expect(() => buildFactModel({ items: list })).toThrow(
        "Malformed input at 'items[0]': cycle detected in source document"
      );
    });

    test('allows the same object under two different parents', () => {
      const shared = { key: 'APP_ENV' };
      const facts = buildFactModel({ env: [shared, shared] });

      expect(facts.get('env[0].key')).toBe('APP_ENV');
      expect(facts.get('env[1].key')).toBe('APP_ENV');
    });
  });

  describe('FactModel', () => {
    const facts = FactModel.fromEntries([
      ['env[0].key', 'A'],
      ['env[1].key', 'B'],
      ['env[10].key', 'C'],
      ['ports', [80, 443]],
    ]);

    test('lists element indices in numeric order', () => {
      expect(facts.elementIndices('env')).toEqual([0, 1, 10]);
      expect(facts.elementIndices('from')).toEqual([]);
    });

    test('hasPrefix only matches whole path segments', () => {
      expect(facts.hasPrefix('env')).toBe(true);
      expect(facts.hasPrefix('env[1]')).toBe(true);
      expect(facts.hasPrefix('en')).toBe(false);
      expect(facts.hasPrefix('ports')).toBe(true);
    });

    test('rejects duplicate paths', () => {
      expect(() =>
        FactModel.fromEntries([
          ['user', 'app'],
          ['user', true],
        ])
      ).toThrow("Malformed input at 'user': path defined more than once (string and boolean)");
    });

    test('rejects empty paths', () => {
      expect(() => FactModel.fromEntries([['', 'x']])).toThrow("Malformed input at '(root)': empty path");
    });

    test('is immutable', () => {
      const ports = facts.get('ports');

      expect(Object.isFrozen(facts)).toBe(true);
      expect(Array.isArray(ports) && Object.isFrozen(ports)).toBe(true);
    });

    test('copies list values on construction', () => {
      const source = ['a', 'b'];
      const model = FactModel.fromEntries([['tags', source]]);
      source.push('c');

      expect(model.get('tags')).toEqual(['a', 'b']);
    });
  });

  describe('formatFactValue', () => {
    test('joins list values', () => {
      expect(formatFactValue([80, 443])).toBe('80, 443');
      expect(formatFactValue(false)).toBe('false');
    });
  });
});
