import { describe, it, expect } from 'vitest';

import { storageErrorKind } from '@/storage/errors.js';
import { ObjectPath } from '@/storage/object-path.js';

function kindOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return storageErrorKind(error);
  }
  return undefined;
}

describe('ObjectPath', () => {
  describe('parse()', () => {
    it('should split on "/" and record both flags', () => {
      const path = ObjectPath.parse('/photos/2024/');

      expect(path.parts).toEqual(['photos', '2024']);
      expect(path.isAbsolute).toBe(true);
      expect(path.isDirPrefix).toBe(true);
      expect(path.toString()).toBe('/photos/2024/');
    });

    it('should drop empty segments', () => {
      expect(ObjectPath.parse('a//b///c').parts).toEqual(['a', 'b', 'c']);
    });

    it('should never treat the root as a directory prefix', () => {
      expect(ObjectPath.parse('').isDirPrefix).toBe(false);
      expect(ObjectPath.parse('/').isDirPrefix).toBe(false);
      expect(ObjectPath.parse('/').isEmpty()).toBe(true);
    });

    it.each(['C:', 'c:\\data', 'D:/data', '\\\\server\\share'])(
      'should reject the platform prefix in %s',
      (text) => {
        expect(kindOf(() => ObjectPath.parse(text))).toBe('InvalidPath');
      }
    );

    it('should accept a colon that is not a drive prefix', () => {
      expect(ObjectPath.parse('a:b/c').parts).toEqual(['a:b', 'c']);
    });
  });

  describe('segment operations', () => {
    it('should clear the directory flag on push', () => {
      expect(ObjectPath.parse('a/').push('b').toString()).toBe('a/b');
    });

    it('should reject invalid segments', () => {
      expect(kindOf(() => ObjectPath.empty().push(''))).toBe('InvalidPath');
      expect(kindOf(() => ObjectPath.fromParts(['a/b']))).toBe('InvalidPath');
    });

    it('should pop down to the root', () => {
      expect(ObjectPath.parse('a/b/').pop().toString()).toBe('a');
      expect(ObjectPath.parse('a').pop().isEmpty()).toBe(true);
      expect(ObjectPath.empty().pop().isEmpty()).toBe(true);
    });

    it('should return the parent as a directory prefix', () => {
      expect(ObjectPath.parse('a/b/c').parent().toString()).toBe('a/b/');
    });

    it('should shift off the first segment and unshift it back', () => {
      const [head, rest] = ObjectPath.parse('/bucket/x/y/').shift();

      expect(head).toBe('bucket');
      expect(rest.toString()).toBe('x/y/');
      expect(rest.unshift('bucket').toString()).toBe('bucket/x/y/');
    });

    it('should shift nothing off the root', () => {
      const [head, rest] = ObjectPath.empty().shift();

      expect(head).toBeUndefined();
      expect(rest.isEmpty()).toBe(true);
    });

    it('should take the directory flag from the joined path', () => {
      expect(ObjectPath.parse('a/b').join(ObjectPath.parse('c/')).toString()).toBe('a/b/c/');
      expect(ObjectPath.parse('a/b/').join(ObjectPath.parse('c')).toString()).toBe('a/b/c');
      expect(ObjectPath.parse('a/').join(ObjectPath.empty()).toString()).toBe('a/');
    });

    it('should expose the last segment as name', () => {
      expect(ObjectPath.parse('a/b.txt').name).toBe('b.txt');
      expect(ObjectPath.empty().name).toBe('');
    });
  });

  describe('equals()', () => {
    it('should ignore the absolute flag', () => {
      expect(ObjectPath.parse('/a/b').equals(ObjectPath.parse('a/b'))).toBe(true);
    });

    it('should compare the directory flag', () => {
      expect(ObjectPath.parse('a/b/').equals(ObjectPath.parse('a/b'))).toBe(false);
    });
  });

  describe('startsWith()', () => {
    const cases: Array<[string, string, boolean]> = [
      ['a/bc/d', 'a/b', true],
      ['a/b', 'a/b', true],
      ['a/bc/d', 'a/b/', false],
      ['a/b/d', 'a/b/', true],
      ['a/b', 'a/b/', false],
      ['a/b/', 'a/b/', true],
      ['x', '', true],
      ['a', 'a/b', false],
      ['b/a', 'a', false],
    ];

    it.each(cases)('"%s" starts with "%s": %s', (path, prefix, expected) => {
      expect(ObjectPath.parse(path).startsWith(ObjectPath.parse(prefix))).toBe(expected);
    });
  });

  it('should serialize to its string form', () => {
    expect(JSON.stringify({ path: ObjectPath.parse('a/b/') })).toBe('{"path":"a/b/"}');
  });

  it('should accept either form in from()', () => {
    const path = ObjectPath.parse('a/b');

    expect(ObjectPath.from(path)).toBe(path);
    expect(ObjectPath.from('a/b').equals(path)).toBe(true);
  });
});
