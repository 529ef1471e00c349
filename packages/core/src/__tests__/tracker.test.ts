/**
 * Declaration registry tests
 */

import { describe, it, expect } from 'vitest';
import { Field, field } from '../field.js';
import { declareFields, registryOf } from '../tracker.js';

describe('registryOf', () => {
  it('should list declarations in registration order', () => {
    class Settings {}
    declareFields(Settings, {
      first: field('number', { default: 1 }),
      second: field('string', { default: 'b' }),
    });

    expect(registryOf(Settings).names()).toEqual(['first', 'second']);
  });

  it('should copy the parent registry and keep positions of re-declared names', () => {
    class Parent {}
    declareFields(Parent, {
      a: field('number', { default: 1 }),
      b: field('string', { default: 'x' }),
    });
    class Child extends Parent {}
    const override = field('number', { default: 2 });
    declareFields(Child, {
      c: field('boolean', { default: true }),
      a: override,
    });

    const registry = registryOf(Child);
    expect(registry.names()).toEqual(['a', 'b', 'c']);
    expect(registry.get('a')).toBe(override);
    expect(registryOf(Parent).names()).toEqual(['a', 'b']);
  });

  it('should take static properties before declared entries and skip dunder names', () => {
    class Statics {
      static x = field('number', { default: 3 });
      static label = 'hello';
      static __hidden__ = 1;
      declare x: number;
      declare y: string;
    }
    declareFields(Statics, { y: field('string', { default: 'why' }) });

    const registry = registryOf(Statics);
    expect(registry.names()).toEqual(['x', 'label', 'y']);
    expect([...registry.collect(Field).keys()]).toEqual(['x', 'y']);
    expect(registry.get('label')).toBe('hello');

    const instance = new Statics();
    expect(instance.x).toBe(3);
    expect(instance.y).toBe('why');
  });

  it('should bind field names on registration', () => {
    class Named {}
    const size = field('number', { default: 0 });
    declareFields(Named, { size });

    expect(size.name).toBe('size');
    expect(size.label).toBe('Field "size"');
  });

  it('should memoize the registry per class', () => {
    class Memo {}
    declareFields(Memo, { a: field('number', { default: 1 }) });

    expect(registryOf(Memo)).toBe(registryOf(Memo));
  });

  it('should reject unknown names', () => {
    class Empty {}

    expect(() => registryOf(Empty).get('missing')).toThrow('Declaration "missing" does not exist.');
    expect(registryOf(Empty).has('missing')).toBe(false);
  });

  it('should reject declarations after the registry is built', () => {
    class Late {}
    registryOf(Late);

    expect(() => declareFields(Late, { a: field('number', { default: 1 }) })).toThrow(
      'Declarations of "Late" must be registered before the class is first used.'
    );
  });
});

describe('field accessors', () => {
  it('should read and write values through the declared field', () => {
    class Point {
      declare x: number;
    }
    declareFields(Point, { x: field('number', { default: 0 }) });

    const a = new Point();
    const b = new Point();
    a.x = 4;

    expect(a.x).toBe(4);
    expect(b.x).toBe(0);
  });
});
