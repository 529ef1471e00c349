/**
 * Field descriptor and cell tests
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { FieldTypeError, MandatoryFieldError } from '../errors.js';
import { Field, FieldCell, describeValue, field } from '../field.js';

describe('Field', () => {
  it('should reject a default that does not match the dtype', () => {
    expect(() => new Field('number', { default: 'a' })).toThrow(FieldTypeError);
    expect(() => new Field('number', { default: 'a' })).toThrow(
      'The default value of Field "" is not of type "number": "a".'
    );
  });

  it('should reject values that are not dtypes', () => {
    const notADType = JSON.parse('42');

    expect(() => new Field(notADType)).toThrow(
      'The dtype of Field "" is neither a type, nor a list of types, but "42".'
    );
    expect(() => new Field([])).toThrow(FieldTypeError);
  });

  it('should drop the default of a mandatory field', () => {
    const count = field('number', { default: 1, mandatory: true });

    expect(count.default).toBeUndefined();
    expect(count.optional).toBe(false);
  });

  it('should accept every kind of callable for function dtypes', () => {
    const callback = field('function');
    const holder = {
      method() {
        return 1;
      },
    };
    function named(): number {
      return 1;
    }

    expect(callback.accepts(() => 1)).toBe(true);
    expect(callback.accepts(async () => 1)).toBe(true);
    expect(callback.accepts(function* () {})).toBe(true);
    expect(callback.accepts(async function* () {})).toBe(true);
    expect(callback.accepts(named.bind(null))).toBe(true);
    expect(callback.accepts(holder.method)).toBe(true);
    expect(callback.accepts('() => 1')).toBe(false);
    expect(field(Function).accepts(async () => 1)).toBe(true);
  });

  it('should accept alternatives given as a list', () => {
    const mixed = field(['string', Number]);

    expect(mixed.accepts('a')).toBe(true);
    expect(mixed.accepts(1)).toBe(true);
    expect(mixed.accepts(true)).toBe(false);
    expect(mixed.description).toBe('(string, Number)');
  });

  it('should check zod schemas and classes', () => {
    const positive = field(z.number().min(0));
    const when = field(Date);

    expect(positive.accepts(1)).toBe(true);
    expect(positive.accepts(-1)).toBe(false);
    expect(positive.description).toBe('schema');
    expect(when.accepts(new Date(0))).toBe(true);
    expect(when.accepts('2024-01-01')).toBe(false);
    expect(field(Array).accepts([])).toBe(true);
    expect(field('object').accepts(null)).toBe(false);
  });

  it('should re-validate a new field default', () => {
    const size = field('number', { default: 1 });
    size.default = 5;

    expect(size.default).toBe(5);
    expect(() => {
      size.default = 'large';
    }).toThrow(FieldTypeError);
    expect(size.default).toBe(5);

    size.default = undefined;
    expect(size.optional).toBe(false);
  });

  it('should resolve values through value, instance default and field default', () => {
    const size = field('number', { default: 1 });
    const instance = {};

    expect(size.getValue(instance)).toBe(1);
    size.setDefault(instance, 2);
    expect(size.getValue(instance)).toBe(2);
    size.setValue(instance, 3);
    expect(size.getValue(instance)).toBe(3);
    size.deleteValue(instance);
    expect(size.getValue(instance)).toBe(2);
    size.deleteDefault(instance);
    expect(size.getValue(instance)).toBe(1);
  });

  it('should leave the value unchanged when an assignment fails', () => {
    const size = field('number', { default: 1 });
    const instance = {};
    size.setValue(instance, 3);

    expect(() => size.setValue(instance, 'x')).toThrow(
      'The value of Field "" is not of type "number": "x".'
    );
    expect(size.getValue(instance)).toBe(3);
  });

  it('should raise a mandatory field error when nothing is set', () => {
    const title = field('string');
    title.bindName('title');

    expect(() => title.getValue({})).toThrow(MandatoryFieldError);
    expect(() => title.getValue({})).toThrow('Field "title" is mandatory, yet it has been accessed without being set.');
    expect(() => title.getValue({})).not.toThrow(FieldTypeError);
  });

  it('should create cells lazily', () => {
    const size = field('number', { default: 1 });
    const instance = {};

    expect(size.hasCell(instance)).toBe(false);
    size.getValue(instance);
    expect(size.hasCell(instance)).toBe(true);
  });
});

describe('FieldCell', () => {
  it('should expose the field default as fallback', () => {
    const cell = new FieldCell(field('number', { default: 1 }));

    expect(cell.fallback).toBe(1);
    expect(cell.default).toBe(1);
    expect(cell.optional).toBe(true);
    expect(cell.isSet).toBe(false);

    cell.default = 4;
    expect(cell.default).toBe(4);
    expect(cell.fallback).toBe(1);
  });

  it('should clear a level when set to undefined', () => {
    const cell = new FieldCell(field('number', { default: 1 }), 3, 2);

    expect(cell.value).toBe(3);
    cell.value = undefined;
    expect(cell.value).toBe(2);
    cell.default = undefined;
    expect(cell.value).toBe(1);
  });

  it('should clone into an independent cell', () => {
    const cell = new FieldCell(field('number', { default: 1 }), 3);
    const copy = cell.clone();
    copy.value = 7;

    expect(cell.value).toBe(3);
    expect(copy.value).toBe(7);
    expect(copy.field).toBe(cell.field);
  });

  it('should validate values passed on construction', () => {
    expect(() => new FieldCell(field('number'), 'x')).toThrow(FieldTypeError);
  });
});

describe('describeValue', () => {
  it('should describe values for error messages', () => {
    expect(describeValue('a')).toBe('"a"');
    expect(describeValue(null)).toBe('null');
    expect(describeValue(new Date(0))).toBe('Date instance');
    expect(describeValue({})).toBe('object');
    expect(describeValue(function named() {})).toBe('function named');
  });
});
