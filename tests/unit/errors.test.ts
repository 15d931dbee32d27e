import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  DimensionMismatchError,
  FilterParseError,
  FilterValidationError,
  SchemaValidationError,
  VectorStoreError,
} from '../../src/errors.js';

describe('FilterParseError', () => {
  it('describes the unexpected token and the expected set', () => {
    const err = new FilterParseError(4, ['==', '!='], 'x');
    expect(err.message).toBe("Unexpected 'x' at offset 4; expected ==, !=");
    expect(err.position).toBe(4);
    expect(err.expected).toEqual(['==', '!=']);
    expect(err.found).toBe('x');
  });

  it('describes end of input', () => {
    expect(new FilterParseError(0, ['identifier'], '').message).toBe(
      'Unexpected end of input at offset 0; expected identifier',
    );
  });

  it('is instanceof FilterParseError and Error', () => {
    const err = new FilterParseError(0, [], '');
    expect(err).toBeInstanceOf(FilterParseError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('FilterParseError');
  });
});

describe('DimensionMismatchError', () => {
  it('has a default message', () => {
    const err = new DimensionMismatchError(3, 5);
    expect(err.message).toBe('Embedding dimension mismatch: expected 3, got 5');
    expect(err.expected).toBe(3);
    expect(err.actual).toBe(5);
    expect(err.name).toBe('DimensionMismatchError');
  });
});

describe('ConfigurationError', () => {
  it('appends issues to the message', () => {
    const err = new ConfigurationError('Bad config', ['a: required', 'b: too small']);
    expect(err.message).toBe('Bad config: a: required; b: too small');
    expect(err.issues).toEqual(['a: required', 'b: too small']);
  });

  it('keeps the message when there are no issues', () => {
    expect(new ConfigurationError('Missing').message).toBe('Missing');
  });
});

describe('other errors', () => {
  it('SchemaValidationError carries the identifier', () => {
    const err = new SchemaValidationError('public.docs', 'missing');
    expect(err.identifier).toBe('public.docs');
    expect(err).toBeInstanceOf(SchemaValidationError);
    expect(err.name).toBe('SchemaValidationError');
  });

  it('VectorStoreError carries an optional cause', () => {
    const cause = new Error('driver');
    const err = new VectorStoreError('failed', cause);
    expect(err.cause).toBe(cause);
    expect(err).toBeInstanceOf(VectorStoreError);
    expect(err.name).toBe('VectorStoreError');
  });

  it('FilterValidationError is an Error', () => {
    const err = new FilterValidationError('bad');
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('FilterValidationError');
  });
});
