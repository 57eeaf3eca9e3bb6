/**
 * @fileoverview Tests for the labelbook error hierarchy
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  IOError,
  LabelbookError,
  ValidationError,
  describeValue,
  getErrorMessage,
  isLabelbookError,
  toError,
} from '../errors.js';

describe('ValidationError', () => {
  it('formats field, expectation and received value', () => {
    const error = new ValidationError('confidence', 'an integer between 1 and 5', '7');

    expect(error.message).toBe('Validation failed for confidence: expected an integer between 1 and 5, got 7');
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.retryable).toBe(false);
    expect(error.name).toBe('ValidationError');
    expect(error).toBeInstanceOf(LabelbookError);
  });

  it('serializes details', () => {
    const json = new ValidationError('criteria', 'at least one criterion', 'an empty list').toJSON();

    expect(json.code).toBe('VALIDATION_ERROR');
    expect(json.details).toEqual({
      field: 'criteria',
      expected: 'at least one criterion',
      received: 'an empty list',
    });
  });

  it('renders code and message in toString', () => {
    const error = new ValidationError('id', 'a non-empty string', '""');
    expect(error.toString()).toBe('[VALIDATION_ERROR] Validation failed for id: expected a non-empty string, got ""');
  });
});

describe('IOError', () => {
  it('includes the cause message', () => {
    const cause = new Error('EACCES: permission denied');
    const error = new IOError('write', '/tmp/report.json', cause);

    expect(error.message).toBe('Could not write /tmp/report.json: EACCES: permission denied');
    expect(error.code).toBe('IO_ERROR');
    expect(error.toJSON().details).toEqual({
      operation: 'write',
      path: '/tmp/report.json',
      cause: 'EACCES: permission denied',
    });
  });

  it('omits the cause suffix when there is none', () => {
    expect(new IOError('read', 'report.json').message).toBe('Could not read report.json');
  });
});

describe('ConfigurationError', () => {
  it('names the offending key', () => {
    const error = new ConfigurationError('output.jsonIndent', 'Expected number, received string');
    expect(error.message).toBe('Configuration error for output.jsonIndent: Expected number, received string');
    expect(error.toJSON().details).toEqual({ configKey: 'output.jsonIndent' });
  });
});

describe('helpers', () => {
  it('recognizes labelbook errors only', () => {
    expect(isLabelbookError(new IOError('read', 'x'))).toBe(true);
    expect(isLabelbookError(new Error('plain'))).toBe(false);
    expect(isLabelbookError('string')).toBe(false);
  });

  it('extracts messages from anything thrown', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('text')).toBe('text');
    expect(getErrorMessage(42)).toBe('Unknown error');
  });

  it('wraps non-errors', () => {
    const wrapped = toError('nope');
    expect(wrapped).toBeInstanceOf(Error);
    expect(wrapped.message).toBe('nope');
  });

  it('describes received values', () => {
    expect(describeValue(undefined)).toBe('undefined');
    expect(describeValue(null)).toBe('null');
    expect(describeValue('cat')).toBe('"cat"');
    expect(describeValue(3.5)).toBe('3.5');
    expect(describeValue([1, 2])).toBe('array(2)');
    expect(describeValue({})).toBe('object');
  });
});
