/**
 * Tests for error types.
 */

import { describe, it, expect } from 'vitest';
import {
  CapabilityUnavailableError,
  ConfigError,
  GraphRagError,
  InvalidInputError,
  StoreUnavailableError,
  errorMessage,
  isCapabilityUnavailable,
  isErrorWithCode,
  isInvalidInput,
  isStoreUnavailable,
  wrapError,
} from '../../src/utils/errors.js';

describe('errors', () => {
  describe('GraphRagError', () => {
    it('has message, code, and name', () => {
      const error = new GraphRagError('Something failed', 'TEST_ERROR');

      expect(error.message).toBe('Something failed');
      expect(error.code).toBe('TEST_ERROR');
      expect(error.name).toBe('GraphRagError');
      expect(error).toBeInstanceOf(Error);
    });

    it('wraps a non-Error cause', () => {
      const error = new GraphRagError('Failed', 'X', 'disk gone');

      expect(error.cause).toBeInstanceOf(Error);
      expect(error.cause?.message).toBe('disk gone');
    });

    it('includes the cause chain in the detailed string', () => {
      const inner = new ConfigError('bad file', 'CONFIG_INVALID');
      const error = new StoreUnavailableError('Document query failed', 'DOCUMENT_QUERY_FAILED', inner);

      expect(error.toDetailedString()).toBe(
        'StoreUnavailableError [DOCUMENT_QUERY_FAILED]: Document query failed\n  Caused by: bad file [CONFIG_INVALID]',
      );
    });
  });

  describe('subclasses', () => {
    it('CapabilityUnavailableError names the capability', () => {
      const error = new CapabilityUnavailableError('knowledge_graph', 'no graph');

      expect(error.code).toBe('CAPABILITY_UNAVAILABLE');
      expect(error.capability).toBe('knowledge_graph');
      expect(error.name).toBe('CapabilityUnavailableError');
    });

    it('InvalidInputError defaults its code and keeps the field', () => {
      const error = new InvalidInputError('limit must be positive', 'limit');

      expect(error.code).toBe('INVALID_INPUT');
      expect(error.field).toBe('limit');
      expect(new InvalidInputError('blank', 'query', 'EMPTY_QUERY').code).toBe('EMPTY_QUERY');
    });

    it('StoreUnavailableError defaults to STORE_UNAVAILABLE', () => {
      expect(new StoreUnavailableError('down').code).toBe('STORE_UNAVAILABLE');
    });
  });

  describe('guards', () => {
    it('match on class and code', () => {
      const error = new InvalidInputError('bad', 'x', 'OUT_OF_RANGE');

      expect(isErrorWithCode(error, 'OUT_OF_RANGE')).toBe(true);
      expect(isErrorWithCode(new Error('OUT_OF_RANGE'), 'OUT_OF_RANGE')).toBe(false);
      expect(isInvalidInput(error)).toBe(true);
      expect(isCapabilityUnavailable(error)).toBe(false);
      expect(isStoreUnavailable(new StoreUnavailableError('down'))).toBe(true);
    });
  });

  describe('wrapError', () => {
    it('passes engine errors through', () => {
      const error = new ConfigError('x', 'CONFIG_INVALID');

      expect(wrapError(error)).toBe(error);
    });

    it('wraps anything else with code UNKNOWN', () => {
      const wrapped = wrapError(new TypeError('boom'), 'Context');

      expect(wrapped.code).toBe('UNKNOWN');
      expect(wrapped.message).toBe('Context');
      expect(wrapped.cause?.message).toBe('boom');
    });
  });

  it('errorMessage reads any thrown value', () => {
    expect(errorMessage(new Error('x'))).toBe('x');
    expect(errorMessage(42)).toBe('42');
  });
});
