/**
 * Tests for error classification utilities
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { parse, YAMLParseError } from 'yaml';
import {
  StrategosError,
  NotFoundError,
  ValidationError,
  DependencyError,
  CycleError,
  ConfigurationError,
  PreconditionError,
  classifyError,
  createErrorResponse,
  ErrorCode,
  HttpStatus,
} from './errors.js';

describe('errors', () => {
  describe('StrategosError', () => {
    it('should create error with code and message', () => {
      const error = new StrategosError('Test error', ErrorCode.INTERNAL_ERROR);

      expect(error.message).toBe('Test error');
      expect(error.code).toBe(ErrorCode.INTERNAL_ERROR);
      expect(error.name).toBe('StrategosError');
      expect(error.isRetryable).toBe(false);
    });

    it('should set default HTTP status based on code', () => {
      expect(
        new StrategosError('', ErrorCode.VALIDATION_ERROR).httpStatus
      ).toBe(HttpStatus.UNPROCESSABLE_ENTITY);

      expect(
        new StrategosError('', ErrorCode.NOT_FOUND).httpStatus
      ).toBe(HttpStatus.NOT_FOUND);

      expect(
        new StrategosError('', ErrorCode.PRECONDITION_FAILED).httpStatus
      ).toBe(HttpStatus.PRECONDITION_FAILED);

      expect(
        new StrategosError('', ErrorCode.CONFIGURATION_ERROR).httpStatus
      ).toBe(HttpStatus.INTERNAL_SERVER_ERROR);
    });

    it('should allow custom HTTP status', () => {
      const error = new StrategosError('Test', ErrorCode.INTERNAL_ERROR, {
        httpStatus: 418,
      });
      expect(error.httpStatus).toBe(418);
    });

    it('should serialize details only when present', () => {
      const bare = new StrategosError('Bare', ErrorCode.INTERNAL_ERROR).toJSON();
      expect(bare).not.toHaveProperty('details');

      const detailed = new StrategosError('Detailed', ErrorCode.INTERNAL_ERROR, {
        details: { key: 'value' },
      }).toJSON();
      expect(detailed['details']).toEqual({ key: 'value' });
    });
  });

  describe('specialized errors', () => {
    it('should name the missing resource', () => {
      const error = new NotFoundError('Template', 'web_app');
      expect(error.message).toBe('Template not found: web_app');
      expect(error.details).toEqual({ resourceType: 'Template', resourceId: 'web_app' });
    });

    it('should list missing dependency ids', () => {
      const error = new DependencyError('phase', 'frontend', ['ghost', 'phantom']);
      expect(error.message).toBe("Invalid dependency references in phase 'frontend': ghost, phantom");
      expect(error.code).toBe(ErrorCode.VALIDATION_ERROR);
      expect(error.missingIds).toEqual(['ghost', 'phantom']);
    });

    it('should render the cycle path', () => {
      const error = new CycleError('task', ['a', 'b', 'a']);
      expect(error.message).toBe('Circular task dependency: a -> b -> a');
      expect(error.details).toEqual({ kind: 'task', cycle: ['a', 'b', 'a'] });
    });

    it('should report precondition failures as 412', () => {
      const error = new PreconditionError('task_graph', ['decomposition']);
      expect(error.message).toBe("Stage 'task_graph' requires: decomposition");
      expect(error.httpStatus).toBe(HttpStatus.PRECONDITION_FAILED);
    });

    it('should keep the cause on configuration errors', () => {
      const cause = new Error('ENOENT');
      const error = new ConfigurationError('Missing registry', { file: 'profiles.yaml' }, cause);
      expect(error.cause).toBe(cause);
      expect(error.code).toBe(ErrorCode.CONFIGURATION_ERROR);
    });
  });

  describe('classifyError', () => {
    it('should return StrategosError unchanged', () => {
      const original = new CycleError('phase', ['x', 'x']);
      expect(classifyError(original)).toBe(original);
    });

    it('should convert ZodError to ValidationError', () => {
      const result = z.object({ name: z.string() }).safeParse({ name: 42 });
      expect(result.success).toBe(false);
      if (result.success) return;

      const classified = classifyError(result.error);
      expect(classified).toBeInstanceOf(ValidationError);
      expect(classified.details).toEqual({
        errors: [{ path: 'name', message: 'Expected string, received number' }],
      });
    });

    it('should convert YAML parse errors to configuration errors', () => {
      let thrown: unknown;
      try {
        parse('key: [unclosed');
      } catch (error) {
        thrown = error;
      }
      expect(thrown).toBeInstanceOf(YAMLParseError);
      expect(classifyError(thrown)).toBeInstanceOf(ConfigurationError);
    });

    it('should classify plain errors by message', () => {
      expect(classifyError(new Error('Template not found')).code).toBe(ErrorCode.NOT_FOUND);
      expect(classifyError(new Error('domain is required')).code).toBe(ErrorCode.VALIDATION_ERROR);
      expect(classifyError(new Error('boom')).code).toBe(ErrorCode.INTERNAL_ERROR);
    });

    it('should wrap non-Error values', () => {
      const classified = classifyError('string failure');
      expect(classified.message).toBe('An unexpected error occurred');
      expect(classified.details).toEqual({ originalError: 'string failure' });
    });
  });

  describe('createErrorResponse', () => {
    it('should include request id when provided', () => {
      const response = createErrorResponse(new Error('boom'), 'req-abc');
      expect(response['error']).toBe(true);
      expect(response['code']).toBe(ErrorCode.INTERNAL_ERROR);
      expect(response['requestId']).toBe('req-abc');
    });

    it('should omit request id when absent', () => {
      expect(createErrorResponse(new Error('boom'))).not.toHaveProperty('requestId');
    });
  });
});
