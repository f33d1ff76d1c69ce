import { describe, it, expect } from 'vitest';
import { toToolError, toolError, toolSuccess } from '../tool-output';
import { BackendRateLimitError, InvalidParameterError, ModelNotFoundError } from '../../providers';
import { StorageError } from '../../memory';

describe('toToolError', () => {
    it('should convert model lookup failures', () => {
        expect(toToolError(new ModelNotFoundError('gpt-4'))).toEqual({
            status: 'error',
            content: "Model 'gpt-4' is not available",
            contentType: 'text',
            metadata: { errorType: 'model_not_found', modelName: 'gpt-4' },
        });
    });

    it('should convert parameter failures', () => {
        const output = toToolError(new InvalidParameterError('bad temperature', 'temperature', { temperature: 'fixed at 1' }));

        expect(output.metadata).toEqual({
            errorType: 'invalid_parameter',
            parameter: 'temperature',
            validationErrors: { temperature: 'fixed at 1' },
        });
    });

    it('should carry backend classification', () => {
        const output = toToolError(new BackendRateLimitError('429 Too Many Requests', 1000));

        expect(output.content).toBe('429 Too Many Requests');
        expect(output.metadata).toEqual({
            errorType: 'backend',
            classification: 'rate_limit',
            retryable: true,
            statusCode: 429,
            retryAfter: 1000,
            code: 'RATE_LIMIT',
        });
    });

    it('should convert storage failures', () => {
        const output = toToolError(new StorageError('disk full', 'set', 'thread:1'));

        expect(output.metadata).toEqual({ errorType: 'storage', operation: 'set', key: 'thread:1' });
    });

    it('should rethrow unknown errors', () => {
        const error = new TypeError('boom');
        expect(() => toToolError(error)).toThrow(error);
    });
});

describe('tool output helpers', () => {
    it('should build success and error payloads', () => {
        expect(toolSuccess('# Done')).toEqual({ status: 'success', content: '# Done', contentType: 'markdown', metadata: {} });
        expect(toolError('failed', { a: 1 })).toEqual({ status: 'error', content: 'failed', contentType: 'text', metadata: { a: 1 } });
    });
});
