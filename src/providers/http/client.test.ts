/**
 * HTTP Client 测试
 */

import { describe, it, expect, vi } from 'vitest';
import { HTTPClient } from './client';
import {
    BackendAbortedError,
    BackendAuthError,
    BackendPermanentError,
    BackendRateLimitError,
    BackendTransientError,
} from '../types';

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
    return new Response(JSON.stringify(body), {
        status: 200,
        headers: { 'Content-Type': 'application/json' },
        ...init,
    });
}

describe('HTTPClient', () => {
    describe('constructor', () => {
        it('should not apply a default timeout', () => {
            expect(new HTTPClient().defaultTimeoutMs).toBeUndefined();
        });

        it('should ignore invalid timeouts', () => {
            expect(new HTTPClient({ defaultTimeoutMs: -1 }).defaultTimeoutMs).toBeUndefined();
            expect(new HTTPClient({ defaultTimeoutMs: 5000 }).defaultTimeoutMs).toBe(5000);
        });
    });

    describe('fetch', () => {
        it('should return successful responses', async () => {
            const fetchImpl = vi.fn(async () => jsonResponse({ result: 'success' }));
            const client = new HTTPClient({ fetchImpl });

            const response = await client.fetch('https://api.example.com/test', { method: 'POST' });

            expect(await response.json()).toEqual({ result: 'success' });
            expect(fetchImpl).toHaveBeenCalledTimes(1);
        });

        it('should map 401 to an auth error', async () => {
            const client = new HTTPClient({
                fetchImpl: async () =>
                    jsonResponse({ error: { message: 'Invalid API key' } }, { status: 401, statusText: 'Unauthorized' }),
            });

            const error = await client.fetch('https://api.example.com/test').catch((err: unknown) => err);

            expect(error).toBeInstanceOf(BackendAuthError);
            expect(error).toMatchObject({
                message: '401 Unauthorized - Invalid API key',
                classification: 'auth',
                retryable: false,
            });
        });

        it('should read retry-after on rate limits', async () => {
            const client = new HTTPClient({
                fetchImpl: async () =>
                    new Response('slow down', { status: 429, statusText: 'Too Many Requests', headers: { 'retry-after': '2' } }),
            });

            const error = await client.fetch('https://api.example.com/test').catch((err: unknown) => err);

            expect(error).toBeInstanceOf(BackendRateLimitError);
            expect(error).toMatchObject({ retryAfter: 2000, retryable: true });
        });

        it('should classify 503 as transient', async () => {
            const client = new HTTPClient({
                fetchImpl: async () => new Response('', { status: 503, statusText: 'Service Unavailable' }),
            });

            await expect(client.fetch('https://api.example.com/test')).rejects.toMatchObject({
                classification: 'transient',
                code: 'SERVER_503',
                statusCode: 503,
            });
        });

        it('should classify 400 as permanent', async () => {
            const client = new HTTPClient({
                fetchImpl: async () => new Response('bad', { status: 400, statusText: 'Bad Request' }),
            });

            await expect(client.fetch('https://api.example.com/test')).rejects.toBeInstanceOf(BackendPermanentError);
        });

        it('should not retry failed requests', async () => {
            const fetchImpl = vi.fn(async () => new Response('', { status: 500, statusText: 'Internal Server Error' }));
            const client = new HTTPClient({ fetchImpl });

            await expect(client.fetch('https://api.example.com/test')).rejects.toBeInstanceOf(BackendTransientError);
            expect(fetchImpl).toHaveBeenCalledTimes(1);
        });

        it('should wrap network failures', async () => {
            const client = new HTTPClient({
                fetchImpl: async () => {
                    throw new TypeError('fetch failed');
                },
            });

            await expect(client.fetch('https://api.example.com/test')).rejects.toMatchObject({
                code: 'NETWORK_ERROR',
                message: 'Network request failed: fetch failed',
            });
        });

        it('should report cancellation by the caller', async () => {
            const controller = new AbortController();
            controller.abort();
            const client = new HTTPClient({
                fetchImpl: async () => {
                    throw new Error('aborted');
                },
            });

            const error = await client
                .fetch('https://api.example.com/test', { signal: controller.signal })
                .catch((err: unknown) => err);

            expect(error).toBeInstanceOf(BackendAbortedError);
        });

        it('should report timeouts raised through the signal as transient', async () => {
            const controller = new AbortController();
            controller.abort(new Error('Request timeout'));
            const client = new HTTPClient({
                fetchImpl: async () => {
                    throw new Error('aborted');
                },
            });

            await expect(client.fetch('https://api.example.com/test', { signal: controller.signal })).rejects.toMatchObject({
                code: 'TIMEOUT',
                classification: 'transient',
            });
        });
    });
});
