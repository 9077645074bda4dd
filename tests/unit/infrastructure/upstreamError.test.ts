import axios from 'axios';
import nock from 'nock';
import { extractVendorMessage, toUpstreamError } from '../../../src/infrastructure/http/upstreamError';
import { SecretNotFoundError, TimeoutError, UpstreamRequestError } from '../../../src/domain/errors';

describe('upstreamError', () => {
    describe('extractVendorMessage', () => {
        it.each([
            ['nested error object', { error: { message: 'Invalid API key' } }, 'Invalid API key'],
            ['error string', { error: 'quota exceeded' }, 'quota exceeded'],
            ['message field', { message: 'Authentication failed' }, 'Authentication failed'],
            ['errors array', { errors: [{ message: 'Duplicate content' }] }, 'Duplicate content'],
            ['plain text', '  Bad Gateway  ', 'Bad Gateway'],
        ])('should read a %s', (_label, data, expected) => {
            expect(extractVendorMessage(data)).toBe(expected);
        });

        it('should return undefined for unknown shapes', () => {
            expect(extractVendorMessage({ status: 'oops' })).toBeUndefined();
            expect(extractVendorMessage('')).toBeUndefined();
            expect(extractVendorMessage(null)).toBeUndefined();
        });
    });

    describe('toUpstreamError', () => {
        afterEach(() => {
            nock.cleanAll();
        });

        it('should keep the HTTP status and vendor message of axios errors', async () => {
            nock('https://vendor.test').post('/v1/things').reply(401, { error: { message: 'Invalid API key' } });

            const error = await axios.post('https://vendor.test/v1/things', {}).then(
                () => new Error('Expected a failure'),
                (caught: unknown) => toUpstreamError('OpenAI', caught, 'Script generation')
            );

            expect(error).toBeInstanceOf(UpstreamRequestError);
            expect(error.message).toBe('OpenAI: Script generation failed (HTTP 401): Invalid API key');
            expect(error).toMatchObject({ vendor: 'OpenAI', statusCode: 401 });
        });

        it('should wrap plain errors', () => {
            const error = toUpstreamError('GoogleSheets', new Error('quota'), 'Reading products');
            expect(error.message).toBe('GoogleSheets: Reading products failed: quota');
        });

        it('should default the action text', () => {
            expect(toUpstreamError('Pinterest', 'boom').message).toBe('Pinterest: request failed: boom');
        });

        it('should pass typed errors through unchanged', () => {
            const timeout = new TimeoutError('HeyGen video v1', 600000);
            const missing = new SecretNotFoundError('heygen_api_key');
            const upstream = new UpstreamRequestError('HeyGen', 'Video v1 failed');

            expect(toUpstreamError('X', timeout)).toBe(timeout);
            expect(toUpstreamError('X', missing)).toBe(missing);
            expect(toUpstreamError('X', upstream)).toBe(upstream);
        });
    });
});
