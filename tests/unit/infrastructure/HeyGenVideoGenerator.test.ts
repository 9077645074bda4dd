import nock from 'nock';
import { HeyGenVideoGenerator } from '../../../src/infrastructure/video/HeyGenVideoGenerator';
import { TimeoutError, UpstreamRequestError } from '../../../src/domain/errors';

interface GenerateBody {
    video_inputs: Array<{
        character: { avatar_id: string };
        voice: { input_text: string; voice_id: string };
        background: { value: string };
    }>;
    dimension: { width: number; height: number };
    aspect_ratio: string;
}

describe('HeyGenVideoGenerator', () => {
    const API = 'https://api.heygen.com';
    const product = { name: 'Widget' };

    beforeAll(() => {
        nock.disableNetConnect();
    });

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => { });
    });

    afterEach(() => {
        nock.cleanAll();
        jest.restoreAllMocks();
    });

    afterAll(() => {
        nock.enableNetConnect();
    });

    function generator(maxWaitMs = 5000): HeyGenVideoGenerator {
        return new HeyGenVideoGenerator('test-secret', {
            avatarId: 'avatar-1',
            voiceId: 'voice-1',
            pollIntervalMs: 1,
            maxWaitMs,
        });
    }

    it('should submit the script and poll until the video is ready', async () => {
        let body: GenerateBody | undefined;
        nock(API, { reqheaders: { 'x-api-key': 'test-secret' } })
            .post('/v2/video/generate', (captured: GenerateBody) => {
                body = captured;
                return true;
            })
            .reply(200, { error: null, data: { video_id: 'vid-1' } });
        nock(API)
            .get('/v1/video_status.get').query({ video_id: 'vid-1' })
            .reply(200, { data: { status: 'processing' } })
            .get('/v1/video_status.get').query({ video_id: 'vid-1' })
            .reply(200, { data: { status: 'completed', video_url: 'https://cdn.test/vid-1.mp4' } });

        await expect(generator().createVideo('Meet the Widget.', product)).resolves.toEqual({
            videoId: 'vid-1',
            videoUrl: 'https://cdn.test/vid-1.mp4',
            status: 'completed',
        });

        expect(body?.video_inputs[0].character.avatar_id).toBe('avatar-1');
        expect(body?.video_inputs[0].voice).toMatchObject({ input_text: 'Meet the Widget.', voice_id: 'voice-1' });
        expect(body?.video_inputs[0].background.value).toBe('#FFFFFF');
        expect(body?.dimension).toEqual({ width: 1920, height: 1080 });
        expect(body?.aspect_ratio).toBe('16:9');
    });

    it('should surface a failed render with the vendor message', async () => {
        nock(API).post('/v2/video/generate').reply(200, { data: { video_id: 'vid-2' } });
        nock(API)
            .get('/v1/video_status.get').query({ video_id: 'vid-2' })
            .reply(200, { data: { status: 'failed', error: { message: 'Avatar not found' } } });

        await expect(generator().createVideo('Script', product))
            .rejects.toThrow('HeyGen: Video vid-2 failed: Avatar not found');
    });

    it('should time out when the video never finishes', async () => {
        nock(API).post('/v2/video/generate').reply(200, { data: { video_id: 'vid-3' } });
        nock(API)
            .persist()
            .get('/v1/video_status.get').query({ video_id: 'vid-3' })
            .reply(200, { data: { status: 'processing' } });

        await expect(generator(30).createVideo('Script', product)).rejects.toThrow(TimeoutError);
    });

    it('should reject a submission without a video id', async () => {
        nock(API).post('/v2/video/generate').reply(200, { error: { message: 'avatar_id invalid' }, data: null });

        await expect(generator().createVideo('Script', product))
            .rejects.toThrow('HeyGen: Video submission returned no video_id');
    });

    it('should wrap HTTP failures', async () => {
        nock(API).post('/v2/video/generate').reply(401, { message: 'Unauthorized' });

        const failure = generator().createVideo('Script', product);
        await expect(failure).rejects.toThrow(UpstreamRequestError);
        await expect(failure).rejects.toThrow('HeyGen: Video submission failed (HTTP 401): Unauthorized');
    });

    it('should require an API key', () => {
        expect(() => new HeyGenVideoGenerator('')).toThrow('HeyGen API key is required');
    });
});
