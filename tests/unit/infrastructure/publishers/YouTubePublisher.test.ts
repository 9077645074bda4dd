import { YouTubePublisher, YouTubeUploadRequest, limitTags } from '../../../../src/infrastructure/publishers/YouTubePublisher';
import { UpstreamRequestError } from '../../../../src/domain/errors';

describe('YouTubePublisher', () => {
    const video = { videoId: 'vid-1', remoteUrl: 'https://cdn.test/vid-1.mp4', localPath: '/tmp/video_0_1.mp4' };

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => { });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should upload the local file with truncated metadata', async () => {
        const upload = jest.fn<Promise<string>, [YouTubeUploadRequest]>().mockResolvedValue('yt-1');
        const publisher = new YouTubePublisher(upload);

        const post = await publisher.publish(video, {
            title: 'T'.repeat(150),
            description: 'D'.repeat(6000),
            caption: 'ignored',
            tags: ['tools', 'home'],
        });

        expect(post).toEqual({ id: 'yt-1', url: 'https://www.youtube.com/watch?v=yt-1' });
        expect(upload).toHaveBeenCalledWith({
            filePath: '/tmp/video_0_1.mp4',
            title: 'T'.repeat(100),
            description: 'D'.repeat(5000),
            tags: ['tools', 'home'],
            categoryId: '22',
        });
    });

    it('should wrap upload failures', async () => {
        const publisher = new YouTubePublisher(() => Promise.reject(new Error('quotaExceeded')));

        const failure = publisher.publish(video, { title: 'W', description: '', caption: '', tags: [] });
        await expect(failure).rejects.toThrow(UpstreamRequestError);
        await expect(failure).rejects.toThrow('YouTube: Upload failed: quotaExceeded');
    });

    it('should reject an upload without a video id', async () => {
        const publisher = new YouTubePublisher(() => Promise.resolve(null));

        await expect(publisher.publish(video, { title: 'W', description: '', caption: '', tags: [] }))
            .rejects.toThrow('YouTube: Upload returned no video id');
    });

    describe('limitTags', () => {
        it('should keep tags while the joined length fits', () => {
            expect(limitTags(['abc', 'de'], 6)).toEqual(['abc', 'de']);
            expect(limitTags(['abc', 'de'], 5)).toEqual(['abc']);
        });

        it('should stop at the first tag that does not fit', () => {
            expect(limitTags(['a'.repeat(10), 'b', 'c'], 5)).toEqual([]);
        });

        it('should cap many short tags at 500 characters', () => {
            const tags = Array.from({ length: 200 }, (_, i) => `tag${String(i).padStart(3, '0')}`);
            const kept = limitTags(tags, 500);
            // each tag is 6 characters plus a separator
            expect(kept).toHaveLength(71);
            expect(kept.join(',').length).toBeLessThanOrEqual(500);
        });
    });
});
