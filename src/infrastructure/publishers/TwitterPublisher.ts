import fs from 'fs';
import axios from 'axios';
import FormData from 'form-data';
import { IPlatformPublisher } from '../../domain/ports/IPlatformPublisher';
import { PublishMetadata, PublishedPost, VideoRef, truncateText } from '../../domain/entities/Publishing';
import { UpstreamRequestError } from '../../domain/errors';
import { PollResult, pollUntil } from '../http/RetryUtils';
import { toUpstreamError } from '../http/upstreamError';

export const TWEET_TEXT_LIMIT = 280;
const CHUNK_SIZE_BYTES = 4 * 1024 * 1024;

interface ProcessingInfo {
    state?: 'pending' | 'in_progress' | 'succeeded' | 'failed';
    check_after_secs?: number;
    error?: { message?: string };
}

interface MediaUploadResponse {
    data?: {
        id?: string;
        processing_info?: ProcessingInfo;
    };
    media_id_string?: string;
    processing_info?: ProcessingInfo;
}

interface CreateTweetResponse {
    data?: { id?: string };
}

export interface TwitterPublisherOptions {
    baseUrl?: string;
    pollIntervalMs?: number;
    maxWaitMs?: number;
}

/**
 * Posts the video to X with an OAuth 2 user access token.
 * The file is sent with the chunked media upload (INIT, APPEND, FINALIZE), then STATUS is
 * polled until processing succeeds before the post is created.
 */
export class TwitterPublisher implements IPlatformPublisher {
    readonly platform = 'twitter' as const;
    private readonly baseUrl: string;
    private readonly pollIntervalMs: number;
    private readonly maxWaitMs: number;

    constructor(private readonly accessToken: string, options: TwitterPublisherOptions = {}) {
        if (!accessToken) {
            throw new Error('Twitter access token is required');
        }
        this.baseUrl = options.baseUrl ?? 'https://api.x.com';
        this.pollIntervalMs = options.pollIntervalMs ?? 5000;
        this.maxWaitMs = options.maxWaitMs ?? 120000;
    }

    private get authHeader() {
        return { Authorization: `Bearer ${this.accessToken}` };
    }

    async publish(video: VideoRef, metadata: PublishMetadata): Promise<PublishedPost> {
        try {
            const mediaId = await this.uploadMedia(video.localPath);
            const tweetId = await this.createTweet(truncateText(metadata.caption, TWEET_TEXT_LIMIT), mediaId);
            const url = `https://x.com/i/web/status/${tweetId}`;
            console.log(`[Twitter] Posted: ${url}`);
            return { id: tweetId, url };
        } catch (error) {
            throw toUpstreamError('Twitter', error, 'Posting video');
        }
    }

    private async uploadMedia(filePath: string): Promise<string> {
        const { size } = await fs.promises.stat(filePath);
        const mediaId = await this.initUpload(size);
        console.log(`[Twitter] Uploading ${(size / 1024 / 1024).toFixed(1)}MB as media ${mediaId}`);

        const handle = await fs.promises.open(filePath, 'r');
        try {
            let segmentIndex = 0;
            for (let offset = 0; offset < size; offset += CHUNK_SIZE_BYTES) {
                const length = Math.min(CHUNK_SIZE_BYTES, size - offset);
                const chunk = Buffer.alloc(length);
                const { bytesRead } = await handle.read(chunk, 0, length, offset);
                if (bytesRead !== length) {
                    throw new Error(`Short read at byte ${offset}: got ${bytesRead} of ${length}`);
                }
                await this.appendChunk(mediaId, segmentIndex, chunk);
                segmentIndex++;
            }
        } finally {
            await handle.close();
        }

        const processing = await this.finalizeUpload(mediaId);
        if (processing?.state && processing.state !== 'succeeded') {
            await this.waitForProcessing(mediaId);
        }
        return mediaId;
    }

    private async initUpload(totalBytes: number): Promise<string> {
        const form = new FormData();
        form.append('command', 'INIT');
        form.append('media_type', 'video/mp4');
        form.append('total_bytes', String(totalBytes));
        form.append('media_category', 'tweet_video');

        const data = await this.postForm(form);
        const mediaId = data.data?.id ?? data.media_id_string;
        if (!mediaId) {
            throw new UpstreamRequestError('Twitter', 'Media INIT returned no media id', undefined, data);
        }
        return mediaId;
    }

    private async appendChunk(mediaId: string, segmentIndex: number, chunk: Buffer): Promise<void> {
        const form = new FormData();
        form.append('command', 'APPEND');
        form.append('media_id', mediaId);
        form.append('segment_index', String(segmentIndex));
        form.append('media', chunk, { filename: 'video.mp4', contentType: 'application/octet-stream' });
        await this.postForm(form);
    }

    private async finalizeUpload(mediaId: string): Promise<ProcessingInfo | undefined> {
        const form = new FormData();
        form.append('command', 'FINALIZE');
        form.append('media_id', mediaId);

        const data = await this.postForm(form);
        return data.data?.processing_info ?? data.processing_info;
    }

    private async waitForProcessing(mediaId: string): Promise<void> {
        await pollUntil(() => this.checkProcessing(mediaId), {
            intervalMs: this.pollIntervalMs,
            timeoutMs: this.maxWaitMs,
            label: `Twitter media processing ${mediaId}`,
        });
    }

    private async checkProcessing(mediaId: string): Promise<PollResult<true>> {
        const response = await axios.get<MediaUploadResponse>(`${this.baseUrl}/2/media/upload`, {
            headers: this.authHeader,
            params: { command: 'STATUS', media_id: mediaId },
        });
        const info = response.data.data?.processing_info ?? response.data.processing_info;

        if (!info || info.state === 'succeeded') {
            return { done: true, value: true };
        }
        if (info.state === 'failed') {
            throw new UpstreamRequestError(
                'Twitter',
                `Media processing failed: ${info.error?.message ?? 'no details'}`,
                undefined,
                response.data
            );
        }
        return { done: false };
    }

    private async createTweet(text: string, mediaId: string): Promise<string> {
        const response = await axios.post<CreateTweetResponse>(
            `${this.baseUrl}/2/tweets`,
            { text, media: { media_ids: [mediaId] } },
            { headers: { ...this.authHeader, 'Content-Type': 'application/json' } }
        );
        const tweetId = response.data.data?.id;
        if (!tweetId) {
            throw new UpstreamRequestError('Twitter', 'Post creation returned no id', undefined, response.data);
        }
        return tweetId;
    }

    private async postForm(form: FormData): Promise<MediaUploadResponse> {
        const response = await axios.post<MediaUploadResponse>(`${this.baseUrl}/2/media/upload`, form, {
            headers: { ...this.authHeader, ...form.getHeaders() },
            maxBodyLength: Infinity,
        });
        return response.data ?? {};
    }
}
