import axios from 'axios';
import { IPlatformPublisher } from '../../domain/ports/IPlatformPublisher';
import { PublishMetadata, PublishedPost, VideoRef, truncateText } from '../../domain/entities/Publishing';
import { UpstreamRequestError } from '../../domain/errors';
import { PollResult, pollUntil } from '../http/RetryUtils';
import { toUpstreamError } from '../http/upstreamError';

export const INSTAGRAM_CAPTION_LIMIT = 2200;

interface GraphIdResponse {
    id?: string;
}

interface ContainerStatusResponse {
    status_code?: string;
    status?: string;
}

export interface InstagramPublisherOptions {
    baseUrl?: string;
    pollIntervalMs?: number;
    maxWaitMs?: number;
}

/**
 * Publishes Reels through the Instagram Graph API.
 * Instagram fetches the video from its remote URL, so the container is polled until ready.
 */
export class InstagramPublisher implements IPlatformPublisher {
    readonly platform = 'instagram' as const;
    private readonly baseUrl: string;
    private readonly pollIntervalMs: number;
    private readonly maxWaitMs: number;

    constructor(
        private readonly accessToken: string,
        private readonly accountId: string,
        options: InstagramPublisherOptions = {}
    ) {
        if (!accessToken) {
            throw new Error('Instagram access token is required');
        }
        if (!accountId) {
            throw new Error('Instagram account id is required');
        }
        this.baseUrl = options.baseUrl ?? 'https://graph.facebook.com/v18.0';
        this.pollIntervalMs = options.pollIntervalMs ?? 5000;
        this.maxWaitMs = options.maxWaitMs ?? 300000;
    }

    async publish(video: VideoRef, metadata: PublishMetadata): Promise<PublishedPost> {
        try {
            const containerId = await this.createContainer(video.remoteUrl, metadata.caption);
            console.log(`[Instagram] Container ${containerId} created, waiting for processing...`);

            await pollUntil(() => this.checkContainer(containerId), {
                intervalMs: this.pollIntervalMs,
                timeoutMs: this.maxWaitMs,
                label: `Instagram container ${containerId}`,
            });

            const mediaId = await this.publishContainer(containerId);
            console.log(`[Instagram] Published media ${mediaId}`);
            return { id: mediaId };
        } catch (error) {
            throw toUpstreamError('Instagram', error, 'Publishing reel');
        }
    }

    private async createContainer(videoUrl: string, caption: string): Promise<string> {
        const response = await axios.post<GraphIdResponse>(`${this.baseUrl}/${this.accountId}/media`, null, {
            params: {
                media_type: 'REELS',
                video_url: videoUrl,
                caption: truncateText(caption, INSTAGRAM_CAPTION_LIMIT),
                access_token: this.accessToken,
            },
        });
        if (!response.data.id) {
            throw new UpstreamRequestError('Instagram', 'Container creation returned no id', undefined, response.data);
        }
        return response.data.id;
    }

    private async checkContainer(containerId: string): Promise<PollResult<string>> {
        const response = await axios.get<ContainerStatusResponse>(`${this.baseUrl}/${containerId}`, {
            params: {
                fields: 'status_code,status',
                access_token: this.accessToken,
            },
        });

        const statusCode = response.data.status_code;
        if (statusCode === 'FINISHED') {
            return { done: true, value: statusCode };
        }
        if (statusCode === 'ERROR' || statusCode === 'EXPIRED') {
            throw new UpstreamRequestError(
                'Instagram',
                `Container ${containerId} ${statusCode}: ${response.data.status ?? 'no details'}`,
                undefined,
                response.data
            );
        }
        return { done: false };
    }

    private async publishContainer(containerId: string): Promise<string> {
        const response = await axios.post<GraphIdResponse>(`${this.baseUrl}/${this.accountId}/media_publish`, null, {
            params: {
                creation_id: containerId,
                access_token: this.accessToken,
            },
        });
        if (!response.data.id) {
            throw new UpstreamRequestError('Instagram', 'Publish returned no media id', undefined, response.data);
        }
        return response.data.id;
    }
}
