import axios from 'axios';
import { IPlatformPublisher } from '../../domain/ports/IPlatformPublisher';
import { PublishMetadata, PublishedPost, VideoRef, truncateText } from '../../domain/entities/Publishing';
import { UpstreamRequestError } from '../../domain/errors';
import { toUpstreamError } from '../http/upstreamError';

export const PINTEREST_TITLE_LIMIT = 100;
export const PINTEREST_DESCRIPTION_LIMIT = 500;

export class PinterestPublisher implements IPlatformPublisher {
    readonly platform = 'pinterest' as const;

    constructor(
        private readonly accessToken: string,
        private readonly boardId: string,
        private readonly baseUrl: string = 'https://api.pinterest.com/v5'
    ) {
        if (!accessToken) {
            throw new Error('Pinterest access token is required');
        }
        if (!boardId) {
            throw new Error('Pinterest board id is required');
        }
    }

    async publish(video: VideoRef, metadata: PublishMetadata): Promise<PublishedPost> {
        let pinId: string | undefined;
        try {
            const response = await axios.post<{ id?: string }>(
                `${this.baseUrl}/pins`,
                {
                    title: truncateText(metadata.title, PINTEREST_TITLE_LIMIT),
                    description: truncateText(metadata.description, PINTEREST_DESCRIPTION_LIMIT),
                    board_id: this.boardId,
                    media_source: {
                        source_type: 'video_url',
                        url: video.remoteUrl,
                    },
                },
                {
                    headers: {
                        Authorization: `Bearer ${this.accessToken}`,
                        'Content-Type': 'application/json',
                    },
                    timeout: 30000,
                }
            );
            pinId = response.data.id;
        } catch (error) {
            throw toUpstreamError('Pinterest', error, 'Creating pin');
        }

        if (!pinId) {
            throw new UpstreamRequestError('Pinterest', 'Pin creation returned no id');
        }
        const url = `https://www.pinterest.com/pin/${pinId}`;
        console.log(`[Pinterest] Created pin: ${url}`);
        return { id: pinId, url };
    }
}
