import fs from 'fs';
import { google } from 'googleapis';
import { IPlatformPublisher } from '../../domain/ports/IPlatformPublisher';
import { PublishMetadata, PublishedPost, VideoRef, truncateText } from '../../domain/entities/Publishing';
import { UpstreamRequestError } from '../../domain/errors';
import { toUpstreamError } from '../http/upstreamError';
import { AuthorizedUserCredentials } from '../google/credentials';

export const YOUTUBE_TITLE_LIMIT = 100;
export const YOUTUBE_DESCRIPTION_LIMIT = 5000;
export const YOUTUBE_TAGS_CHAR_LIMIT = 500;
/** People & Blogs */
const YOUTUBE_CATEGORY_ID = '22';

export interface YouTubeUploadRequest {
    filePath: string;
    title: string;
    description: string;
    tags: string[];
    categoryId: string;
}

/**
 * Uploads a file and resolves with the new video id.
 */
export type YouTubeUploader = (request: YouTubeUploadRequest) => Promise<string | null | undefined>;

/**
 * Publishes the downloaded video to YouTube as a public upload.
 */
export class YouTubePublisher implements IPlatformPublisher {
    readonly platform = 'youtube' as const;

    constructor(private readonly upload: YouTubeUploader) { }

    async publish(video: VideoRef, metadata: PublishMetadata): Promise<PublishedPost> {
        const request: YouTubeUploadRequest = {
            filePath: video.localPath,
            title: truncateText(metadata.title, YOUTUBE_TITLE_LIMIT),
            description: truncateText(metadata.description, YOUTUBE_DESCRIPTION_LIMIT),
            tags: limitTags(metadata.tags, YOUTUBE_TAGS_CHAR_LIMIT),
            categoryId: YOUTUBE_CATEGORY_ID,
        };

        console.log(`[YouTube] Uploading "${request.title}"`);
        let videoId: string | null | undefined;
        try {
            videoId = await this.upload(request);
        } catch (error) {
            throw toUpstreamError('YouTube', error, 'Upload');
        }
        if (!videoId) {
            throw new UpstreamRequestError('YouTube', 'Upload returned no video id');
        }

        const url = `https://www.youtube.com/watch?v=${videoId}`;
        console.log(`[YouTube] Uploaded: ${url}`);
        return { id: videoId, url };
    }
}

/**
 * Keeps tags in order while their combined length (with separators) stays within `maxChars`.
 */
export function limitTags(tags: string[], maxChars: number): string[] {
    const kept: string[] = [];
    let used = 0;
    for (const tag of tags) {
        const cost = tag.length + (kept.length > 0 ? 1 : 0);
        if (used + cost > maxChars) break;
        kept.push(tag);
        used += cost;
    }
    return kept;
}

/**
 * Builds an uploader on the YouTube Data API v3 with authorized-user credentials.
 */
export function createYouTubeUploader(credentials: AuthorizedUserCredentials): YouTubeUploader {
    const oauth2 = new google.auth.OAuth2(credentials.client_id, credentials.client_secret);
    oauth2.setCredentials({ refresh_token: credentials.refresh_token });
    const youtube = google.youtube({ version: 'v3', auth: oauth2 });

    return async (request) => {
        const response = await youtube.videos.insert({
            part: ['snippet', 'status'],
            requestBody: {
                snippet: {
                    title: request.title,
                    description: request.description,
                    tags: request.tags,
                    categoryId: request.categoryId,
                },
                status: {
                    privacyStatus: 'public',
                    selfDeclaredMadeForKids: false,
                },
            },
            media: { body: fs.createReadStream(request.filePath) },
        });
        return response.data.id;
    };
}
