import axios from 'axios';
import { IVideoGenerator } from '../../domain/ports/IVideoGenerator';
import { ProductRecord, getProductName } from '../../domain/entities/Product';
import { VideoResult } from '../../domain/entities/Video';
import { UpstreamRequestError } from '../../domain/errors';
import { PollResult, pollUntil } from '../http/RetryUtils';
import { toUpstreamError } from '../http/upstreamError';

interface HeyGenGenerateResponse {
    data?: { video_id?: string } | null;
    error?: unknown;
}

interface HeyGenStatusResponse {
    data?: {
        status?: string;
        video_url?: string | null;
        error?: { message?: string; detail?: string } | string | null;
    } | null;
}

export interface HeyGenVideoGeneratorOptions {
    avatarId?: string;
    voiceId?: string;
    baseUrl?: string;
    pollIntervalMs?: number;
    maxWaitMs?: number;
}

/**
 * Avatar video generation with HeyGen.
 * Submits a talking-avatar job, then polls its status until it completes or fails.
 */
export class HeyGenVideoGenerator implements IVideoGenerator {
    private readonly avatarId: string;
    private readonly voiceId: string;
    private readonly baseUrl: string;
    private readonly pollIntervalMs: number;
    private readonly maxWaitMs: number;

    constructor(private readonly apiKey: string, options: HeyGenVideoGeneratorOptions = {}) {
        if (!apiKey) {
            throw new Error('HeyGen API key is required');
        }
        this.avatarId = options.avatarId ?? 'default_avatar';
        this.voiceId = options.voiceId ?? 'en-US-JennyNeural';
        this.baseUrl = options.baseUrl ?? 'https://api.heygen.com';
        this.pollIntervalMs = options.pollIntervalMs ?? 10000;
        this.maxWaitMs = options.maxWaitMs ?? 600000;
    }

    private get headers() {
        return {
            'X-Api-Key': this.apiKey,
            'Content-Type': 'application/json',
        };
    }

    async createVideo(script: string, product: ProductRecord): Promise<VideoResult> {
        console.log(`[HeyGen] Starting video generation for ${getProductName(product)} (avatar: ${this.avatarId})`);

        const videoId = await this.submit(script);
        console.log(`[HeyGen] Job submitted. Video ID: ${videoId}. Polling for completion...`);

        const videoUrl = await pollUntil(() => this.checkStatus(videoId), {
            intervalMs: this.pollIntervalMs,
            timeoutMs: this.maxWaitMs,
            label: `HeyGen video ${videoId}`,
            onPending: (attempt) => {
                console.log(`[HeyGen] Polling attempt ${attempt}: video ${videoId} still processing`);
            },
        });

        console.log(`[HeyGen] Video completed: ${videoUrl}`);
        return { videoId, videoUrl, status: 'completed' };
    }

    private async submit(script: string): Promise<string> {
        let data: HeyGenGenerateResponse;
        try {
            const response = await axios.post<HeyGenGenerateResponse>(
                `${this.baseUrl}/v2/video/generate`,
                {
                    video_inputs: [
                        {
                            character: {
                                type: 'avatar',
                                avatar_id: this.avatarId,
                                avatar_style: 'normal',
                            },
                            voice: {
                                type: 'text',
                                input_text: script,
                                voice_id: this.voiceId,
                                speed: 1.0,
                            },
                            background: {
                                type: 'color',
                                value: '#FFFFFF',
                            },
                        },
                    ],
                    dimension: { width: 1920, height: 1080 },
                    aspect_ratio: '16:9',
                },
                { headers: this.headers }
            );
            data = response.data;
        } catch (error) {
            throw toUpstreamError('HeyGen', error, 'Video submission');
        }

        const videoId = data.data?.video_id;
        if (!videoId) {
            throw new UpstreamRequestError('HeyGen', 'Video submission returned no video_id', undefined, data);
        }
        return videoId;
    }

    private async checkStatus(videoId: string): Promise<PollResult<string>> {
        let data: HeyGenStatusResponse;
        try {
            const response = await axios.get<HeyGenStatusResponse>(`${this.baseUrl}/v1/video_status.get`, {
                headers: this.headers,
                params: { video_id: videoId },
            });
            data = response.data;
        } catch (error) {
            throw toUpstreamError('HeyGen', error, `Status check for ${videoId}`);
        }

        const status = data.data?.status;
        if (status === 'completed') {
            const videoUrl = data.data?.video_url;
            if (!videoUrl) {
                throw new UpstreamRequestError('HeyGen', `Video ${videoId} completed without a video_url`, undefined, data);
            }
            return { done: true, value: videoUrl };
        }
        if (status === 'failed') {
            throw new UpstreamRequestError('HeyGen', `Video ${videoId} failed: ${describeFailure(data)}`, undefined, data);
        }
        return { done: false };
    }
}

function describeFailure(response: HeyGenStatusResponse): string {
    const error = response.data?.error;
    if (typeof error === 'string' && error) return error;
    if (error && typeof error === 'object') {
        return error.message ?? error.detail ?? 'Unknown error';
    }
    return 'Unknown error';
}
