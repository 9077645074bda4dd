import fs from 'fs';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import axios from 'axios';
import { IMediaDownloader } from '../../domain/ports/IMediaDownloader';
import { toUpstreamError } from '../http/upstreamError';

/**
 * Streams remote media to local disk with axios.
 */
export class HttpMediaDownloader implements IMediaDownloader {
    constructor(private readonly timeoutMs: number = 300000) { }

    async download(url: string, outputPath: string): Promise<string> {
        if (!url) {
            throw new Error('Download URL is required');
        }

        await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
        console.log(`[Downloader] Downloading ${url}`);

        try {
            const response = await axios.get<Readable>(url, {
                responseType: 'stream',
                timeout: this.timeoutMs,
            });

            await pipeline(response.data, fs.createWriteStream(outputPath));
        } catch (error) {
            await fs.promises.rm(outputPath, { force: true });
            throw toUpstreamError('Download', error, `Fetching ${url}`);
        }

        const stats = await fs.promises.stat(outputPath);
        console.log(`[Downloader] Saved ${(stats.size / 1024 / 1024).toFixed(1)}MB to ${outputPath}`);
        return outputPath;
    }
}
