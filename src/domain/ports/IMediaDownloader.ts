/**
 * Port for fetching a remote media file onto local disk.
 */
export interface IMediaDownloader {
    /**
     * Downloads `url` to `outputPath` and resolves with the written path.
     */
    download(url: string, outputPath: string): Promise<string>;
}
