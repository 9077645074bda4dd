import { ProductRecord } from '../entities/Product';
import { VideoResult } from '../entities/Video';

/**
 * Port for avatar video generation.
 */
export interface IVideoGenerator {
    /**
     * Submits the script and waits until the vendor job leaves the pending state.
     * @throws TimeoutError when the bounded wait is exceeded
     * @throws UpstreamRequestError when generation fails
     */
    createVideo(script: string, product: ProductRecord): Promise<VideoResult>;
}
