import type { Rect } from '../models/geometry';
import type { Photo } from '../models/photo';

/** A decoded, orientation-corrected photo. */
export interface LoadedImage {
    photoId: string;
    width: number;
    height: number;
    /** Encoded image bytes after auto-orientation. */
    data: Buffer;
}

export interface FaceRegion {
    image: LoadedImage;
    boundingBox: Rect;
}

export interface IImageLoader {
    /** Throws ImageLoadError ('not_found' | 'io_error'). */
    load(photo: Photo): Promise<LoadedImage>;
}

export interface IEdgeFilter {
    /** Edge response of a face region in [0,1], or null when the filter cannot run. */
    edgeResponse(region: FaceRegion): Promise<number | null>;
}
