import type { DetectedFace, FaceLandmarks } from '../models/face';
import type { Photo } from '../models/photo';
import type { LoadedImage } from './IImageLoader';

export interface IFaceDetector {
    /** Throws DetectionError on a non-recoverable failure for the photo. */
    detect(image: LoadedImage, photo: Photo): Promise<DetectedFace[]>;
}

/**
 * Optional landmark source for detectors that do not emit landmarks.
 * Returning null is an expected outcome.
 */
export interface ILandmarkProvider {
    getLandmarks(image: LoadedImage, face: DetectedFace): Promise<FaceLandmarks | null>;
}
