import { clamp } from './geometry';

export interface Photo {
    id: string;
    filePath?: string;
    /** Capture time; drives the canonical processing order. */
    timestamp: Date;
    width?: number;
    height?: number;
    /** Externally computed overall quality, when the caller has one. */
    overallScore?: number;
}

/** A caller-supplied burst of near-duplicate photos. */
export interface PhotoCluster {
    id: string;
    photos: Photo[];
}

export interface PhotoCandidate {
    photo: Photo;
    suitabilityScore: number;
    aestheticScore: number;
    technicalQuality: number;
}

export function makePhotoCandidate(photo: Photo, suitability: number, aesthetic: number, technical: number): PhotoCandidate {
    return {
        photo,
        suitabilityScore: clamp(suitability),
        aestheticScore: clamp(aesthetic),
        technicalQuality: clamp(technical)
    };
}

export function candidateOverallScore(candidate: PhotoCandidate): number {
    return candidate.suitabilityScore * 0.4 + candidate.aestheticScore * 0.3 + candidate.technicalQuality * 0.3;
}

/**
 * Canonical order: capture time, then photo id.
 */
export function comparePhotos(a: Photo, b: Photo): number {
    const dt = a.timestamp.getTime() - b.timestamp.getTime();
    if (dt !== 0) return dt;
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export function sortPhotosCanonically(photos: readonly Photo[]): Photo[] {
    return [...photos].sort(comparePhotos);
}
