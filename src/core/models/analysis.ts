import type { FaceIssue, FaceQualityRecord } from './face';
import type { Photo, PhotoCandidate } from './photo';

/** Descriptor returned by the embedding collaborator. */
export interface FaceEmbedding {
    vector: number[];
    /** Generator confidence in [0,1]. */
    confidence: number;
}

/** A scored face plus its descriptor, when one could be generated. */
export interface FaceObservation {
    record: FaceQualityRecord;
    embedding: FaceEmbedding | null;
}

/** Per-photo result held by the photo store of the cache. */
export interface PhotoFaceAnalysis {
    photoId: string;
    imageWidth: number;
    imageHeight: number;
    faces: FaceObservation[];
    analyzedAt: Date;
}

export interface PersonIdentity {
    /** Valid only within one cluster analysis. */
    id: string;
    faces: FaceQualityRecord[];
}

export type MatchTier = 'strong' | 'medium' | 'fallback' | 'new';

export interface MatchDecision {
    faceId: string;
    personId: string;
    tier: MatchTier;
    similarity: number | null;
    confidence: number | null;
}

export interface PersonFaceQualityAnalysis {
    personId: string;
    allFaces: FaceQualityRecord[];
    bestFace: FaceQualityRecord;
    worstFace: FaceQualityRecord;
    improvementPotential: number;
}

export interface ClusterFaceAnalysis {
    clusterId: string;
    personAnalyses: Map<string, PersonFaceQualityAnalysis>;
    identities: PersonIdentity[];
    basePhotoCandidate: PhotoCandidate | null;
    overallImprovementPotential: number;
    /** Photos that survived loading and detection, in canonical order. */
    processedPhotoIds: string[];
    photoCount: number;
    analyzedAt: Date;
}

export type ImprovementType = Exclude<FaceIssue, 'none'>;

export function improvementTypeFor(issue: FaceIssue): ImprovementType {
    return issue === 'none' ? 'poor_expression' : issue;
}

export const IMPROVEMENT_PRIORITY: Record<ImprovementType, number> = {
    eyes_closed: 1,
    poor_expression: 2,
    unflattering_angle: 3,
    blurred_face: 4,
    awkward_pose: 5
};

export interface PersonImprovement {
    personId: string;
    sourcePhotoId: string;
    improvementType: ImprovementType;
    confidence: number;
}

export type EligibilityReason =
    | 'eligible'
    | 'insufficient_photos'
    | 'no_face_variations'
    | 'inconsistent_people'
    | 'low_quality_photos'
    | 'processing_error';

export const ELIGIBILITY_MESSAGES: Record<EligibilityReason, string> = {
    eligible: 'Ready for a best-moment composite',
    insufficient_photos: 'Need at least 2 photos of the same moment',
    no_face_variations: 'Everyone looks the same in every photo',
    inconsistent_people: 'Different people appear across the photos',
    low_quality_photos: 'Photo quality is too low to combine',
    processing_error: 'The photos could not be analyzed'
};

export interface EligibilityResult {
    isEligible: boolean;
    reason: EligibilityReason;
    confidence: number;
    improvements: PersonImprovement[];
}

export interface PersonFaceReplacement {
    personId: string;
    sourceFace: FaceQualityRecord;
    destinationPhotoId: string;
    destinationFace: FaceQualityRecord;
    improvementType: ImprovementType;
    confidence: number;
}

export interface CacheStatistics {
    clusterCount: number;
    faceCount: number;
}

export function emptyClusterAnalysis(clusterId: string, photos: readonly Photo[], now: Date): ClusterFaceAnalysis {
    return {
        clusterId,
        personAnalyses: new Map(),
        identities: [],
        basePhotoCandidate: null,
        overallImprovementPotential: 0,
        processedPhotoIds: [],
        photoCount: photos.length,
        analyzedAt: now
    };
}

export function personCount(analysis: ClusterFaceAnalysis): number {
    return analysis.personAnalyses.size;
}

export function peopleWithImprovements(analysis: ClusterFaceAnalysis, threshold = 0.3): PersonFaceQualityAnalysis[] {
    return [...analysis.personAnalyses.values()].filter(p => p.improvementPotential > threshold);
}

/** Rough composite generation time in seconds. */
export function estimatedProcessingTime(analysis: ClusterFaceAnalysis): number {
    return 5 + personCount(analysis) * 2 + peopleWithImprovements(analysis).length * 3;
}
