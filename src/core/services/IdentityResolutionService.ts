import type { FaceEmbedding, FaceObservation, MatchDecision, MatchTier, PersonIdentity } from '../models/analysis';
import type { FaceAngle, FaceQualityRecord } from '../models/face';
import { bothOpen, isAlignmentCompatible } from '../models/face';
import { clamp, distance, mean, rectArea, rectCenter } from '../models/geometry';
import { DEFAULT_THRESHOLDS, type MatchingThresholds, type Thresholds } from '../models/thresholds';
import logger from '../../logger';

export type EmbeddingDistance = (a: FaceEmbedding, b: FaceEmbedding) => number;

export interface PairScore {
    similarity: number;
    confidence: number;
}

export interface IdentityCandidate extends PairScore {
    personId: string;
}

export interface ResolutionResult {
    identities: PersonIdentity[];
    decisions: MatchDecision[];
}

/**
 * Identities created during one resolution pass. Ids come from a counter that
 * starts over for every arena, so nothing leaks between clusters.
 */
export class IdentityArena {
    private counter = 0;
    private readonly entries: { id: string; members: FaceObservation[] }[] = [];

    get size(): number {
        return this.entries.length;
    }

    all(): readonly { id: string; members: readonly FaceObservation[] }[] {
        return this.entries;
    }

    create(first: FaceObservation): string {
        this.counter += 1;
        const id = `person-${this.counter}`;
        this.entries.push({ id, members: [first] });
        return id;
    }

    append(personId: string, observation: FaceObservation) {
        const entry = this.entries.find(e => e.id === personId);
        if (!entry) throw new Error(`IdentityArena.append: unknown identity ${personId}`);
        entry.members.push(observation);
    }

    toIdentities(): PersonIdentity[] {
        return this.entries.map(e => ({ id: e.id, faces: e.members.map(m => m.record) }));
    }
}

function angleSimilarity(a: number, b: number, normalizer: number): number {
    return Math.max(0, 1 - Math.abs(a - b) / normalizer);
}

export class IdentityResolutionService {
    /** Capture time, then photo id, then detector order. */
    static compareObservations(a: FaceObservation, b: FaceObservation): number {
        const ra = a.record;
        const rb = b.record;
        const dt = ra.photoTimestamp.getTime() - rb.photoTimestamp.getTime();
        if (dt !== 0) return dt;
        if (ra.photoId !== rb.photoId) return ra.photoId < rb.photoId ? -1 : 1;
        return ra.detectionIndex - rb.detectionIndex;
    }

    static canonicalOrder(observations: readonly FaceObservation[]): FaceObservation[] {
        return [...observations].sort((a, b) => this.compareObservations(a, b));
    }

    static poseSimilarity(a: FaceAngle, b: FaceAngle, t: MatchingThresholds = DEFAULT_THRESHOLDS.matching): number {
        const n = t.poseNormalizers;
        return 0.5 * angleSimilarity(a.yaw, b.yaw, n.yaw)
            + 0.3 * angleSimilarity(a.pitch, b.pitch, n.pitch)
            + 0.2 * angleSimilarity(a.roll, b.roll, n.roll);
    }

    static featureConsistency(a: FaceQualityRecord, b: FaceQualityRecord, t: Thresholds = DEFAULT_THRESHOLDS): number {
        let score = 0.5;
        if (bothOpen(a.eyeState) === bothOpen(b.eyeState)) score += 0.2;
        if (Math.abs(a.expression.intensity - b.expression.intensity) < t.matching.smileDifference) score += 0.2;
        if (isAlignmentCompatible(a.pose, b.pose, t)) score += 0.1;
        return Math.min(1, score);
    }

    /**
     * Similarity and confidence between a new face and one already assigned.
     * Null when either side has no descriptor.
     */
    static pairScore(face: FaceObservation, existing: FaceObservation, distanceFn: EmbeddingDistance, t: Thresholds = DEFAULT_THRESHOLDS): PairScore | null {
        if (!face.embedding || !existing.embedding) return null;

        const embeddingSim = Math.max(0, 1 - distanceFn(face.embedding, existing.embedding) / 2);
        const poseSim = this.poseSimilarity(face.record.pose, existing.record.pose, t.matching);
        const consistency = this.featureConsistency(face.record, existing.record, t);

        const qualityFactor = (face.record.compositeScore + existing.record.compositeScore) / 2;
        const embeddingConfidence = Math.min(face.embedding.confidence, existing.embedding.confidence);

        return {
            similarity: 0.7 * embeddingSim + 0.2 * poseSim + 0.1 * consistency,
            confidence: 0.5 * embeddingSim + 0.3 * qualityFactor + 0.2 * embeddingConfidence
        };
    }

    /** Aggregate over an identity's faces: 0.7·mean + 0.3·max similarity, mean confidence. */
    static scoreIdentity(face: FaceObservation, members: readonly FaceObservation[], distanceFn: EmbeddingDistance, t: Thresholds = DEFAULT_THRESHOLDS): PairScore | null {
        const pairs: PairScore[] = [];
        for (const member of members) {
            const pair = this.pairScore(face, member, distanceFn, t);
            if (pair) pairs.push(pair);
        }
        if (pairs.length === 0) return null;

        const similarities = pairs.map(p => p.similarity);
        return {
            similarity: 0.7 * mean(similarities) + 0.3 * Math.max(...similarities),
            confidence: clamp(mean(pairs.map(p => p.confidence)))
        };
    }

    /** Number of position, time and size checks the face passes against an identity. */
    static secondaryChecks(face: FaceQualityRecord, members: readonly FaceObservation[], t: MatchingThresholds = DEFAULT_THRESHOLDS.matching): number {
        const center = rectCenter(face.boundingBox);
        const area = rectArea(face.boundingBox);
        const time = face.photoTimestamp.getTime();

        const position = members.some(m => distance(center, rectCenter(m.record.boundingBox)) < t.positionDistance);
        const temporal = members.some(m => Math.abs(time - m.record.photoTimestamp.getTime()) < t.temporalWindowMs);
        const size = members.some(m => {
            const other = rectArea(m.record.boundingBox);
            if (other <= 0) return false;
            const ratio = area / other;
            return ratio >= t.sizeRatioMin && ratio <= t.sizeRatioMax;
        });

        return [position, temporal, size].filter(Boolean).length;
    }

    /**
     * Tier a candidate falls into. Strong needs both cutoffs (inclusive);
     * medium needs enough secondary checks.
     */
    static decide(candidate: PairScore, secondaryPassed: () => number, t: MatchingThresholds = DEFAULT_THRESHOLDS.matching): 'strong' | 'medium' | null {
        if (candidate.similarity >= t.strongSimilarity && candidate.confidence >= t.strongConfidence) return 'strong';
        if (candidate.similarity >= t.mediumSimilarity && secondaryPassed() >= t.requiredSecondaryChecks) return 'medium';
        return null;
    }

    /** First identity, in creation order, holding a face at nearly the same place and size. */
    static fallbackMatch(face: FaceQualityRecord, arena: IdentityArena, t: MatchingThresholds = DEFAULT_THRESHOLDS.matching): string | null {
        const center = rectCenter(face.boundingBox);
        for (const entry of arena.all()) {
            const hit = entry.members.some(m =>
                distance(center, rectCenter(m.record.boundingBox)) < t.fallbackCenterDistance &&
                Math.abs(face.boundingBox.width - m.record.boundingBox.width) < t.fallbackWidthDifference
            );
            if (hit) return entry.id;
        }
        return null;
    }

    static bestCandidate(face: FaceObservation, arena: IdentityArena, distanceFn: EmbeddingDistance, t: Thresholds = DEFAULT_THRESHOLDS): IdentityCandidate | null {
        let best: IdentityCandidate | null = null;
        for (const entry of arena.all()) {
            const score = this.scoreIdentity(face, entry.members, distanceFn, t);
            if (!score || score.similarity <= t.matching.minimumSimilarity) continue;
            if (!best || score.similarity > best.similarity) {
                best = { personId: entry.id, ...score };
            }
        }
        return best;
    }

    /**
     * Assign every face to an identity as one sequential fold in canonical
     * order. Each step sees every identity built by the steps before it.
     */
    static resolve(observations: readonly FaceObservation[], distanceFn: EmbeddingDistance, t: Thresholds = DEFAULT_THRESHOLDS): ResolutionResult {
        const arena = new IdentityArena();
        const decisions: MatchDecision[] = [];

        for (const face of this.canonicalOrder(observations)) {
            const decision = this.assign(face, arena, distanceFn, t);
            decisions.push(decision);
        }

        logger.debug(`[IdentityResolution] ${observations.length} faces resolved into ${arena.size} identities`);
        return { identities: arena.toIdentities(), decisions };
    }

    private static assign(face: FaceObservation, arena: IdentityArena, distanceFn: EmbeddingDistance, t: Thresholds): MatchDecision {
        const faceId = face.record.id;

        if (face.embedding) {
            const candidate = this.safeBestCandidate(face, arena, distanceFn, t);
            if (candidate) {
                const members = arena.all().find(e => e.id === candidate.personId)?.members ?? [];
                const tier = this.decide(candidate, () => this.secondaryChecks(face.record, members, t.matching), t.matching);
                if (tier) {
                    arena.append(candidate.personId, face);
                    return this.decision(faceId, candidate.personId, tier, candidate);
                }
            }
        }

        const fallbackId = this.fallbackMatch(face.record, arena, t.matching);
        if (fallbackId) {
            arena.append(fallbackId, face);
            return this.decision(faceId, fallbackId, 'fallback', null);
        }

        const personId = arena.create(face);
        return this.decision(faceId, personId, 'new', null);
    }

    /** A throwing distance function sends the face down the fallback path. */
    private static safeBestCandidate(face: FaceObservation, arena: IdentityArena, distanceFn: EmbeddingDistance, t: Thresholds): IdentityCandidate | null {
        try {
            return this.bestCandidate(face, arena, distanceFn, t);
        } catch (err) {
            logger.warn(`[IdentityResolution] Similarity failed for face ${face.record.id}, using position fallback:`, err);
            return null;
        }
    }

    private static decision(faceId: string, personId: string, tier: MatchTier, score: PairScore | null): MatchDecision {
        return {
            faceId,
            personId,
            tier,
            similarity: score?.similarity ?? null,
            confidence: score?.confidence ?? null
        };
    }
}
