import type { IEmbeddingGenerator } from '../interfaces/IEmbeddingGenerator';
import type { IFaceDetector, ILandmarkProvider } from '../interfaces/IFaceDetector';
import type { IEdgeFilter, IImageLoader, LoadedImage } from '../interfaces/IImageLoader';
import {
    emptyClusterAnalysis,
    type CacheStatistics,
    type ClusterFaceAnalysis,
    type EligibilityResult,
    type FaceEmbedding,
    type FaceObservation,
    type PersonFaceReplacement,
    type PhotoFaceAnalysis
} from '../models/analysis';
import type { DetectedFace, FaceLandmarks, FaceQualityRecord } from '../models/face';
import { sortPhotosCanonically, type Photo, type PhotoCluster } from '../models/photo';
import { DetectionError, errorMessage, ImageLoadError } from '../errors';
import { mapInBatches } from '../concurrency/batches';
import { ConfigService, type EngineConfig } from './ConfigService';
import { AnalysisCacheService } from './AnalysisCacheService';
import { BasePhotoService, type ImageSize } from './BasePhotoService';
import { EligibilityService } from './EligibilityService';
import { FaceScoringService } from './FaceScoringService';
import { FaceSharpnessService } from './FaceSharpnessService';
import { IdentityResolutionService } from './IdentityResolutionService';
import { PersonAggregationService } from './PersonAggregationService';
import { ReplacementPlanningService } from './ReplacementPlanningService';
import { FaceQualityRepository } from '../../data/repositories/FaceQualityRepository';
import { initDB, isDBInitialized } from '../../db';
import logger from '../../logger';

export interface FaceQualityAnalysisDeps {
    detector: IFaceDetector;
    embedder: IEmbeddingGenerator;
    imageLoader: IImageLoader;
    landmarkProvider?: ILandmarkProvider;
    edgeFilter?: IEdgeFilter;
    cache?: AnalysisCacheService;
    config?: EngineConfig;
    now?: () => Date;
}

/**
 * Entry point: scores faces per photo, resolves identities across a burst and
 * decides whether a composite is worthwhile.
 */
export class FaceQualityAnalysisService {
    private readonly config: EngineConfig;
    private readonly cache: AnalysisCacheService;
    private readonly now: () => Date;
    private readonly pendingClusters = new Map<string, Promise<ClusterFaceAnalysis>>();
    private readonly pendingPhotos = new Map<string, Promise<PhotoFaceAnalysis | null>>();

    constructor(private readonly deps: FaceQualityAnalysisDeps) {
        this.config = deps.config ?? ConfigService.getSettings();
        this.cache = deps.cache ?? new AnalysisCacheService({ ttlMs: this.config.cache.ttlMs });
        this.now = deps.now ?? (() => new Date());
    }

    /**
     * Full analysis of one cluster, cached by cluster id. A cluster whose
     * analysis fails as a whole yields an empty analysis that is not cached.
     * Overlapping calls for the same cluster share one computation.
     */
    async analyzeCluster(cluster: PhotoCluster): Promise<ClusterFaceAnalysis> {
        const key = `${cluster.id}:${cluster.photos.length}`;
        const pending = this.pendingClusters.get(key);
        if (pending) return structuredClone(await pending);

        const run = this.loadOrComputeCluster(cluster).finally(() => this.pendingClusters.delete(key));
        this.pendingClusters.set(key, run);
        return run;
    }

    private async loadOrComputeCluster(cluster: PhotoCluster): Promise<ClusterFaceAnalysis> {
        const cached = await this.cache.getCluster(cluster.id, cluster.photos.length);
        if (cached) {
            logger.debug(`[FaceQuality] Cache hit for cluster ${cluster.id}`);
            return cached;
        }

        try {
            const analysis = await this.computeClusterAnalysis(cluster);
            await this.cache.setCluster(analysis);
            return analysis;
        } catch (err) {
            logger.error(`[FaceQuality] Cluster ${cluster.id} analysis failed:`, err);
            return emptyClusterAnalysis(cluster.id, cluster.photos, this.now());
        }
    }

    /**
     * Faces of each photo, best first. Photos that fail to load or detect are
     * left out of the map.
     */
    async rankFaces(photos: readonly Photo[]): Promise<Map<string, FaceQualityRecord[]>> {
        const analyses = await this.analyzePhotos(sortPhotosCanonically(photos));
        const ranked = new Map<string, FaceQualityRecord[]>();

        for (const analysis of analyses) {
            const faces = FaceScoringService.rank(analysis.faces.map(f => f.record));
            ranked.set(analysis.photoId, faces);
            if (this.config.processing.persistResults) {
                this.persist(analysis.photoId, faces);
            }
        }
        return ranked;
    }

    async assessEligibility(cluster: PhotoCluster): Promise<EligibilityResult> {
        const t = this.config.thresholds;
        if (cluster.photos.length < t.eligibility.minPhotos) {
            return EligibilityService.evaluate(cluster.photos.length, null, t);
        }
        const analysis = await this.analyzeCluster(cluster);
        const result = EligibilityService.evaluate(cluster.photos.length, analysis, t);
        logger.info(`[FaceQuality] Cluster ${cluster.id}: ${result.reason} (confidence ${result.confidence.toFixed(2)})`);
        return result;
    }

    async planReplacements(cluster: PhotoCluster): Promise<PersonFaceReplacement[]> {
        const analysis = await this.analyzeCluster(cluster);
        return ReplacementPlanningService.plan(analysis, this.config.thresholds);
    }

    clearCache(clusterId?: string): Promise<void> {
        return this.cache.clear(clusterId);
    }

    getCacheStatistics(): Promise<CacheStatistics> {
        return this.cache.statistics();
    }

    private async computeClusterAnalysis(cluster: PhotoCluster): Promise<ClusterFaceAnalysis> {
        const t = this.config.thresholds;
        const photos = sortPhotosCanonically(cluster.photos);
        const photoAnalyses = await this.analyzePhotos(photos);

        // Identity resolution is a strict fold; it starts only after every photo is scored
        const observations = photoAnalyses.flatMap(a => a.faces);
        const { identities } = IdentityResolutionService.resolve(
            observations,
            (a: FaceEmbedding, b: FaceEmbedding) => this.deps.embedder.distance(a, b),
            t
        );
        const { personAnalyses, overallImprovementPotential } = PersonAggregationService.aggregate(identities, t.aggregation);

        const processedIds = new Set(photoAnalyses.map(a => a.photoId));
        const processedPhotos = photos.filter(p => processedIds.has(p.id));
        const sizes = new Map<string, ImageSize>(
            photoAnalyses.map(a => [a.photoId, { width: a.imageWidth, height: a.imageHeight }])
        );

        logger.info(`[FaceQuality] Cluster ${cluster.id}: ${processedPhotos.length}/${photos.length} photos, ${observations.length} faces, ${identities.length} people, ${personAnalyses.size} improvable`);

        return {
            clusterId: cluster.id,
            personAnalyses,
            identities,
            basePhotoCandidate: BasePhotoService.select(processedPhotos, sizes),
            overallImprovementPotential,
            processedPhotoIds: processedPhotos.map(p => p.id),
            photoCount: cluster.photos.length,
            analyzedAt: this.now()
        };
    }

    private async analyzePhotos(photos: readonly Photo[]): Promise<PhotoFaceAnalysis[]> {
        const results = await mapInBatches(photos, this.config.processing.maxConcurrency, photo => this.analyzePhoto(photo));
        return results.filter((r): r is PhotoFaceAnalysis => r !== null);
    }

    /** Concurrent requests for one photo share a single load and detection. */
    private analyzePhoto(photo: Photo): Promise<PhotoFaceAnalysis | null> {
        const pending = this.pendingPhotos.get(photo.id);
        if (pending) return pending;

        const run = this.loadOrScorePhoto(photo).finally(() => this.pendingPhotos.delete(photo.id));
        this.pendingPhotos.set(photo.id, run);
        return run;
    }

    /** Per-photo scoring; any failure drops the photo. */
    private async loadOrScorePhoto(photo: Photo): Promise<PhotoFaceAnalysis | null> {
        const cached = await this.cache.getPhoto(photo.id);
        if (cached) return cached;

        let image: LoadedImage;
        let detected: DetectedFace[];
        try {
            image = await this.deps.imageLoader.load(photo);
            detected = await this.deps.detector.detect(image, photo);
        } catch (err) {
            if (err instanceof ImageLoadError) {
                logger.warn(`[FaceQuality] Dropping photo ${photo.id}: ${err.kind} (${err.message})`);
            } else if (err instanceof DetectionError) {
                logger.warn(`[FaceQuality] Dropping photo ${photo.id}: detection failed (${err.message})`);
            } else {
                logger.error(`[FaceQuality] Dropping photo ${photo.id}:`, err);
            }
            return null;
        }

        const faces: FaceObservation[] = [];
        for (const [index, detectedFace] of detected.entries()) {
            faces.push(await this.observeFace(photo, image, detectedFace, index));
        }

        const analysis: PhotoFaceAnalysis = {
            photoId: photo.id,
            imageWidth: image.width,
            imageHeight: image.height,
            faces,
            analyzedAt: this.now()
        };
        await this.cache.setPhoto(analysis);
        return analysis;
    }

    private async observeFace(photo: Photo, image: LoadedImage, detected: DetectedFace, index: number): Promise<FaceObservation> {
        const t = this.config.thresholds;
        const face: DetectedFace = { ...detected, landmarks: await this.resolveLandmarks(image, detected) };
        const region = { image, boundingBox: face.boundingBox };

        const sharpness = await FaceSharpnessService.measure(region, this.deps.edgeFilter, t.sharpness);
        const record = FaceScoringService.score({ photo, detectionIndex: index, face, sharpness }, t);

        let embedding: FaceEmbedding | null = null;
        try {
            embedding = await this.deps.embedder.embed(region);
        } catch (err) {
            logger.warn(`[FaceQuality] Embedding failed for ${record.id}, using position fallback: ${errorMessage(err)}`);
        }

        return { record, embedding };
    }

    /** Provider landmarks override the detector's region by region. */
    private async resolveLandmarks(image: LoadedImage, face: DetectedFace): Promise<FaceLandmarks | undefined> {
        const provider = this.deps.landmarkProvider;
        if (!provider) return face.landmarks;
        try {
            const provided = await provider.getLandmarks(image, face);
            if (!provided) return face.landmarks;
            return { ...face.landmarks, ...provided };
        } catch (err) {
            logger.warn(`[FaceQuality] Landmark provider failed for photo ${image.photoId}: ${errorMessage(err)}`);
            return face.landmarks;
        }
    }

    private persist(photoId: string, faces: FaceQualityRecord[]) {
        try {
            if (!isDBInitialized()) initDB(this.config.database.path);
            FaceQualityRepository.saveFaces(photoId, faces);
        } catch (err) {
            logger.error(`[FaceQuality] Failed to persist faces for photo ${photoId}:`, err);
        }
    }
}
