import type { CacheStatistics, ClusterFaceAnalysis, PhotoFaceAnalysis } from '../models/analysis';
import { SerialQueue } from '../concurrency/SerialQueue';
import logger from '../../logger';

interface CacheEntry<T> {
    value: T;
    storedAt: number;
}

export interface AnalysisCacheOptions {
    /** 0 or undefined keeps entries until cleared. */
    ttlMs?: number;
    now?: () => number;
}

/**
 * Memoized cluster and photo analyses. Every read and write goes through one
 * serial queue; callers compute outside it and insert the finished result.
 * Entries are copied on the way in and on the way out, so no caller holds
 * the stored objects.
 */
export class AnalysisCacheService {
    private readonly clusters = new Map<string, CacheEntry<ClusterFaceAnalysis>>();
    private readonly photos = new Map<string, CacheEntry<PhotoFaceAnalysis>>();
    private readonly queue = new SerialQueue('AnalysisCache');
    private readonly ttlMs: number;
    private readonly now: () => number;

    constructor(options: AnalysisCacheOptions = {}) {
        this.ttlMs = options.ttlMs ?? 0;
        this.now = options.now ?? Date.now;
    }

    /**
     * Cached analysis for a cluster. A different photo count than the one the
     * entry was computed from evicts it.
     */
    getCluster(clusterId: string, photoCount: number): Promise<ClusterFaceAnalysis | null> {
        return this.queue.enqueue(`getCluster ${clusterId}`, () => {
            const entry = this.fresh(this.clusters, clusterId);
            if (!entry) return null;
            if (entry.value.photoCount !== photoCount) {
                logger.info(`[AnalysisCache] Photo count changed for cluster ${clusterId} (${entry.value.photoCount} -> ${photoCount}), recomputing`);
                this.clusters.delete(clusterId);
                return null;
            }
            return structuredClone(entry.value);
        });
    }

    setCluster(analysis: ClusterFaceAnalysis): Promise<void> {
        return this.queue.enqueue(`setCluster ${analysis.clusterId}`, () => {
            this.clusters.set(analysis.clusterId, { value: structuredClone(analysis), storedAt: this.now() });
        });
    }

    getPhoto(photoId: string): Promise<PhotoFaceAnalysis | null> {
        return this.queue.enqueue(`getPhoto ${photoId}`, () => {
            const entry = this.fresh(this.photos, photoId);
            return entry ? structuredClone(entry.value) : null;
        });
    }

    setPhoto(analysis: PhotoFaceAnalysis): Promise<void> {
        return this.queue.enqueue(`setPhoto ${analysis.photoId}`, () => {
            this.photos.set(analysis.photoId, { value: structuredClone(analysis), storedAt: this.now() });
        });
    }

    /** Drop one cluster (and its photos), or everything. */
    clear(clusterId?: string): Promise<void> {
        return this.queue.enqueue(`clear ${clusterId ?? 'all'}`, () => {
            if (clusterId === undefined) {
                this.clusters.clear();
                this.photos.clear();
                return;
            }
            const entry = this.clusters.get(clusterId);
            if (entry) {
                for (const photoId of entry.value.processedPhotoIds) this.photos.delete(photoId);
                this.clusters.delete(clusterId);
            }
        });
    }

    statistics(): Promise<CacheStatistics> {
        return this.queue.enqueue('statistics', () => {
            let faceCount = 0;
            for (const entry of this.photos.values()) faceCount += entry.value.faces.length;
            return { clusterCount: this.clusters.size, faceCount };
        });
    }

    private fresh<T>(store: Map<string, CacheEntry<T>>, key: string): CacheEntry<T> | null {
        const entry = store.get(key);
        if (!entry) return null;
        if (this.ttlMs > 0 && this.now() - entry.storedAt > this.ttlMs) {
            store.delete(key);
            return null;
        }
        return entry;
    }
}
