export * from './core/models/geometry';
export * from './core/models/face';
export * from './core/models/photo';
export * from './core/models/analysis';
export * from './core/models/thresholds';
export * from './core/errors';

export type { IFaceDetector, ILandmarkProvider } from './core/interfaces/IFaceDetector';
export type { IEmbeddingGenerator } from './core/interfaces/IEmbeddingGenerator';
export type { IImageLoader, IEdgeFilter, LoadedImage, FaceRegion } from './core/interfaces/IImageLoader';

export { ConfigService, DEFAULT_CONFIG } from './core/services/ConfigService';
export type { EngineConfig, CacheConfig, ProcessingConfig, DatabaseConfig, DeepPartial } from './core/services/ConfigService';
export { EyeStateService } from './core/services/signals/EyeStateService';
export { ExpressionService } from './core/services/signals/ExpressionService';
export { eyeAspectRatio, adaptiveEyeThreshold } from './core/services/signals/landmarkGeometry';
export { FaceSharpnessService } from './core/services/FaceSharpnessService';
export { FaceScoringService } from './core/services/FaceScoringService';
export { IdentityResolutionService, IdentityArena } from './core/services/IdentityResolutionService';
export type { EmbeddingDistance, ResolutionResult } from './core/services/IdentityResolutionService';
export { PersonAggregationService } from './core/services/PersonAggregationService';
export { BasePhotoService } from './core/services/BasePhotoService';
export { EligibilityService } from './core/services/EligibilityService';
export { ReplacementPlanningService } from './core/services/ReplacementPlanningService';
export { AnalysisCacheService } from './core/services/AnalysisCacheService';
export { EmbeddingService } from './core/services/EmbeddingService';
export { FaceQualityAnalysisService } from './core/services/FaceQualityAnalysisService';
export type { FaceQualityAnalysisDeps } from './core/services/FaceQualityAnalysisService';

export { FaceQualityRepository } from './data/repositories/FaceQualityRepository';
export { initDB, getDB, closeDB } from './db';

export { SharpImageLoader } from './infrastructure/SharpImageLoader';
export { SharpEdgeFilter } from './infrastructure/SharpEdgeFilter';
export { ExifPhotoReader } from './infrastructure/ExifPhotoReader';

export { default as logger } from './logger';
