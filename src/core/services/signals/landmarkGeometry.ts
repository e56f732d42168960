/**
 * Pure geometry over landmark point sets. Coordinates are normalized with the
 * origin at the top-left, so "up" is decreasing y.
 */

import { distance, type Point } from '../../models/geometry';
import { DEFAULT_THRESHOLDS, type EyeThresholds } from '../../models/thresholds';

const byX = (a: Point, b: Point) => a.x - b.x;

/**
 * Eye aspect ratio.
 *
 * Corners are the extreme-x points. Of the remaining points the two highest
 * form the upper lid and the two lowest the lower lid; lids are paired by x
 * so each vertical gap is measured at the same side of the eye.
 */
export function eyeAspectRatio(points: readonly Point[], t: EyeThresholds = DEFAULT_THRESHOLDS.eye): number {
    if (points.length < t.minLandmarkPoints) return t.neutralRatio;

    let outerIdx = 0;
    let innerIdx = 0;
    for (let i = 1; i < points.length; i++) {
        if (points[i].x < points[outerIdx].x) outerIdx = i;
        if (points[i].x > points[innerIdx].x) innerIdx = i;
    }

    const horizontal = distance(points[outerIdx], points[innerIdx]);
    if (outerIdx === innerIdx || horizontal <= t.minHorizontalSpan) return t.neutralRatio;

    const lids = points
        .filter((_, i) => i !== outerIdx && i !== innerIdx)
        .sort((a, b) => a.y - b.y);
    const upper = lids.slice(0, 2).sort(byX);
    const lower = lids.slice(-2).sort(byX);

    const vertical = distance(upper[0], lower[0]) + distance(upper[1], lower[1]);
    return vertical / (2 * horizontal);
}

/** Threshold picked from the average EAR of both eyes. */
export function adaptiveEyeThreshold(avgEAR: number, t: EyeThresholds = DEFAULT_THRESHOLDS.eye): number {
    for (const band of t.bands) {
        if (avgEAR > band.above) return band.threshold;
    }
    return t.floorThreshold;
}

/** Mean distance of the points from their centroid. */
export function landmarkSpread(points: readonly Point[]): number {
    if (points.length < 2) return 0;
    let cx = 0;
    let cy = 0;
    for (const p of points) {
        cx += p.x;
        cy += p.y;
    }
    const center = { x: cx / points.length, y: cy / points.length };
    let total = 0;
    for (const p of points) total += distance(p, center);
    return total / points.length;
}

export function boundsOf(points: readonly Point[]): { width: number; height: number } {
    let minX = Infinity;
    let maxX = -Infinity;
    let minY = Infinity;
    let maxY = -Infinity;
    for (const p of points) {
        minX = Math.min(minX, p.x);
        maxX = Math.max(maxX, p.x);
        minY = Math.min(minY, p.y);
        maxY = Math.max(maxY, p.y);
    }
    if (points.length === 0) return { width: 0, height: 0 };
    return { width: maxX - minX, height: maxY - minY };
}

/** Turning angle at p2, as a fraction of π. */
export function turningAngle(p1: Point, p2: Point, p3: Point): number {
    const v1x = p2.x - p1.x;
    const v1y = p2.y - p1.y;
    const v2x = p3.x - p2.x;
    const v2y = p3.y - p2.y;
    const dot = v1x * v2x + v1y * v2y;
    const det = v1x * v2y - v1y * v2x;
    return Math.abs(Math.atan2(det, dot)) / Math.PI;
}

/** 1 when a and b are equal, falling to 0 as one dwarfs the other. */
export function balance(a: number, b: number): number | null {
    const larger = Math.max(a, b);
    if (larger <= 0) return null;
    return 1 - Math.abs(a - b) / larger;
}
