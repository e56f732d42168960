/**
 * ReplacementPlanningService Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { ReplacementPlanningService } from '../../../src/core/services/ReplacementPlanningService';
import {
    emptyClusterAnalysis,
    type ClusterFaceAnalysis,
    type ImprovementType,
    type PersonFaceQualityAnalysis,
    type PersonFaceReplacement
} from '../../../src/core/models/analysis';
import { makePhotoCandidate } from '../../../src/core/models/photo';
import { BASE_TIME, makePersonAnalysis, makePhoto, makeRecord } from '../../mocks/fixtures';

function closedEyesPerson(): PersonFaceQualityAnalysis {
    return makePersonAnalysis(
        'person-1',
        makeRecord({ photoId: 'p1', compositeScore: 0.9 }),
        makeRecord({ photoId: 'p2', compositeScore: 0.3, eyesOpen: false })
    );
}

function clusterWithBase(baseId: string | null, people: PersonFaceQualityAnalysis[]): ClusterFaceAnalysis {
    return {
        ...emptyClusterAnalysis('cluster-1', [makePhoto('p1'), makePhoto('p2', 5)], BASE_TIME),
        personAnalyses: new Map(people.map(p => [p.personId, p])),
        basePhotoCandidate: baseId ? makePhotoCandidate(makePhoto(baseId), 1, 0.6, 0.4) : null
    };
}

function replacement(personId: string, source: number, destination: number, confidence: number, improvementType: ImprovementType): PersonFaceReplacement {
    return {
        personId,
        sourceFace: makeRecord({ compositeScore: source }),
        destinationPhotoId: 'p2',
        destinationFace: makeRecord({ compositeScore: destination }),
        improvementType,
        confidence
    };
}

describe('ReplacementPlanningService', () => {
    describe('assess', () => {
        it('should credit reopened eyes', () => {
            const assessment = ReplacementPlanningService.assess(closedEyesPerson());

            expect(assessment.score).toBeCloseTo(0.4, 10);
            expect(assessment.fixes).toEqual(['eyes_closed']);
            expect(assessment.isSignificant).toBe(true);
        });

        it('should not be significant when nothing visible changes', () => {
            const person = makePersonAnalysis(
                'person-1',
                makeRecord({ compositeScore: 0.9 }),
                makeRecord({ compositeScore: 0.3 })
            );

            const assessment = ReplacementPlanningService.assess(person);

            expect(assessment.fixes).toEqual([]);
            expect(assessment.isSignificant).toBe(false);
        });

        it('should list every fix in order', () => {
            const person = makePersonAnalysis(
                'person-1',
                makeRecord({ compositeScore: 0.9, expression: { intensity: 0.9, naturalness: 0.9 }, sharpness: 0.9, captureQuality: 0.9 }),
                makeRecord({ compositeScore: 0.1, eyesOpen: false, pose: { pitch: 0, yaw: 40, roll: 0 }, sharpness: 0.3, captureQuality: 0.5 })
            );

            const assessment = ReplacementPlanningService.assess(person);

            expect(assessment.fixes).toEqual(['eyes_closed', 'poor_expression', 'unflattering_angle', 'blurred_face', 'awkward_pose']);
            expect(assessment.score).toBeCloseTo(1.15, 10);
        });
    });

    describe('plan', () => {
        it('should swap the best face into the base photo', () => {
            // Act
            const plan = ReplacementPlanningService.plan(clusterWithBase('p2', [closedEyesPerson()]));

            // Assert: 0.9 * 0.4 + 0.3 + 0.2 (eyes) + 0.1 (pose)
            expect(plan).toHaveLength(1);
            expect(plan[0].personId).toBe('person-1');
            expect(plan[0].sourceFace.id).toBe('p1#0');
            expect(plan[0].destinationFace.id).toBe('p2#0');
            expect(plan[0].destinationPhotoId).toBe('p2');
            expect(plan[0].improvementType).toBe('eyes_closed');
            expect(plan[0].confidence).toBeCloseTo(0.96, 10);
        });

        it('should skip a person whose best face is already in the base photo', () => {
            expect(ReplacementPlanningService.plan(clusterWithBase('p1', [closedEyesPerson()]))).toEqual([]);
        });

        it('should skip a person missing from the base photo', () => {
            expect(ReplacementPlanningService.plan(clusterWithBase('p3', [closedEyesPerson()]))).toEqual([]);
        });

        it('should return nothing without a base photo', () => {
            expect(ReplacementPlanningService.plan(clusterWithBase(null, [closedEyesPerson()]))).toEqual([]);
        });
    });

    describe('rank', () => {
        it('should order by expected improvement first', () => {
            const small = replacement('person-1', 0.8, 0.5, 0.9, 'eyes_closed');
            const large = replacement('person-2', 0.9, 0.3, 0.8, 'blurred_face');

            expect(ReplacementPlanningService.rank([small, large]).map(r => r.personId)).toEqual(['person-2', 'person-1']);
        });

        it('should order by confidence when improvements are close', () => {
            const lower = replacement('person-1', 0.9, 0.3, 0.8, 'eyes_closed');
            const higher = replacement('person-2', 0.9, 0.32, 0.9, 'eyes_closed');

            expect(ReplacementPlanningService.rank([lower, higher]).map(r => r.personId)).toEqual(['person-2', 'person-1']);
        });

        it('should fall back to issue priority', () => {
            const blurred = replacement('person-1', 0.9, 0.3, 0.9, 'blurred_face');
            const eyes = replacement('person-2', 0.9, 0.3, 0.9, 'eyes_closed');

            expect(ReplacementPlanningService.rank([blurred, eyes]).map(r => r.personId)).toEqual(['person-2', 'person-1']);
        });
    });

    describe('isFeasible', () => {
        it('should reject a swap between misaligned faces', () => {
            const r = replacement('person-1', 0.9, 0.3, 0.9, 'eyes_closed');
            const misaligned = { ...r, destinationFace: makeRecord({ compositeScore: 0.3, pose: { pitch: 0, yaw: 45, roll: 0 } }) };

            expect(ReplacementPlanningService.isFeasible(r)).toBe(true);
            expect(ReplacementPlanningService.isFeasible(misaligned)).toBe(false);
        });
    });
});
