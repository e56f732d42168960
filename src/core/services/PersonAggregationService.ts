import type { PersonFaceQualityAnalysis, PersonIdentity } from '../models/analysis';
import { mean } from '../models/geometry';
import { DEFAULT_THRESHOLDS, type AggregationThresholds } from '../models/thresholds';

export interface AggregationResult {
    personAnalyses: Map<string, PersonFaceQualityAnalysis>;
    overallImprovementPotential: number;
}

export class PersonAggregationService {
    /**
     * Best and worst face of one person. Null when the person has too few
     * faces or the spread between them is noise.
     */
    static analyzePerson(identity: PersonIdentity, t: AggregationThresholds = DEFAULT_THRESHOLDS.aggregation): PersonFaceQualityAnalysis | null {
        if (identity.faces.length < t.minFacesPerPerson) return null;

        let best = identity.faces[0];
        let worst = identity.faces[0];
        for (const face of identity.faces) {
            if (face.compositeScore > best.compositeScore) best = face;
            if (face.compositeScore < worst.compositeScore) worst = face;
        }

        const improvementPotential = Math.max(0, best.compositeScore - worst.compositeScore);
        if (improvementPotential <= t.minImprovementPotential) return null;

        return {
            personId: identity.id,
            allFaces: [...identity.faces],
            bestFace: best,
            worstFace: worst,
            improvementPotential
        };
    }

    static aggregate(identities: readonly PersonIdentity[], t: AggregationThresholds = DEFAULT_THRESHOLDS.aggregation): AggregationResult {
        const personAnalyses = new Map<string, PersonFaceQualityAnalysis>();
        for (const identity of identities) {
            const analysis = this.analyzePerson(identity, t);
            if (analysis) personAnalyses.set(identity.id, analysis);
        }

        const potentials = [...personAnalyses.values()].map(p => p.improvementPotential);
        return {
            personAnalyses,
            overallImprovementPotential: Math.min(1, mean(potentials))
        };
    }

    static qualityGain(analysis: PersonFaceQualityAnalysis): number {
        return analysis.bestFace.compositeScore - analysis.worstFace.compositeScore;
    }

    static shouldReplace(analysis: PersonFaceQualityAnalysis): boolean {
        return analysis.improvementPotential > 0.4 && this.qualityGain(analysis) > 0.2;
    }
}
