import { getDB } from '../../db';
import type { FaceQualityRecord } from '../../core/models/face';
import { errorMessage } from '../../core/errors';

interface FaceQualityRow {
    photo_id: string;
    detection_index: number;
    face_id: string;
    photo_timestamp: string;
    box_x: number;
    box_y: number;
    box_width: number;
    box_height: number;
    capture_quality: number;
    left_eye_open: number;
    right_eye_open: number;
    eye_confidence: number;
    expression_intensity: number;
    expression_naturalness: number;
    expression_confidence: number;
    pitch: number;
    yaw: number;
    roll: number;
    sharpness: number;
    composite_score: number;
    rank: number;
}

/**
 * Ranked face scores per photo. Identities are never stored here; they only
 * live for one cluster analysis.
 */
export class FaceQualityRepository {
    private static parseFace(row: FaceQualityRow): FaceQualityRecord {
        return {
            id: row.face_id,
            photoId: row.photo_id,
            photoTimestamp: new Date(row.photo_timestamp),
            detectionIndex: row.detection_index,
            boundingBox: { x: row.box_x, y: row.box_y, width: row.box_width, height: row.box_height },
            captureQuality: row.capture_quality,
            eyeState: { leftOpen: !!row.left_eye_open, rightOpen: !!row.right_eye_open, confidence: row.eye_confidence },
            expression: {
                intensity: row.expression_intensity,
                naturalness: row.expression_naturalness,
                confidence: row.expression_confidence
            },
            pose: { pitch: row.pitch, yaw: row.yaw, roll: row.roll },
            sharpness: row.sharpness,
            compositeScore: row.composite_score
        };
    }

    /** Replace the stored faces of a photo; `ranked` is best first. */
    static saveFaces(photoId: string, ranked: readonly FaceQualityRecord[]) {
        const db = getDB();
        const insert = db.prepare(`
            INSERT INTO face_quality (
                photo_id, detection_index, face_id, photo_timestamp,
                box_x, box_y, box_width, box_height, capture_quality,
                left_eye_open, right_eye_open, eye_confidence,
                expression_intensity, expression_naturalness, expression_confidence,
                pitch, yaw, roll, sharpness, composite_score, rank
            ) VALUES (
                @photo_id, @detection_index, @face_id, @photo_timestamp,
                @box_x, @box_y, @box_width, @box_height, @capture_quality,
                @left_eye_open, @right_eye_open, @eye_confidence,
                @expression_intensity, @expression_naturalness, @expression_confidence,
                @pitch, @yaw, @roll, @sharpness, @composite_score, @rank
            )
        `);

        const replace = db.transaction((faces: readonly FaceQualityRecord[]) => {
            db.prepare('DELETE FROM face_quality WHERE photo_id = ?').run(photoId);
            faces.forEach((face, rank) => {
                const row: FaceQualityRow = {
                    photo_id: photoId,
                    detection_index: face.detectionIndex,
                    face_id: face.id,
                    photo_timestamp: face.photoTimestamp.toISOString(),
                    box_x: face.boundingBox.x,
                    box_y: face.boundingBox.y,
                    box_width: face.boundingBox.width,
                    box_height: face.boundingBox.height,
                    capture_quality: face.captureQuality,
                    left_eye_open: face.eyeState.leftOpen ? 1 : 0,
                    right_eye_open: face.eyeState.rightOpen ? 1 : 0,
                    eye_confidence: face.eyeState.confidence,
                    expression_intensity: face.expression.intensity,
                    expression_naturalness: face.expression.naturalness,
                    expression_confidence: face.expression.confidence,
                    pitch: face.pose.pitch,
                    yaw: face.pose.yaw,
                    roll: face.pose.roll,
                    sharpness: face.sharpness,
                    composite_score: face.compositeScore,
                    rank
                };
                insert.run(row);
            });
        });

        try {
            replace(ranked);
        } catch (error) {
            throw new Error(`FaceQualityRepository.saveFaces failed: ${errorMessage(error)}`, { cause: error });
        }
    }

    static getFacesByPhoto(photoId: string): FaceQualityRecord[] {
        try {
            const rows = getDB()
                .prepare<[string], FaceQualityRow>('SELECT * FROM face_quality WHERE photo_id = ? ORDER BY rank ASC')
                .all(photoId);
            return rows.map(r => this.parseFace(r));
        } catch (error) {
            throw new Error(`FaceQualityRepository.getFacesByPhoto failed: ${errorMessage(error)}`, { cause: error });
        }
    }

    /** Best faces across every stored photo. */
    static getTopFaces(limit = 20): FaceQualityRecord[] {
        try {
            const rows = getDB()
                .prepare<[number], FaceQualityRow>('SELECT * FROM face_quality ORDER BY composite_score DESC, photo_id ASC, detection_index ASC LIMIT ?')
                .all(limit);
            return rows.map(r => this.parseFace(r));
        } catch (error) {
            throw new Error(`FaceQualityRepository.getTopFaces failed: ${errorMessage(error)}`, { cause: error });
        }
    }

    static deleteByPhoto(photoId: string): number {
        try {
            return getDB().prepare('DELETE FROM face_quality WHERE photo_id = ?').run(photoId).changes;
        } catch (error) {
            throw new Error(`FaceQualityRepository.deleteByPhoto failed: ${errorMessage(error)}`, { cause: error });
        }
    }

    static countFaces(): number {
        const row = getDB().prepare<[], { count: number }>('SELECT COUNT(*) as count FROM face_quality').get();
        return row ? row.count : 0;
    }
}
