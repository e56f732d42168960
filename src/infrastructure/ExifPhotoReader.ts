import { promises as fs } from 'node:fs';
import { ExifDateTime, ExifTool } from 'exiftool-vendored';
import type { Photo } from '../core/models/photo';
import { sortPhotosCanonically } from '../core/models/photo';
import logger from '../logger';

function toDate(value: unknown): Date | null {
    if (value instanceof ExifDateTime) return value.toDate();
    if (typeof value === 'string') {
        const parsed = new Date(value);
        return Number.isNaN(parsed.getTime()) ? null : parsed;
    }
    return null;
}

function toDimension(value: unknown): number | undefined {
    return typeof value === 'number' && value > 0 ? value : undefined;
}

/**
 * Builds `Photo`s from image files, taking the capture time from EXIF.
 */
export class ExifPhotoReader {
    private static _exiftool: ExifTool | null = null;

    static getExifTool(): ExifTool {
        if (!this._exiftool) {
            logger.info('[ExifPhotoReader] Starting ExifTool');
            this._exiftool = new ExifTool({ taskTimeoutMillis: 5000, maxProcs: 1 });
        }
        return this._exiftool;
    }

    /** Capture time from DateTimeOriginal, then CreateDate, then the file's mtime. */
    static async readPhoto(filePath: string, id: string = filePath): Promise<Photo> {
        let timestamp: Date | null = null;
        let width: number | undefined;
        let height: number | undefined;

        try {
            const tags = await this.getExifTool().read(filePath);
            timestamp = toDate(tags.DateTimeOriginal) ?? toDate(tags.CreateDate);
            width = toDimension(tags.ImageWidth);
            height = toDimension(tags.ImageHeight);
        } catch (err) {
            logger.warn(`[ExifPhotoReader] Could not read metadata for ${filePath}:`, err);
        }

        if (!timestamp) {
            const stats = await fs.stat(filePath);
            timestamp = stats.mtime;
        }

        return { id, filePath, timestamp, width, height };
    }

    /** Photos in canonical order; unreadable files are skipped. */
    static async readPhotos(filePaths: readonly string[]): Promise<Photo[]> {
        const photos: Photo[] = [];
        for (const filePath of filePaths) {
            try {
                photos.push(await this.readPhoto(filePath));
            } catch (err) {
                logger.error(`[ExifPhotoReader] Skipping ${filePath}:`, err);
            }
        }
        return sortPhotosCanonically(photos);
    }

    static async shutdown() {
        if (!this._exiftool) return;
        await this._exiftool.end();
        this._exiftool = null;
    }
}
