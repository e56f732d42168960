import { promises as fs } from 'node:fs';
import sharp from 'sharp';
import type { IImageLoader, LoadedImage } from '../core/interfaces/IImageLoader';
import type { Photo } from '../core/models/photo';
import { errorMessage, ImageLoadError } from '../core/errors';

export class SharpImageLoader implements IImageLoader {
    async load(photo: Photo): Promise<LoadedImage> {
        if (!photo.filePath) {
            throw new ImageLoadError('not_found', photo.id, `Photo ${photo.id} has no file path`);
        }

        try {
            await fs.access(photo.filePath);
        } catch (err) {
            throw new ImageLoadError('not_found', photo.id, `File not found: ${photo.filePath}`, { cause: err });
        }

        try {
            // Bake EXIF orientation into the pixels so boxes line up with what the detector saw
            const { data, info } = await sharp(photo.filePath)
                .rotate()
                .toBuffer({ resolveWithObject: true });

            return { photoId: photo.id, width: info.width, height: info.height, data };
        } catch (err) {
            throw new ImageLoadError('io_error', photo.id, `Failed to decode ${photo.filePath}: ${errorMessage(err)}`, { cause: err });
        }
    }
}
