import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import { createReadStream, promises as fs, ReadStream } from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { JOURNAL_CONFIG, JournalConfig } from '../config/journal.config';

const IMAGE_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
};

// What the store needs from a Multer upload
export type UploadedImage = Pick<Express.Multer.File, 'originalname' | 'buffer'>;

export interface StoredImage {
  stream: ReadStream;
  contentType: string;
}

/**
 * Screenshot files on local disk, one unique filename per upload.
 * Callers own the returned path and must hand it back to remove().
 */
@Injectable()
export class ImageStorageService {
  private readonly logger = new Logger(ImageStorageService.name);

  constructor(@Inject(JOURNAL_CONFIG) private readonly config: JournalConfig) {}

  /**
   * Writes the upload as <imageDir>/<uuid><ext>.
   * @throws BadRequestException for anything but PNG/JPEG extensions
   */
  async save(upload: UploadedImage): Promise<string> {
    const extension = path.extname(upload.originalname).toLowerCase();
    if (!(extension in IMAGE_TYPES)) {
      throw new BadRequestException(
        `Unsupported image type "${extension || upload.originalname}". Allowed: ${Object.keys(IMAGE_TYPES).join(', ')}`,
      );
    }

    await fs.mkdir(this.config.imageDir, { recursive: true });
    const filePath = path.join(this.config.imageDir, `${uuidv4()}${extension}`);
    await fs.writeFile(filePath, upload.buffer);
    this.logger.log(`Stored image ${filePath}`);
    return filePath;
  }

  /** Deletes a stored image. Missing files are ignored, other failures only logged. */
  async remove(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
      this.logger.log(`Removed image ${filePath}`);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return;
      }
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Could not delete image ${filePath}: ${reason}`);
    }
  }

  /** Opens an image for streaming; undefined when the file is gone */
  async open(filePath: string): Promise<StoredImage | undefined> {
    if (!(await this.exists(filePath))) {
      return undefined;
    }
    const contentType = IMAGE_TYPES[path.extname(filePath).toLowerCase()] ?? 'application/octet-stream';
    return { stream: createReadStream(filePath), contentType };
  }

  private async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }
}
