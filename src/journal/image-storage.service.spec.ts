import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { BadRequestException } from '@nestjs/common';
import { ImageStorageService } from './image-storage.service';

describe('ImageStorageService', () => {
  let workDir: string;
  let imageDir: string;
  let service: ImageStorageService;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'journal-images-'));
    imageDir = path.join(workDir, 'trade_images');
    service = new ImageStorageService({ dataFile: path.join(workDir, 'journal.json'), imageDir, port: 3000 });
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  describe('save', () => {
    it('should write the bytes under a unique name with the original extension', async () => {
      const filePath = await service.save({ originalname: 'chart.png', buffer: Buffer.from('png-bytes') });

      expect(path.dirname(filePath)).toBe(imageDir);
      expect(path.basename(filePath)).toMatch(/^[0-9a-f-]{36}\.png$/);
      expect(fs.readFileSync(filePath, 'utf8')).toBe('png-bytes');
    });

    it('should never reuse a filename', async () => {
      const first = await service.save({ originalname: 'chart.png', buffer: Buffer.from('a') });
      const second = await service.save({ originalname: 'chart.png', buffer: Buffer.from('b') });

      expect(first).not.toBe(second);
    });

    it('should lower-case the extension', async () => {
      const filePath = await service.save({ originalname: 'Entry.JPEG', buffer: Buffer.from('jpeg') });
      expect(path.extname(filePath)).toBe('.jpeg');
    });

    it('should reject other file types', async () => {
      await expect(service.save({ originalname: 'notes.pdf', buffer: Buffer.from('pdf') }))
        .rejects.toThrow(BadRequestException);
      await expect(service.save({ originalname: 'noextension', buffer: Buffer.from('x') }))
        .rejects.toThrow('Unsupported image type "noextension"');
      expect(fs.existsSync(imageDir)).toBe(false);
    });
  });

  describe('remove', () => {
    it('should delete a stored image', async () => {
      const filePath = await service.save({ originalname: 'chart.png', buffer: Buffer.from('png') });

      await service.remove(filePath);

      expect(fs.existsSync(filePath)).toBe(false);
    });

    it('should ignore a file that is already gone', async () => {
      await expect(service.remove(path.join(imageDir, 'gone.png'))).resolves.toBeUndefined();
    });

    it('should not throw when the path cannot be unlinked', async () => {
      const directory = path.join(workDir, 'not-a-file.png');
      fs.mkdirSync(directory);

      await expect(service.remove(directory)).resolves.toBeUndefined();
      expect(fs.existsSync(directory)).toBe(true);
    });
  });

  describe('open', () => {
    it('should stream a stored image with its MIME type', async () => {
      const filePath = await service.save({ originalname: 'chart.jpg', buffer: Buffer.from('jpg') });

      const image = await service.open(filePath);

      expect(image?.contentType).toBe('image/jpeg');
      image?.stream.destroy();
    });

    it('should return undefined for a missing file', async () => {
      await expect(service.open(path.join(imageDir, 'gone.png'))).resolves.toBeUndefined();
    });
  });
});
