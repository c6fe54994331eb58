import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import { BatchFramer } from '../BatchFramer';
import { GlobalSettings } from '../../types';
import { ClassificationError, DirectoryError } from '../../utils/errors';
import { writeFramePng, writeJpeg } from '../../__tests__/helpers/images.helper';

describe('BatchFramer', () => {
  let workDir: string;
  let inputDir: string;
  let outputDir: string;

  const settings = (overrides: Partial<GlobalSettings> = {}): GlobalSettings => ({
    inputPath: inputDir,
    outputPath: outputDir,
    debug: false,
    rotateToLandscape: false,
    landscape: {
      framePath: path.join(workDir, 'frames', 'landscape.png'),
      margins: { left: 10, top: 10, right: 10, bottom: 10 },
      scaleFactor: 1,
    },
    portrait: {
      framePath: path.join(workDir, 'frames', 'portrait.png'),
      margins: { left: 5, top: 5, right: 5, bottom: 5 },
      scaleFactor: 1,
    },
    ...overrides,
  });

  const outputs = async (): Promise<string[]> => (await fs.readdir(outputDir)).sort();

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'magnet-framer-'));
    inputDir = path.join(workDir, 'input');
    outputDir = path.join(workDir, 'output');
    await fs.mkdir(inputDir);
    await fs.mkdir(outputDir);
    await fs.mkdir(path.join(workDir, 'frames'));
    await writeFramePng(path.join(workDir, 'frames', 'landscape.png'), 180, 120);
    await writeFramePng(path.join(workDir, 'frames', 'portrait.png'), 120, 180);
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  describe('verifyDirectories', () => {
    test('accepts existing directories', async () => {
      await expect(new BatchFramer(settings()).verifyDirectories()).resolves.toBeUndefined();
    });

    test('reports a missing input directory', async () => {
      const missing = path.join(workDir, 'nope');
      const framer = new BatchFramer(settings({ inputPath: missing }));

      await expect(framer.verifyDirectories()).rejects.toThrow(DirectoryError);
      await expect(framer.verifyDirectories()).rejects.toThrow(`Input directory ${missing} does not exist`);
    });

    test('reports a missing output directory', async () => {
      const missing = path.join(workDir, 'nowhere');
      const framer = new BatchFramer(settings({ outputPath: missing }));

      await expect(framer.verifyDirectories()).rejects.toThrow(`Output directory ${missing} does not exist`);
    });

    test('rejects a file where a directory is expected', async () => {
      const file = path.join(workDir, 'not-a-dir.txt');
      await fs.writeFile(file, 'x');

      await expect(new BatchFramer(settings({ inputPath: file })).verifyDirectories()).rejects.toThrow(
        DirectoryError
      );
    });
  });

  describe('processAll', () => {
    test('frames each photograph and skips everything else', async () => {
      await writeJpeg(path.join(inputDir, 'beach.jpg'), 300, 200);
      await fs.writeFile(path.join(inputDir, 'notes.txt'), 'not a photo');
      await writeFramePng(path.join(inputDir, 'sticker.png'), 20, 10);

      const summary = await new BatchFramer(settings()).processAll();

      expect(summary.skipped).toEqual(['notes.txt', 'sticker.png']);
      expect(summary.processed).toHaveLength(1);
      expect(summary.processed[0]).toEqual({
        source: path.join(inputDir, 'beach.jpg'),
        output: path.join(outputDir, 'beach_framed.jpg'),
        orientation: 'landscape',
        rotated: false,
        snapshots: [],
      });
      expect(await outputs()).toEqual(['beach_framed.jpg']);

      const metadata = await sharp(path.join(outputDir, 'beach_framed.jpg')).metadata();
      expect(metadata.format).toBe('jpeg');
      expect(metadata.width).toBe(180);
      expect(metadata.height).toBe(120);
    });

    test('writes four numbered snapshots and the final image in debug mode', async () => {
      await writeJpeg(path.join(inputDir, 'lake.jpg'), 300, 200);

      const summary = await new BatchFramer(settings({ debug: true })).processAll();

      expect(await outputs()).toEqual([
        'lake_0_original.jpg',
        'lake_1_cropped.jpg',
        'lake_2_scaled.jpg',
        'lake_3_padded.jpg',
        'lake_4_framed.jpg',
      ]);
      expect(summary.processed[0].snapshots).toEqual([
        path.join(outputDir, 'lake_0_original.jpg'),
        path.join(outputDir, 'lake_1_cropped.jpg'),
        path.join(outputDir, 'lake_2_scaled.jpg'),
        path.join(outputDir, 'lake_3_padded.jpg'),
      ]);

      const cropped = await sharp(path.join(outputDir, 'lake_1_cropped.jpg')).metadata();
      expect(cropped.width).toBe(280);
      expect(cropped.height).toBe(180);
    });

    test('rotates portrait photographs when rotate-to-landscape is on', async () => {
      await writeJpeg(path.join(inputDir, 'tower.jpg'), 200, 300);

      const summary = await new BatchFramer(settings({ rotateToLandscape: true })).processAll();

      expect(summary.processed[0].orientation).toBe('portrait');
      expect(summary.processed[0].rotated).toBe(true);

      const metadata = await sharp(path.join(outputDir, 'tower_framed.jpg')).metadata();
      expect(metadata.width).toBe(180);
      expect(metadata.height).toBe(120);
    });

    test('uses the portrait frame for portrait photographs', async () => {
      await writeJpeg(path.join(inputDir, 'tower.jpg'), 200, 300);

      await new BatchFramer(settings()).processAll();

      const metadata = await sharp(path.join(outputDir, 'tower_framed.jpg')).metadata();
      expect(metadata.width).toBe(120);
      expect(metadata.height).toBe(180);
    });

    test('aborts the whole batch at the first square image', async () => {
      await writeJpeg(path.join(inputDir, 'a.jpg'), 300, 200);
      await writeJpeg(path.join(inputDir, 'b.jpg'), 200, 200);
      await writeJpeg(path.join(inputDir, 'c.jpg'), 300, 200);

      await expect(new BatchFramer(settings()).processAll()).rejects.toThrow(ClassificationError);
      expect(await outputs()).toEqual(['a_framed.jpg']);
    });

    test('propagates a missing frame file', async () => {
      await writeJpeg(path.join(inputDir, 'a.jpg'), 300, 200);
      const broken = settings();

      await expect(
        new BatchFramer({
          ...broken,
          landscape: { ...broken.landscape, framePath: path.join(workDir, 'frames', 'missing.png') },
        }).processAll()
      ).rejects.toThrow('missing.png');
      expect(await outputs()).toEqual([]);
    });
  });
});
