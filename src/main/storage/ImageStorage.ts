import { promises as fs } from 'fs';
import { dirname, extname } from 'path';
import { PNG } from 'pngjs';
import bmp from 'bmp-js';
import type { ImageBlob } from '@shared/types/capture.types';
import { StorageError, getErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export type ImageFormat = 'png' | 'bmp' | 'unknown';

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

export function sniffImageFormat(bytes: Buffer): ImageFormat {
  if (bytes.length >= PNG_SIGNATURE.length && bytes.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE)) {
    return 'png';
  }
  if (bytes.length >= 2 && bytes[0] === 0x42 && bytes[1] === 0x4d) {
    return 'bmp';
  }
  return 'unknown';
}

function splitExtension(path: string): [root: string, ext: string] {
  const ext = extname(path);
  return [ext ? path.slice(0, -ext.length) : path, ext];
}

export function withExtension(path: string, ext: string): string {
  return `${splitExtension(path)[0]}${ext}`;
}

const pad = (value: number): string => String(value).padStart(2, '0');

/** `captures/shot.png` -> `captures/shot_20261019_140509.png`, local time */
export function timestampedPath(template: string, now: Date): string {
  const [root, ext] = splitExtension(template);
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `_${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `${root}_${stamp}${ext}`;
}

type OutputFormat = Exclude<ImageFormat, 'unknown'>;
type DecodedBmp = ReturnType<typeof bmp.decode>;

/** Output format from the path's extension; anything but `.bmp` is written as PNG */
function outputFor(path: string): { format: OutputFormat; path: string } {
  const ext = extname(path).toLowerCase();
  if (ext === '.bmp') {
    return { format: 'bmp', path };
  }
  return { format: 'png', path: ext === '.png' ? path : withExtension(path, '.png') };
}

function bitmapToPng(bitmap: DecodedBmp): PNG {
  const png = new PNG({ width: bitmap.width, height: bitmap.height });
  for (let i = 0; i < png.data.length; i += 4) {
    png.data[i] = bitmap.data[i + 3];
    png.data[i + 1] = bitmap.data[i + 2];
    png.data[i + 2] = bitmap.data[i + 1];
    png.data[i + 3] = bitmap.is_with_alpha ? bitmap.data[i] : 0xff;
  }
  return png;
}

function pngToBitmap(png: PNG): Buffer {
  const abgr = Buffer.alloc(png.data.length);
  for (let i = 0; i < png.data.length; i += 4) {
    abgr[i] = png.data[i + 3];
    abgr[i + 1] = png.data[i + 2];
    abgr[i + 2] = png.data[i + 1];
    abgr[i + 3] = png.data[i];
  }
  return bmp.encode({ data: abgr, width: png.width, height: png.height }).data;
}

/**
 * Writes captured screens to disk in the format the path asks for. PNG and
 * BMP payloads are decoded and re-encoded; bytes that do not decode are
 * stored as received, under `.png` when they carry a PNG signature and
 * `.bmp` otherwise.
 */
export class ImageStorage {
  async persist(blob: ImageBlob, resolvedPath: string): Promise<string> {
    try {
      await fs.mkdir(dirname(resolvedPath), { recursive: true });
    } catch (error) {
      throw new StorageError(`Failed to create directory for ${resolvedPath}`, error);
    }

    const source = sniffImageFormat(blob.bytes);
    const pixels = this.decode(blob.bytes, source);
    if (pixels) {
      const output = outputFor(resolvedPath);
      const encoded = output.format === 'png' ? PNG.sync.write(pixels) : pngToBitmap(pixels);
      return this.write(output.path, encoded);
    }

    if (source === 'unknown') {
      logger.warn(`Unrecognised image format (${blob.bytes.length} bytes), saving raw`);
    }
    return this.write(withExtension(resolvedPath, source === 'png' ? '.png' : '.bmp'), blob.bytes);
  }

  /** RGBA pixels of the payload, or null when it does not decode */
  private decode(bytes: Buffer, format: ImageFormat): PNG | null {
    if (format === 'unknown') {
      return null;
    }

    try {
      const png = format === 'png' ? PNG.sync.read(bytes) : bitmapToPng(bmp.decode(bytes));
      logger.info(`Image: ${png.width}x${png.height} ${format.toUpperCase()}`);
      return png;
    } catch (error) {
      logger.warn(`${format.toUpperCase()} decode failed, saving raw bytes: ${getErrorMessage(error)}`);
      return null;
    }
  }

  private async write(path: string, bytes: Buffer): Promise<string> {
    try {
      await fs.writeFile(path, bytes);
    } catch (error) {
      throw new StorageError(`Failed to write image to ${path}`, error);
    }
    logger.info(`Screenshot saved: ${path} (${bytes.length} bytes)`);
    return path;
  }
}
