import type { ImageBlob } from '@shared/types/capture.types';
import { EnvelopeParseError } from '../utils/errors';
import { logger } from '../utils/logger';

const BLOCK_MARKER = 0x23; // '#'

/**
 * Parse an IEEE 488.2 definite-length block `#<N><N digits><payload>` and
 * return exactly the declared payload.
 */
export function parseDefiniteBlock(data: Buffer): Buffer {
  if (data.length < 2 || data[0] !== BLOCK_MARKER) {
    throw new EnvelopeParseError('Missing block marker');
  }

  const digitCount = data[1] - 0x30;
  if (digitCount < 1 || digitCount > 9) {
    throw new EnvelopeParseError(`Invalid length-of-length '${String.fromCharCode(data[1])}'`);
  }

  const lengthField = data.toString('ascii', 2, 2 + digitCount);
  if (lengthField.length !== digitCount || !/^\d+$/.test(lengthField)) {
    throw new EnvelopeParseError(`Invalid block length field '${lengthField}'`);
  }

  const byteCount = parseInt(lengthField, 10);
  const start = 2 + digitCount;
  if (data.length - start < byteCount) {
    throw new EnvelopeParseError(
      `Block declares ${byteCount} bytes but only ${data.length - start} follow`
    );
  }

  return data.subarray(start, start + byteCount);
}

/**
 * Remove the block header if there is one. Anything that does not parse
 * cleanly is returned as it came in.
 */
export function stripIeeeBlock(data: Buffer): Buffer {
  if (data.length === 0 || data[0] !== BLOCK_MARKER) {
    return data;
  }

  try {
    return parseDefiniteBlock(data);
  } catch (error) {
    if (error instanceof EnvelopeParseError) {
      logger.warn(`Leaving image bytes untouched: ${error.message}`);
      return data;
    }
    throw error;
  }
}

export function hasBlockMarker(data: Buffer): boolean {
  return data.length > 0 && data[0] === BLOCK_MARKER;
}

/** Image bytes ready for persistence */
export function finalizeImage(blob: ImageBlob): Buffer {
  if (blob.envelope === 'ieee-block' || hasBlockMarker(blob.bytes)) {
    return stripIeeeBlock(blob.bytes);
  }
  return blob.bytes;
}
