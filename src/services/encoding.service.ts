export type Encoding = 'utf-8' | 'utf-8-bom' | 'iso-8859-1';

export interface EncodingDetectionResult {
  encoding: Encoding;
  hasBom: boolean;
}

function startsWithBom(buffer: Buffer): boolean {
  return buffer.length >= 3 && buffer[0] === 0xef && buffer[1] === 0xbb && buffer[2] === 0xbf;
}

/**
 * Detects the encoding of an uploaded spreadsheet by checking for a BOM and validating UTF-8
 * @param buffer - File contents, or the first chunk of them
 */
export function detectEncoding(buffer: Buffer): EncodingDetectionResult {
  if (startsWithBom(buffer)) {
    return {
      encoding: 'utf-8-bom',
      hasBom: true,
    };
  }

  // Invalid UTF-8 sequences decode to replacement characters
  if (!buffer.toString('utf-8').includes('\uFFFD')) {
    return {
      encoding: 'utf-8',
      hasBom: false,
    };
  }

  // Spreadsheet exports from older tools are often Latin-1
  return {
    encoding: 'iso-8859-1',
    hasBom: false,
  };
}

/**
 * Removes UTF-8 BOM from buffer if present
 */
export function removeBom(buffer: Buffer): Buffer {
  return startsWithBom(buffer) ? buffer.subarray(3) : buffer;
}

/**
 * Converts buffer to string using the specified encoding
 */
export function decodeBuffer(buffer: Buffer, encoding: Encoding): string {
  if (encoding === 'iso-8859-1') {
    return buffer.toString('latin1');
  }
  return removeBom(buffer).toString('utf-8');
}
