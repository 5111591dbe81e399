import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import path from 'path';
import os from 'os';
import fs from 'fs/promises';

import { encodeImage, getMimeType } from '../../../L2-clients/llm/imageUtils.js';

// ============================================================================
// getMimeType tests
// ============================================================================
describe('getMimeType', () => {
  it('maps known extensions', () => {
    expect(getMimeType('/shots/a.png')).toBe('image/png');
    expect(getMimeType('/shots/a.jpg')).toBe('image/jpeg');
    expect(getMimeType('/shots/a.jpeg')).toBe('image/jpeg');
    expect(getMimeType('/shots/a.gif')).toBe('image/gif');
    expect(getMimeType('/shots/a.webp')).toBe('image/webp');
  });

  it('ignores extension case', () => {
    expect(getMimeType('/shots/A.PNG')).toBe('image/png');
    expect(getMimeType('/shots/A.WebP')).toBe('image/webp');
  });

  it('defaults to JPEG for unknown or missing extensions', () => {
    expect(getMimeType('/shots/a.bmp')).toBe('image/jpeg');
    expect(getMimeType('/shots/screenshot')).toBe('image/jpeg');
  });
});

// ============================================================================
// encodeImage tests
// ============================================================================
describe('encodeImage', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'imageUtils-test-'));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('base64-encodes the raw bytes', async () => {
    const pngPath = path.join(tempDir, 'tiny.png');
    await fs.writeFile(pngPath, Buffer.from([1, 2, 3]));

    await expect(encodeImage(pngPath)).resolves.toEqual({
      base64: 'AQID',
      mimeType: 'image/png',
      path: pngPath,
    });
  });

  it('rejects for a missing file', async () => {
    const missing = path.join(tempDir, 'missing.jpg');
    await expect(encodeImage(missing)).rejects.toThrow(`File not found: ${missing}`);
  });
});
