/**
 * Media Preprocessor Tests
 * Fixtures are generated with sharp in a temp directory
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import { MediaPreprocessor, extractBase64 } from '../ai/media.js';
import { MediaRejectedError } from '../ai/types.js';

let root: string;
let outside: string;
let png: Buffer;
let tinyPng: Buffer;

function solid(size: number): Promise<Buffer> {
  return sharp({ create: { width: size, height: size, channels: 3, background: { r: 200, g: 40, b: 40 } } }).png().toBuffer();
}

beforeAll(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), 'media-root-'));
  outside = await fs.mkdtemp(path.join(os.tmpdir(), 'media-outside-'));
  png = await solid(40);
  tinyPng = await solid(16);
  await fs.writeFile(path.join(root, 'page.png'), png);
  await fs.writeFile(path.join(root, 'tiny.png'), tinyPng);
  await fs.writeFile(path.join(root, 'large.bin'), Buffer.alloc(2048, 7));
  await fs.writeFile(path.join(root, 'fake.png'), 'this is only text');
  await fs.writeFile(path.join(outside, 'secret.png'), png);
  await fs.symlink(path.join(outside, 'secret.png'), path.join(root, 'link.png'));
});

afterAll(async () => {
  await fs.rm(root, { recursive: true, force: true });
  await fs.rm(outside, { recursive: true, force: true });
});

async function rejection(promise: Promise<unknown>): Promise<MediaRejectedError> {
  const error = await promise.then(() => undefined, (e: unknown) => e);
  expect(error).toBeInstanceOf(MediaRejectedError);
  if (!(error instanceof MediaRejectedError)) throw new Error('expected a MediaRejectedError');
  return error;
}

describe('extractBase64', () => {
  it('splits a data URL into type and payload', () => {
    expect(extractBase64('data:image/png;base64,AAAA')).toEqual({ mimeType: 'image/png', data: 'AAAA' });
  });

  it('rejects anything else', () => {
    expect(() => extractBase64('image/png;base64,AAAA')).toThrow('Invalid data URL format');
  });
});

describe('MediaPreprocessor', () => {
  it('loads an image inside an allowed root', async () => {
    const media = new MediaPreprocessor({ allowedRoots: [root] });
    const prepared = await media.prepare({ kind: 'path', path: path.join(root, 'page.png') });

    expect(prepared.mimeType).toBe('image/png');
    expect(prepared.width).toBe(40);
    expect(prepared.height).toBe(40);
    expect(prepared.bytes).toBe(png.length);
    expect(prepared.data).toBe(png.toString('base64'));
  });

  it('rejects a file above the size ceiling before decoding it', async () => {
    const media = new MediaPreprocessor({ allowedRoots: [root], maxBytes: 1024 });
    const error = await rejection(media.prepare({ kind: 'path', path: path.join(root, 'large.bin') }));
    expect(error.message).toBe('Media exceeds 1024 bytes (2048)');
  });

  it('rejects paths outside the allowed roots', async () => {
    const media = new MediaPreprocessor({ allowedRoots: [root] });
    const error = await rejection(media.prepare({ kind: 'path', path: path.join(outside, 'secret.png') }));
    expect(error.message).toMatch(/outside the permitted directories/);
  });

  it('rejects a symlink that escapes the allowed roots', async () => {
    const media = new MediaPreprocessor({ allowedRoots: [root] });
    const error = await rejection(media.prepare({ kind: 'path', path: path.join(root, 'link.png') }));
    expect(error.message).toMatch(/outside the permitted directories/);
  });

  it('rejects traversal out of the root', async () => {
    const media = new MediaPreprocessor({ allowedRoots: [root] });
    const traversal = path.join(root, '..', path.basename(outside), 'secret.png');
    const error = await rejection(media.prepare({ kind: 'path', path: traversal }));
    expect(error.message).toMatch(/outside the permitted directories/);
  });

  it('rejects missing files', async () => {
    const media = new MediaPreprocessor({ allowedRoots: [root] });
    const error = await rejection(media.prepare({ kind: 'path', path: path.join(root, 'missing.png') }));
    expect(error.message).toMatch(/^Media file not found/);
  });

  it('decides the type from content, not the extension', async () => {
    const media = new MediaPreprocessor({ allowedRoots: [root] });
    const error = await rejection(media.prepare({ kind: 'path', path: path.join(root, 'fake.png') }));
    expect(error.message).toBe('Unrecognized media content');
  });

  it('rejects images below the minimum dimension', async () => {
    const media = new MediaPreprocessor({ allowedRoots: [root], minDimension: 32 });
    const error = await rejection(media.prepare({ kind: 'path', path: path.join(root, 'tiny.png') }));
    expect(error.message).toBe('Image dimensions too small: 16x16');
  });

  it('accepts raw bytes and data URLs', async () => {
    const media = new MediaPreprocessor();

    const fromBytes = await media.prepare({ kind: 'bytes', data: new Uint8Array(png), label: 'upload' });
    expect(fromBytes.source).toBe('upload');
    expect(fromBytes.mimeType).toBe('image/png');

    const fromUrl = await media.prepare({ kind: 'dataUrl', url: `data:image/png;base64,${png.toString('base64')}` });
    expect(fromUrl.data).toBe(fromBytes.data);
  });

  it('rejects an oversized data URL from its encoded length', async () => {
    const media = new MediaPreprocessor({ maxBytes: 100 });
    const error = await rejection(media.prepare({ kind: 'dataUrl', url: `data:image/png;base64,${'A'.repeat(400)}` }));
    expect(error.message).toBe('Media exceeds 100 bytes');
  });

  it('stops at the first rejected reference', async () => {
    const media = new MediaPreprocessor({ allowedRoots: [root] });
    await rejection(
      media.prepareAll([
        { kind: 'path', path: path.join(root, 'page.png') },
        { kind: 'path', path: path.join(root, 'fake.png') },
      ])
    );
  });
});
