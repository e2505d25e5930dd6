import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import crypto from 'crypto';
import { mkdtempSync, rmSync } from 'fs';
import os from 'os';
import path from 'path';
import { LocalBlobStore, MemoryBlobStore, signUrl } from '../../src/services/blob-store.js';
import { FileError } from '../../src/utils/errors.js';

describe('blob stores', () => {
  describe('LocalBlobStore', () => {
    let root: string;

    beforeEach(() => {
      root = mkdtempSync(path.join(os.tmpdir(), 'layoutkb-blobs-'));
    });

    afterEach(() => {
      rmSync(root, { recursive: true, force: true });
    });

    it('stores, reads and deletes files under the root', async () => {
      const store = new LocalBlobStore({ root });
      await store.put('rag/col-1/doc-1/notes.txt', Buffer.from('hello'));

      expect((await store.get('rag/col-1/doc-1/notes.txt')).toString()).toBe('hello');

      await store.delete('rag/col-1/doc-1/notes.txt');
      await expect(store.get('rag/col-1/doc-1/notes.txt')).rejects.toBeInstanceOf(FileError);
    });

    it('refuses keys outside the root', async () => {
      const store = new LocalBlobStore({ root });
      await expect(store.put('../escape.txt', Buffer.from('x'))).rejects.toBeInstanceOf(FileError);
    });

    it('returns file URLs without a public base URL', async () => {
      const store = new LocalBlobStore({ root });
      const url = await store.presignedUrl('a/b.pdf', 60);
      expect(url.startsWith('file://')).toBe(true);
      expect(url.endsWith('/a/b.pdf')).toBe(true);
    });

    it('signs URLs under a public base URL', async () => {
      const store = new LocalBlobStore({ root, publicBaseUrl: 'https://files.example.com/', signingSecret: 'test-secret' });
      const url = new URL(await store.presignedUrl('rag/c/d/my report.pdf', 60));

      expect(url.origin).toBe('https://files.example.com');
      expect(url.pathname).toBe('/rag/c/d/my%20report.pdf');
      expect(url.searchParams.get('signature')).toMatch(/^[0-9a-f]{64}$/);
    });
  });

  describe('MemoryBlobStore', () => {
    it('keeps copies of stored buffers', async () => {
      const store = new MemoryBlobStore();
      const data = Buffer.from('original');
      await store.put('k', data);
      data.write('mutated');

      expect((await store.get('k')).toString()).toBe('original');
      await store.delete('k');
      expect(store.blobs.size).toBe(0);
    });
  });

  describe('signUrl', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it('signs the key and expiry with HMAC-SHA256', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));

      const url = signUrl('https://files.example.com', 'a.pdf', 3600, 'test-secret');
      const expected = crypto.createHmac('sha256', 'test-secret').update('a.pdf:1767229200').digest('hex');

      expect(url).toBe(`https://files.example.com/a.pdf?expires=1767229200&signature=${expected}`);
    });
  });
});
