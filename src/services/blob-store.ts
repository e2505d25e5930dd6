import { promises as fs } from 'fs';
import crypto from 'crypto';
import path from 'path';
import { pathToFileURL } from 'url';
import { FileError } from '../utils/errors.js';

/**
 * Opaque object storage with presigned read URLs
 */
export interface BlobStore {
  put(key: string, data: Buffer, contentType?: string): Promise<void>;
  get(key: string): Promise<Buffer>;
  delete(key: string): Promise<void>;
  presignedUrl(key: string, expiresInSeconds: number): Promise<string>;
}

export interface LocalBlobStoreOptions {
  root: string;
  publicBaseUrl?: string;
  signingSecret?: string;
}

/**
 * Filesystem blob store. URLs are HMAC-signed when a public base URL is configured,
 * otherwise plain file:// URLs.
 */
export class LocalBlobStore implements BlobStore {
  private root: string;

  constructor(private options: LocalBlobStoreOptions) {
    this.root = path.resolve(options.root);
  }

  private resolveKey(key: string): string {
    const target = path.resolve(this.root, key);
    if (target !== this.root && !target.startsWith(this.root + path.sep)) {
      throw new FileError(`Blob key escapes storage root: ${key}`);
    }
    return target;
  }

  async put(key: string, data: Buffer): Promise<void> {
    const target = this.resolveKey(key);
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, data);
    } catch (error) {
      throw new FileError(`Failed to store blob ${key}: ${String(error)}`);
    }
  }

  async get(key: string): Promise<Buffer> {
    try {
      return await fs.readFile(this.resolveKey(key));
    } catch (error) {
      throw new FileError(`Failed to read blob ${key}: ${String(error)}`);
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await fs.rm(this.resolveKey(key), { force: true });
    } catch (error) {
      throw new FileError(`Failed to delete blob ${key}: ${String(error)}`);
    }
  }

  async presignedUrl(key: string, expiresInSeconds: number): Promise<string> {
    const { publicBaseUrl, signingSecret } = this.options;
    if (!publicBaseUrl) {
      return pathToFileURL(this.resolveKey(key)).toString();
    }
    return signUrl(publicBaseUrl, key, expiresInSeconds, signingSecret ?? '');
  }
}

/**
 * Blob store kept in a Map; used by tests and ephemeral runs
 */
export class MemoryBlobStore implements BlobStore {
  readonly blobs = new Map<string, Buffer>();

  constructor(private baseUrl = 'https://blobs.local') {}

  async put(key: string, data: Buffer): Promise<void> {
    this.blobs.set(key, Buffer.from(data));
  }

  async get(key: string): Promise<Buffer> {
    const blob = this.blobs.get(key);
    if (!blob) {
      throw new FileError(`Blob not found: ${key}`);
    }
    return blob;
  }

  async delete(key: string): Promise<void> {
    this.blobs.delete(key);
  }

  async presignedUrl(key: string, expiresInSeconds: number): Promise<string> {
    return signUrl(this.baseUrl, key, expiresInSeconds, 'memory');
  }
}

export function signUrl(baseUrl: string, key: string, expiresInSeconds: number, secret: string): string {
  const expires = Math.floor(Date.now() / 1000) + expiresInSeconds;
  const signature = crypto.createHmac('sha256', secret).update(`${key}:${expires}`).digest('hex');
  const encodedKey = key.split('/').map(encodeURIComponent).join('/');
  return `${baseUrl.replace(/\/+$/, '')}/${encodedKey}?expires=${expires}&signature=${signature}`;
}
