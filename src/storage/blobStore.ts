import { mkdir, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import { BlobServiceClient, ContainerClient } from '@azure/storage-blob';

/**
 * Durable storage for exported files. `upload` resolves to a URL the user can
 * fetch the file from.
 */
export interface BlobStore {
  upload(name: string, body: Buffer, contentType: string, signal?: AbortSignal): Promise<string>;
}

/**
 * Azure Blob Storage. When a public base URL is configured (for example a CDN
 * in front of the account) links are built from it, otherwise from the blob's
 * own URL.
 */
export class AzureBlobStore implements BlobStore {
  private readonly container: ContainerClient;
  private readonly publicBaseUrl?: string;

  constructor(connectionString: string, containerName: string, publicBaseUrl?: string) {
    this.container = BlobServiceClient
      .fromConnectionString(connectionString)
      .getContainerClient(containerName);
    this.publicBaseUrl = publicBaseUrl?.replace(/\/+$/, '');
  }

  async upload(name: string, body: Buffer, contentType: string, signal?: AbortSignal): Promise<string> {
    const blob = this.container.getBlockBlobClient(name);
    await blob.uploadData(body, {
      blobHTTPHeaders: { blobContentType: contentType },
      abortSignal: signal
    });

    return this.publicBaseUrl
      ? `${this.publicBaseUrl}/${this.container.containerName}/${name}`
      : blob.url;
  }
}

/**
 * Local filesystem storage, served by the HTTP layer under /exports.
 * Only works where the filesystem is writable and shared with the server.
 */
export class LocalBlobStore implements BlobStore {
  private readonly rootDir: string;
  private readonly publicBaseUrl: string;

  constructor(rootDir: string, publicBaseUrl: string) {
    this.rootDir = resolve(rootDir);
    this.publicBaseUrl = publicBaseUrl.replace(/\/+$/, '');
  }

  get directory(): string {
    return this.rootDir;
  }

  async upload(name: string, body: Buffer, _contentType: string, signal?: AbortSignal): Promise<string> {
    await mkdir(this.rootDir, { recursive: true });
    await writeFile(join(this.rootDir, name), body, { signal });
    return `${this.publicBaseUrl}/${encodeURIComponent(name)}`;
  }
}
