/**
 * Storage Module
 *
 * Responsibilities:
 * - Define StorageAdapter interface for result artifacts
 * - Implement FileStorageAdapter for local paths
 * - Implement S3StorageAdapter (write-only) using AWS SDK v3 for s3:// locations
 * - Implement MemoryStorageAdapter for testing
 *
 * A location is either a filesystem path or `s3://bucket/key`.
 */

import {
  S3Client,
  PutObjectCommand,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import { createHash } from 'crypto';
import { mkdir, readFile, stat, writeFile } from 'fs/promises';
import { dirname } from 'path';

/**
 * Metadata describing a stored artifact
 */
export interface ArtifactMetadata {
  location: string;
  createdAt: string;
  contentType: string;
  size?: number;
  checksum?: string;
}

/**
 * Sink for result artifacts. The crawl only ever writes.
 */
export interface StorageAdapter {
  save(location: string, content: string, metadata?: { contentType?: string }): Promise<ArtifactMetadata>;
}

/**
 * S3 configuration for storage adapter
 */
export interface S3Config {
  /** AWS region (defaults to AWS_REGION or us-east-1) */
  region?: string;
  /** Custom S3 endpoint for S3-compatible services */
  endpoint?: string;
  /** AWS credentials (optional if using IAM roles or environment variables) */
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
  /** Force path style for S3-compatible services like MinIO */
  forcePathStyle?: boolean;
}

const DEFAULT_CONTENT_TYPE = 'application/json';

/**
 * Calculate MD5 checksum for content
 */
function calculateChecksum(content: string): string {
  return createHash('md5').update(Buffer.from(content, 'utf-8')).digest('hex');
}

function getContentSize(content: string): number {
  return Buffer.byteLength(content, 'utf-8');
}

export function isS3Location(location: string): boolean {
  return location.startsWith('s3://');
}

/**
 * Split `s3://bucket/key` into its parts
 */
export function parseS3Location(location: string): { bucket: string; key: string } {
  const match = /^s3:\/\/([^/]+)\/(.+)$/.exec(location);
  if (!match || !match[1] || !match[2]) {
    throw new Error(`Invalid S3 location: ${location}`);
  }
  return { bucket: match[1], key: match[2] };
}

// ============================================================================
// File Storage
// ============================================================================

export class FileStorageAdapter implements StorageAdapter {
  async save(location: string, content: string, metadata?: { contentType?: string }): Promise<ArtifactMetadata> {
    await mkdir(dirname(location), { recursive: true });
    await writeFile(location, content, 'utf-8');
    return {
      location,
      createdAt: new Date().toISOString(),
      contentType: metadata?.contentType ?? DEFAULT_CONTENT_TYPE,
      size: getContentSize(content),
      checksum: calculateChecksum(content),
    };
  }

  async load(location: string): Promise<{ content: string; metadata: ArtifactMetadata }> {
    const [content, info] = await Promise.all([readFile(location, 'utf-8'), stat(location)]);
    return {
      content,
      metadata: {
        location,
        createdAt: info.mtime.toISOString(),
        contentType: DEFAULT_CONTENT_TYPE,
        size: info.size,
        checksum: calculateChecksum(content),
      },
    };
  }

  async exists(location: string): Promise<boolean> {
    try {
      await stat(location);
      return true;
    } catch (error: unknown) {
      // fs errors are not `instanceof Error` across Jest realms
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }
}

// ============================================================================
// S3 Storage
// ============================================================================

/**
 * S3 implementation of StorageAdapter using AWS SDK v3
 */
export class S3StorageAdapter implements StorageAdapter {
  private client: S3Client;

  constructor(config: S3Config = {}) {
    const clientConfig: S3ClientConfig = {
      region: config.region ?? process.env.AWS_REGION ?? 'us-east-1',
    };

    if (config.endpoint) {
      clientConfig.endpoint = config.endpoint;
    }

    if (config.credentials) {
      clientConfig.credentials = config.credentials;
    }

    if (config.forcePathStyle) {
      clientConfig.forcePathStyle = true;
    }

    this.client = new S3Client(clientConfig);
  }

  async save(location: string, content: string, metadata?: { contentType?: string }): Promise<ArtifactMetadata> {
    const { bucket, key } = parseS3Location(location);
    const now = new Date().toISOString();
    const checksum = calculateChecksum(content);
    const contentType = metadata?.contentType ?? DEFAULT_CONTENT_TYPE;

    await this.client.send(
      new PutObjectCommand({
        Bucket: bucket,
        Key: key,
        Body: content,
        ContentType: contentType,
        Metadata: {
          'created-at': now,
          checksum,
        },
      })
    );

    return {
      location,
      createdAt: now,
      contentType,
      size: getContentSize(content),
      checksum,
    };
  }
}

// ============================================================================
// Memory Storage
// ============================================================================

/**
 * In-memory storage adapter for testing
 */
export class MemoryStorageAdapter implements StorageAdapter {
  private store: Map<string, { content: string; metadata: ArtifactMetadata }> = new Map();

  async save(location: string, content: string, metadata?: { contentType?: string }): Promise<ArtifactMetadata> {
    const artifactMetadata: ArtifactMetadata = {
      location,
      createdAt: new Date().toISOString(),
      contentType: metadata?.contentType ?? DEFAULT_CONTENT_TYPE,
      size: getContentSize(content),
      checksum: calculateChecksum(content),
    };
    this.store.set(location, { content, metadata: artifactMetadata });
    return artifactMetadata;
  }

  async load(location: string): Promise<{ content: string; metadata: ArtifactMetadata }> {
    const item = this.store.get(location);
    if (!item) {
      throw new Error(`Artifact not found: ${location}`);
    }
    return item;
  }

  async exists(location: string): Promise<boolean> {
    return this.store.has(location);
  }

  /**
   * Clear all stored artifacts (useful for test cleanup)
   */
  clear(): void {
    this.store.clear();
  }

  /**
   * Get all stored locations (useful for debugging)
   */
  keys(): string[] {
    return Array.from(this.store.keys());
  }
}

/**
 * Pick the adapter for an output location
 */
export function createStorageAdapter(location: string, s3Config: S3Config = {}): StorageAdapter {
  return isS3Location(location) ? new S3StorageAdapter(s3Config) : new FileStorageAdapter();
}
