/**
 * Storage Module
 *
 * Responsibilities:
 * - StorageAdapter implementations for batch run artifacts
 * - S3StorageAdapter using AWS SDK v3
 * - MemoryStorageAdapter for tests and local runs
 * - Checksums and sizes recorded with every artifact
 *
 * Layout:
 * - {prefix}/{run_id}/input.csv
 * - {prefix}/{run_id}/results.json
 * - {prefix}/{run_id}/output.csv
 * - {prefix}/{run_id}/run_artifact.json
 *
 * Usage:
 * ```typescript
 * const storage = new S3StorageAdapter({ bucket: 'outreach-runs' });
 * await storage.save(runId, 'output', csv, { contentType: 'text/csv' });
 * ```
 */

import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  DeleteObjectCommand,
  ListObjectsV2Command,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import { createHash } from 'crypto';
import type { ArtifactMetadata, ArtifactType, RunId, StorageAdapter } from '../types/index.js';

export type { ArtifactType, StorageAdapter };

export const ARTIFACT_FILE_NAMES: Record<ArtifactType, string> = {
  input: 'input.csv',
  results: 'results.json',
  output: 'output.csv',
  run_artifact: 'run_artifact.json',
};

const DEFAULT_CONTENT_TYPES: Record<ArtifactType, string> = {
  input: 'text/csv',
  results: 'application/json',
  output: 'text/csv',
  run_artifact: 'application/json',
};

export interface S3Config {
  bucket: string;
  /** AWS region (default: us-east-1) */
  region?: string;
  /** Key prefix for all objects (default: enrichment-runs) */
  prefix?: string;
  /** Custom endpoint for S3-compatible services */
  endpoint?: string;
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
  /** Path-style addressing for services like MinIO */
  forcePathStyle?: boolean;
}

export interface SaveOptions {
  contentType?: string;
}

/**
 * Raised when an artifact that must exist does not
 */
export class ArtifactNotFoundError extends Error {
  readonly code = 'STORAGE_ERROR';

  constructor(runId: RunId, artifactType: ArtifactType) {
    super(`Artifact not found: ${runId}/${artifactType}`);
    this.name = 'ArtifactNotFoundError';
  }
}

function calculateChecksum(content: string | Buffer): string {
  const buffer = typeof content === 'string' ? Buffer.from(content, 'utf-8') : content;
  return createHash('md5').update(buffer).digest('hex');
}

function getContentSize(content: string | Buffer): number {
  return typeof content === 'string' ? Buffer.byteLength(content, 'utf-8') : content.length;
}

/**
 * Artifact type stored under a file name, or null for foreign objects
 */
export function artifactTypeForFile(fileName: string): ArtifactType | null {
  for (const [type, name] of Object.entries(ARTIFACT_FILE_NAMES)) {
    if (name === fileName && isArtifactType(type)) {
      return type;
    }
  }
  return null;
}

function isArtifactType(value: string): value is ArtifactType {
  return value in ARTIFACT_FILE_NAMES;
}

function describeArtifact(
  runId: RunId,
  artifactType: ArtifactType,
  content: string | Buffer,
  createdAt: string,
  options: SaveOptions = {}
): ArtifactMetadata {
  return {
    runId,
    artifactType,
    fileName: ARTIFACT_FILE_NAMES[artifactType],
    createdAt,
    contentType: options.contentType ?? DEFAULT_CONTENT_TYPES[artifactType],
    size: getContentSize(content),
    checksum: calculateChecksum(content),
  };
}

function isNotFound(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return (
    error.name === 'NotFound' ||
    error.name === 'NoSuchKey' ||
    error.message.includes('404') ||
    error.message.includes('Not Found')
  );
}

// ============================================================================
// S3
// ============================================================================

export class S3StorageAdapter implements StorageAdapter {
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly prefix: string;

  constructor(config: S3Config, client?: S3Client) {
    this.bucket = config.bucket;
    this.prefix = config.prefix ?? 'enrichment-runs';

    const clientConfig: S3ClientConfig = {
      region: config.region ?? 'us-east-1',
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

    this.client = client ?? new S3Client(clientConfig);
  }

  keyFor(runId: RunId, artifactType: ArtifactType): string {
    return `${this.prefix}/${runId}/${ARTIFACT_FILE_NAMES[artifactType]}`;
  }

  async save(
    runId: RunId,
    artifactType: ArtifactType,
    content: string | Buffer,
    options?: SaveOptions
  ): Promise<ArtifactMetadata> {
    const metadata = describeArtifact(runId, artifactType, content, new Date().toISOString(), options);

    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: this.keyFor(runId, artifactType),
        Body: content,
        ContentType: metadata.contentType,
        Metadata: {
          'run-id': runId,
          'artifact-type': artifactType,
          'created-at': metadata.createdAt,
          checksum: metadata.checksum ?? '',
        },
      })
    );

    return metadata;
  }

  async load(runId: RunId, artifactType: ArtifactType): Promise<{ content: string; metadata: ArtifactMetadata }> {
    const response = await this.client
      .send(new GetObjectCommand({ Bucket: this.bucket, Key: this.keyFor(runId, artifactType) }))
      .catch((error: unknown) => {
        throw isNotFound(error) ? new ArtifactNotFoundError(runId, artifactType) : error;
      });

    if (!response.Body) {
      throw new ArtifactNotFoundError(runId, artifactType);
    }

    const content = await response.Body.transformToString();
    const metadata: ArtifactMetadata = {
      runId,
      artifactType,
      fileName: ARTIFACT_FILE_NAMES[artifactType],
      createdAt: response.Metadata?.['created-at'] ?? new Date().toISOString(),
      contentType: response.ContentType ?? DEFAULT_CONTENT_TYPES[artifactType],
    };
    if (response.ContentLength !== undefined) {
      metadata.size = response.ContentLength;
    }
    if (response.Metadata?.checksum) {
      metadata.checksum = response.Metadata.checksum;
    }

    return { content, metadata };
  }

  async exists(runId: RunId, artifactType: ArtifactType): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: this.keyFor(runId, artifactType) }));
      return true;
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  async list(runId: RunId): Promise<ArtifactMetadata[]> {
    const response = await this.client.send(
      new ListObjectsV2Command({ Bucket: this.bucket, Prefix: `${this.prefix}/${runId}/` })
    );

    const artifacts: ArtifactMetadata[] = [];
    for (const object of response.Contents ?? []) {
      const fileName = object.Key?.split('/').pop() ?? '';
      const artifactType = artifactTypeForFile(fileName);
      if (!artifactType) continue;

      const metadata: ArtifactMetadata = {
        runId,
        artifactType,
        fileName,
        createdAt: object.LastModified?.toISOString() ?? new Date().toISOString(),
        contentType: DEFAULT_CONTENT_TYPES[artifactType],
      };
      if (object.Size !== undefined) {
        metadata.size = object.Size;
      }
      artifacts.push(metadata);
    }
    return artifacts;
  }

  /**
   * Delete one artifact, or every artifact of the run
   */
  async delete(runId: RunId, artifactType?: ArtifactType): Promise<void> {
    const types = artifactType ? [artifactType] : (await this.list(runId)).map((artifact) => artifact.artifactType);
    for (const type of types) {
      await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: this.keyFor(runId, type) }));
    }
  }
}

// ============================================================================
// Memory
// ============================================================================

export class MemoryStorageAdapter implements StorageAdapter {
  private readonly store = new Map<string, { content: string | Buffer; metadata: ArtifactMetadata }>();

  private keyFor(runId: RunId, artifactType: ArtifactType): string {
    return `${runId}/${artifactType}`;
  }

  async save(
    runId: RunId,
    artifactType: ArtifactType,
    content: string | Buffer,
    options?: SaveOptions
  ): Promise<ArtifactMetadata> {
    const metadata = describeArtifact(runId, artifactType, content, new Date().toISOString(), options);
    this.store.set(this.keyFor(runId, artifactType), { content, metadata });
    return metadata;
  }

  async load(runId: RunId, artifactType: ArtifactType): Promise<{ content: string | Buffer; metadata: ArtifactMetadata }> {
    const item = this.store.get(this.keyFor(runId, artifactType));
    if (!item) {
      throw new ArtifactNotFoundError(runId, artifactType);
    }
    return item;
  }

  async exists(runId: RunId, artifactType: ArtifactType): Promise<boolean> {
    return this.store.has(this.keyFor(runId, artifactType));
  }

  async list(runId: RunId): Promise<ArtifactMetadata[]> {
    const prefix = `${runId}/`;
    const artifacts: ArtifactMetadata[] = [];
    for (const [key, value] of this.store.entries()) {
      if (key.startsWith(prefix)) {
        artifacts.push(value.metadata);
      }
    }
    return artifacts;
  }

  async delete(runId: RunId, artifactType?: ArtifactType): Promise<void> {
    if (artifactType) {
      this.store.delete(this.keyFor(runId, artifactType));
      return;
    }
    const prefix = `${runId}/`;
    for (const key of [...this.store.keys()]) {
      if (key.startsWith(prefix)) {
        this.store.delete(key);
      }
    }
  }

  clear(): void {
    this.store.clear();
  }

  size(): number {
    return this.store.size;
  }

  keys(): string[] {
    return Array.from(this.store.keys());
  }
}

/**
 * S3 when a bucket is configured, memory otherwise
 */
export function createStorageAdapter(config: { bucket: string | null; prefix?: string; region?: string }): StorageAdapter {
  if (!config.bucket) {
    return new MemoryStorageAdapter();
  }
  return new S3StorageAdapter({ bucket: config.bucket, prefix: config.prefix, region: config.region });
}

export default {
  S3StorageAdapter,
  MemoryStorageAdapter,
  createStorageAdapter,
  artifactTypeForFile,
  ARTIFACT_FILE_NAMES,
};
