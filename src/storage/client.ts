/**
 * S3-compatible storage client
 * Optional upload target for exported run files (MinIO, AWS S3, R2)
 */
import {
    S3Client,
    PutObjectCommand,
    type PutObjectCommandInput,
} from '@aws-sdk/client-s3';
import { basename } from 'path';
import { readFile } from 'fs/promises';
import { lookup } from 'mime-types';
import { config } from '../config/index.js';
import { logger } from '../observability/logger.js';
import { withCircuitBreaker } from '../services/resilience.js';

const MAX_UPLOAD_ATTEMPTS = 3;

let s3Client: S3Client | null = null;

function getS3Client(endpoint: string): S3Client {
    if (!s3Client) {
        s3Client = new S3Client({
            endpoint,
            region: config.storageRegion,
            credentials: {
                accessKeyId: config.storageAccessKey,
                secretAccessKey: config.storageSecretKey,
            },
            forcePathStyle: true, // Required for MinIO
        });
    }
    return s3Client;
}

export function isStorageConfigured(): boolean {
    return config.storageEndpoint !== null && config.storageBucket !== null;
}

/**
 * Deterministic key for an exported file: exports/{runId}/{file name}
 */
export function getExportKey(runId: string, filePath: string): string {
    return `exports/${runId}/${basename(filePath)}`;
}

export function getPublicUrl(bucket: string, key: string): string {
    return `${config.storagePublicUrl.replace(/\/+$/, '')}/${bucket}/${key}`;
}

/**
 * Upload a local file with retries and exponential backoff
 */
export async function uploadFile(key: string, filePath: string, contentType?: string): Promise<string> {
    const endpoint = config.storageEndpoint;
    const bucket = config.storageBucket;
    if (!endpoint || !bucket) {
        throw new Error('Object storage is not configured (STORAGE_ENDPOINT, STORAGE_BUCKET)');
    }

    const client = getS3Client(endpoint);
    const mimeType = contentType || lookup(filePath) || 'application/octet-stream';
    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= MAX_UPLOAD_ATTEMPTS; attempt++) {
        try {
            const body = await readFile(filePath);
            const params: PutObjectCommandInput = {
                Bucket: bucket,
                Key: key,
                Body: body,
                ContentType: mimeType,
                ContentLength: body.length,
            };

            await withCircuitBreaker('storage', () => client.send(new PutObjectCommand(params)));

            const publicUrl = getPublicUrl(bucket, key);
            logger.info('Export uploaded to storage', {
                key,
                size: body.length,
                contentType: mimeType,
                url: publicUrl,
            });
            return publicUrl;
        } catch (error) {
            lastError = error instanceof Error ? error : new Error(String(error));
            logger.warn(`Upload attempt ${attempt} failed`, {
                key,
                error: lastError.message,
            });

            if (attempt < MAX_UPLOAD_ATTEMPTS) {
                await new Promise(resolve => setTimeout(resolve, Math.pow(2, attempt) * 1000));
            }
        }
    }

    throw lastError || new Error('Upload failed after retries');
}

export const storageClient = {
    isStorageConfigured,
    getExportKey,
    getPublicUrl,
    uploadFile,
};
