/**
 * Storage module exports
 */
export {
    storageClient,
    isStorageConfigured,
    getExportKey,
    getPublicUrl,
    uploadFile,
} from './client.js';
