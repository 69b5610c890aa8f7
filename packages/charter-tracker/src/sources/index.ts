export type { BackupSource } from './backup-source.js';
export { LocalBackupSource } from './local-backup-source.js';
export {
  AzureBackupSource,
  azureBlobContainer,
  createContainerClient,
  type AzureCredentials,
  type BlobContainer,
} from './azure-backup-source.js';
