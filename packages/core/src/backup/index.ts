export { BackupStore, MemoryBackupStorage } from './backup-store.js';
export type { Backup, BackupStorage, BackupStoreEvents } from './backup-store.js';
