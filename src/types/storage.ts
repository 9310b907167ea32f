export interface CachedArtifact {
  key: string;
  videoId: string;
  sourceId: string;
  formatId: string;
  filePath: string;
  fileSize: number; // bytes
  createdAt: string;
  lastAccessedAt: string;
  accessCount: number;
  hasSubtitle: boolean;
  subtitlePath: string | null;
}

export interface StorageStats {
  totalBytes: number;
  fileCount: number;
  oldestFile: string | null;
  newestFile: string | null;
  quotaUsedPercent: number;
}

export interface CleanupResult {
  filesRemoved: number;
  bytesFreed: number;
}

export interface MaintenanceReport {
  timestamp: string;
  expiredCleanup: CleanupResult;
  quotaCleanup: CleanupResult;
  storageBefore: StorageStats;
  storageAfter: StorageStats;
}

export interface VideoFormat {
  id: string;
  selector: string;
  description: string;
  estimatedSizeMbPerMin: number;
}
