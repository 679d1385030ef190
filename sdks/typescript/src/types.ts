export type FileSource = 'file-server' | 'remote-library';

export type FileStatus = 'Active' | 'Archived' | 'Restoring' | 'ArchiveFailed';

export interface FileAuditRecord {
  id: number;
  source: FileSource;
  path: string;
  fingerprint: string;
  lastModified: string;
  lastAccessed: string;
  owner: string;
  status: FileStatus;
  archiveRef?: string;
  lastError?: string;
  createdAt: string;
  updatedAt: string;
}

export interface RecentFilesQuery {
  limit?: number;
  status?: FileStatus;
}

export interface RecentFilesResponse {
  records: FileAuditRecord[];
  counts: Record<FileStatus, number>;
}

export interface RestoreResponse {
  id: number;
  status: FileStatus;
  outcome: 'initiated' | 'already-in-progress';
  message: string;
}

export interface ErrorResponse {
  statusCode: number;
  error: string;
  message: string | string[];
}
