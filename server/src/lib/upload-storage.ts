import { extname, join } from 'node:path';
import { ensureDir, pathExists, remove, writeFile } from 'fs-extra';
import { toErrorMessage } from './errors';
import { generateSafeKey, resolveFileRecord, type FileLookup, type TokenGenerator } from './files/identity';
import type { FileRecordRepository } from './files/repository';
import type { FileRecord } from './files/types';

const DEFAULT_ALLOWED_EXTENSIONS = [
  '.pdf',
  '.doc',
  '.docx',
  '.ppt',
  '.pptx',
  '.xls',
  '.xlsx',
  '.csv',
  '.txt',
  '.md',
  '.markdown',
  '.json',
  '.html',
  '.htm',
  '.png',
  '.jpg',
  '.jpeg',
];

/**
 * The subset of the web File API the store needs.
 */
export interface UploadCandidate {
  name: string;
  type?: string;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export interface RejectedFileMetadata {
  originalName: string;
  reason: string;
}

export interface UploadResult {
  uploadedFiles: FileRecord[];
  rejectedFiles: RejectedFileMetadata[];
}

export interface UploadStoreOptions {
  uploadsDir: string;
  files: FileRecordRepository;
  allowedExtensions?: string[];
  createToken?: TokenGenerator;
}

export class UploadStore {
  private readonly uploadsDir: string;
  private readonly files: FileRecordRepository;
  private readonly allowedExtensions: Set<string>;
  private readonly createToken?: TokenGenerator;
  // Keys handed out whose record is not inserted yet.
  private readonly reservedKeys = new Set<string>();

  constructor(options: UploadStoreOptions) {
    this.uploadsDir = options.uploadsDir;
    this.files = options.files;
    this.allowedExtensions = new Set(
      (options.allowedExtensions ?? DEFAULT_ALLOWED_EXTENSIONS).map((entry) => entry.toLowerCase())
    );
    this.createToken = options.createToken;
  }

  getAllowedExtensions(): string[] {
    return Array.from(this.allowedExtensions.values());
  }

  isExtensionAllowed(filename: string): boolean {
    return this.allowedExtensions.has(extname(filename).toLowerCase());
  }

  /**
   * Stores each file independently; a failing file is reported in rejectedFiles.
   */
  async upload(knowledgeBase: string, candidates: UploadCandidate[]): Promise<UploadResult> {
    await ensureDir(this.uploadsDir);

    const uploadedFiles: FileRecord[] = [];
    const rejectedFiles: RejectedFileMetadata[] = [];

    for (const candidate of candidates) {
      const originalName = candidate.name?.trim() || 'unknown';

      if (!candidate.name || !candidate.name.trim()) {
        rejectedFiles.push({ originalName, reason: 'File name is required' });
        continue;
      }

      if (!this.isExtensionAllowed(candidate.name)) {
        rejectedFiles.push({ originalName, reason: 'Unsupported file type' });
        continue;
      }

      try {
        uploadedFiles.push(await this.storeOne(knowledgeBase, candidate));
      } catch (error) {
        const reason = toErrorMessage(error, 'Failed to store file');
        console.error(`[upload] kb="${knowledgeBase}" originalName="${candidate.name}" failed: ${reason}`);
        rejectedFiles.push({ originalName, reason });
      }
    }

    return { uploadedFiles, rejectedFiles };
  }

  list(knowledgeBase?: string): Promise<FileRecord[]> {
    return this.files.list(knowledgeBase);
  }

  /**
   * Removes the record first, then its bytes. Missing bytes are only logged.
   */
  async delete(lookup: FileLookup): Promise<FileRecord> {
    const { record } = await resolveFileRecord(this.files, lookup);
    const removed = (await this.files.remove(record.safeKey)) ?? record;

    if (await pathExists(removed.storedPath)) {
      await remove(removed.storedPath);
      console.log(`[upload] deleted stored file ${removed.storedPath}`);
    } else {
      console.warn(`[upload] stored file already missing: ${removed.storedPath}`);
    }

    return removed;
  }

  private async claimKey(key: string): Promise<boolean> {
    if (this.reservedKeys.has(key)) {
      return false;
    }

    const existing = await this.files.findBySafeKey(key);
    // Re-check after the await: a concurrent upload may have reserved it meanwhile.
    if (existing || this.reservedKeys.has(key)) {
      return false;
    }

    this.reservedKeys.add(key);
    return true;
  }

  private async storeOne(knowledgeBase: string, candidate: UploadCandidate): Promise<FileRecord> {
    const safeKey = await generateSafeKey(
      knowledgeBase,
      candidate.name,
      (key) => this.claimKey(key),
      this.createToken
    );

    try {
      const arrayBuffer = await candidate.arrayBuffer();
      const storedPath = join(this.uploadsDir, safeKey);
      await writeFile(storedPath, Buffer.from(arrayBuffer));

      const now = new Date().toISOString();
      let record: FileRecord;
      try {
        record = await this.files.insert({
          safeKey,
          originalName: candidate.name,
          knowledgeBase,
          storedPath,
          mimeType: candidate.type || 'application/octet-stream',
          sizeBytes: arrayBuffer.byteLength,
          status: 'uploaded',
          progress: 0,
          message: null,
          error: null,
          uploadTime: now,
          updatedAt: now,
        });
      } catch (error) {
        // No record points at the bytes, so they go too.
        await remove(storedPath);
        throw error;
      }

      console.log(
        `[upload] stored kb="${knowledgeBase}" originalName="${candidate.name}" safeKey=${safeKey} sizeBytes=${record.sizeBytes}`
      );
      return record;
    } finally {
      this.reservedKeys.delete(safeKey);
    }
  }
}
