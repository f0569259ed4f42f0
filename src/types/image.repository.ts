export interface ExtractedImageRecord {
  ownerId: string;
  documentId: string;
  jobId: string;
  filename: string;
  filePath: string;
  fileSize: number;
}

export interface ImageRecord extends ExtractedImageRecord {
  id: string;
  sourceType: string;
  createdAt: Date;
}

/**
 * Storage for image entities derived from job artifacts.
 */
export interface ImageRepository {
  insertExtractedImages(records: ExtractedImageRecord[]): Promise<ImageRecord[]>;
}
