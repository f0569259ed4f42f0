import { DbDriver } from '../types/db.driver.js';
import {
  ExtractedImageRecord,
  ImageRecord,
  ImageRepository,
} from '../types/image.repository.js';
import { DbImage } from './db.job.js';
import { IMAGE_INSERT_MANY } from './queries.js';

export class PostgresImageRepository implements ImageRepository {
  constructor(private db: DbDriver) {}

  async insertExtractedImages(
    records: ExtractedImageRecord[],
  ): Promise<ImageRecord[]> {
    if (records.length === 0) {
      return [];
    }

    const values = [
      records.map((x) => x.ownerId), //1
      records.map((x) => x.documentId), //2
      records.map((x) => x.jobId), //3
      records.map((x) => x.filename), //4
      records.map((x) => x.filePath), //5
      records.map((x) => x.fileSize), //6
    ];
    const result = await this.db.execute<DbImage>(IMAGE_INSERT_MANY, ...values);

    return result.rows.map((x) => this.toImage(x));
  }

  private toImage(dbImage: DbImage): ImageRecord {
    return {
      id: dbImage.id,
      ownerId: dbImage.owner_id,
      documentId: dbImage.document_id,
      jobId: dbImage.job_id,
      filename: dbImage.filename,
      filePath: dbImage.file_path,
      fileSize: parseInt(dbImage.file_size, 10),
      sourceType: dbImage.source_type,
      createdAt: dbImage.created_at,
    };
  }
}
