import { Workers } from '../worker.js';
import { ImageRepository } from '../types/image.repository.js';
import {
  ToolImageOverride,
  pdfExtractorTool,
  truforTool,
  watermarkRemovalTool,
} from '../tools/builtin.tools.js';
import { ExtractImagesWorker } from './extract.images.worker.js';
import { DetectTamperWorker } from './detect.tamper.worker.js';
import { RemoveWatermarkWorker } from './remove.watermark.worker.js';

export interface ToolOverrides {
  pdfExtractor?: ToolImageOverride;
  trufor?: ToolImageOverride;
  watermarkRemoval?: ToolImageOverride;
}

export const createDefaultWorkers = (
  images: ImageRepository,
  tools: ToolOverrides = {},
): Workers => {
  const workers = new Workers();
  workers.addWorker(
    new ExtractImagesWorker(pdfExtractorTool(tools.pdfExtractor), images),
  );
  workers.addWorker(new DetectTamperWorker(truforTool(tools.trufor)));
  workers.addWorker(
    new RemoveWatermarkWorker(watermarkRemovalTool(tools.watermarkRemoval)),
  );
  return workers;
};

export { ExtractImagesWorker, DetectTamperWorker, RemoveWatermarkWorker };
