import path from 'node:path';
import { ToolDefinition } from '../types/tool.js';

export const IMAGE_FILE_PATTERN = /\.(png|jpe?g|gif|webp|tiff?|bmp)$/i;

export interface ToolImageOverride {
  image?: string;
  version?: string;
}

export const pdfExtractorTool = (
  override: ToolImageOverride = {},
): ToolDefinition => ({
  name: 'pdf-extractor',
  image: override.image ?? 'pdf-extractor',
  version: override.version ?? 'latest',
  inputs: {
    input_pdf: { mountPoint: '/INPUT', env: 'INPUT_PATH' },
  },
  output: {
    mountPoint: '/OUTPUT',
    env: 'OUTPUT_PATH',
    filter: IMAGE_FILE_PATTERN,
  },
  options: [],
});

export const truforTool = (override: ToolImageOverride = {}): ToolDefinition => ({
  name: 'trufor',
  image: override.image ?? 'trufor',
  version: override.version ?? 'latest',
  inputs: {
    input_image: { mountPoint: '/INPUT', env: 'INPUT_PATH' },
  },
  output: { mountPoint: '/OUTPUT', env: 'OUTPUT_PATH' },
  options: [
    {
      name: 'save_noiseprint',
      flag: '--save-noiseprint',
      allowed: [true, false],
      boolean: true,
    },
  ],
});

export const watermarkOutputName = (inputPath: string, mode: number) =>
  `${path.parse(inputPath).name}_watermark_removed_m${mode}.pdf`;

export const watermarkRemovalTool = (
  override: ToolImageOverride = {},
): ToolDefinition => ({
  name: 'pdf-watermark-removal',
  image: override.image ?? 'pdf-watermark-removal',
  version: override.version ?? 'latest',
  inputs: {
    input_pdf: { mountPoint: '/workspace/input' },
  },
  output: { mountPoint: '/workspace/output', filter: /\.pdf$/i },
  options: [{ name: 'aggressiveness', flag: '-m', allowed: [1, 2, 3] }],
  args: ({ inputs, outputDir, options }) => [
    '-i',
    inputs.input_pdf,
    '-o',
    path.posix.join(
      outputDir,
      watermarkOutputName(inputs.input_pdf, Number(options.aggressiveness)),
    ),
  ],
});

/**
 * Splits `registry:5000/name:tag` into image and version. The version
 * defaults to `latest`.
 */
export const parseImageReference = (reference: string): ToolImageOverride => {
  const slash = reference.lastIndexOf('/');
  const colon = reference.lastIndexOf(':');
  if (colon > slash) {
    return {
      image: reference.slice(0, colon),
      version: reference.slice(colon + 1),
    };
  }
  return { image: reference, version: 'latest' };
};
