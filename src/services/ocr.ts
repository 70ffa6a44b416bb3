import { promises as fs } from 'fs';
import path from 'path';
import { GoogleGenerativeAI } from '@google/generative-ai';
import type { Part } from '@google/generative-ai';
import type { ImageSource, OcrResult } from '../types';
import { describeProviderError, isFileNotFoundError } from '../utils/errorHandler';
import { resolveImageMimeType, toProviderMimeType } from '../utils/imageConverter';
import { logger } from '../utils/logger';

export interface OcrClient {
  extractText(image: ImageSource): Promise<OcrResult>;
}

/**
 * The slice of Gemini's GenerativeModel the OCR client uses. Tests pass a scripted
 * object with the same shape.
 */
export interface VisionModel {
  generateContent(request: Array<string | Part>): Promise<{ response: { text(): string } }>;
}

const EXTENSION_MIME_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
};

async function toInlineImage(image: ImageSource): Promise<Part> {
  switch (image.kind) {
    case 'path': {
      const data = await fs.readFile(image.path);
      const declared = image.mimeType ?? EXTENSION_MIME_TYPES[path.extname(image.path).toLowerCase()];
      return {
        inlineData: {
          data: data.toString('base64'),
          mimeType: toProviderMimeType(resolveImageMimeType(data, declared)),
        },
      };
    }
    case 'bytes':
      return {
        inlineData: { data: image.data.toString('base64'), mimeType: toProviderMimeType(image.mimeType) },
      };
    case 'base64':
      return { inlineData: { data: image.data, mimeType: toProviderMimeType(image.mimeType) } };
  }
}

/**
 * Transcribes handwritten math with a Gemini vision model.
 * One request per image; failures come back as `{ success: false }`, never thrown.
 */
export class GeminiOcrClient implements OcrClient {
  constructor(
    private readonly model: VisionModel,
    private readonly prompt: string
  ) {}

  static fromApiKey(apiKey: string, modelName: string, prompt: string): GeminiOcrClient {
    const genAI = new GoogleGenerativeAI(apiKey);
    return new GeminiOcrClient(genAI.getGenerativeModel({ model: modelName }), prompt);
  }

  async extractText(image: ImageSource): Promise<OcrResult> {
    try {
      const imagePart = await toInlineImage(image);
      const result = await this.model.generateContent([imagePart, this.prompt]);
      const text = result.response.text();

      logger.info('🔍 Extracted text: %s...', text.slice(0, 100));
      return { success: true, text, error: null };
    } catch (error) {
      if (image.kind === 'path' && isFileNotFoundError(error)) {
        logger.error('OCR error: image file not found at path: %s', image.path);
        return { success: false, text: null, error: `Image file not found: ${image.path}` };
      }
      logger.error('OCR error:', error);
      return { success: false, text: null, error: `Failed to extract text: ${describeProviderError(error)}` };
    }
  }
}

/** Stand-in used when no Gemini credential is configured. */
export class UnconfiguredOcrClient implements OcrClient {
  async extractText(): Promise<OcrResult> {
    return { success: false, text: null, error: 'OCR provider is not configured' };
  }
}
