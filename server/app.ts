import { promises as fs } from 'fs';
import express from 'express';
import type { Request, RequestHandler, Response, NextFunction } from 'express';
import cors from 'cors';
import multer from 'multer';
import type { MathEvaluationService } from '../src/services/mathEvaluation';
import type { ImageMimeType } from '../src/types';
import {
  formatValidationIssues,
  isRequestBody,
  validateEvaluationRequest,
  validateFullEvaluationFields,
  validateFullEvaluationRequest,
  validateImageData,
  validateMimeType,
} from '../src/utils/validation';
import { isPayloadTooLargeError } from '../src/utils/errorHandler';
import { logger } from '../src/utils/logger';
import { createErrorHandler, notFoundHandler, sendError } from './errors';

export const SERVICE_NAME = 'Math Evaluation API';
export const SERVICE_VERSION = '1.0.0';

export interface AppOptions {
  service: MathEvaluationService;
  corsOrigins: string[];
  maxUploadBytes: number;
  uploadDir: string;
}

const HEALTH_PATHS = new Set(['/health', '/api/health']);
const NO_IMAGE_FIELD = "No image file provided in the 'image' field.";

function hasJsonBody(body: unknown): body is Record<string, unknown> {
  return isRequestBody(body) && Object.keys(body).length > 0;
}

function statusFor(result: { success: boolean }): number {
  return result.success ? 200 : 500;
}

async function removeUpload(filePath: string): Promise<void> {
  try {
    await fs.rm(filePath, { force: true });
  } catch (error) {
    logger.warn('Could not remove uploaded file %s:', filePath, error);
  }
}

type Reply = { status: number; body: object };

function failure(status: number, error: string): Reply {
  return { status, body: { success: false, error } };
}

async function handleMultipartEvaluation(service: MathEvaluationService, req: Request): Promise<Reply> {
  const uploaded = req.file;
  if (!uploaded) {
    return failure(400, NO_IMAGE_FIELD);
  }
  if (!uploaded.originalname) {
    return failure(400, 'No image file selected.');
  }
  if (uploaded.size === 0) {
    return failure(400, 'Image file is empty.');
  }

  let mimeType: ImageMimeType | undefined;
  if (uploaded.mimetype.startsWith('image/')) {
    const mime = validateMimeType(uploaded.mimetype);
    if (!mime.isValid) {
      return failure(400, formatValidationIssues(mime.issues));
    }
    mimeType = mime.value;
  }

  const fields = validateFullEvaluationFields(req.body);
  if (!fields.isValid) {
    const missingOnly = fields.issues.every((issue) => issue.code === 'missing-field');
    return failure(
      400,
      missingOnly ? 'Missing required form fields: question, correct_answer.' : formatValidationIssues(fields.issues)
    );
  }

  const result = await service.processFullEvaluation({
    ...fields.value,
    image: { kind: 'path', path: uploaded.path, mimeType },
  });
  return { status: statusFor(result), body: result };
}

/** JSON variant: the image arrives as a base64 or data URL string. */
async function handleJsonEvaluation(service: MathEvaluationService, body: unknown): Promise<Reply> {
  if (!hasJsonBody(body)) {
    return failure(400, 'No JSON data provided');
  }

  const validation = validateFullEvaluationRequest(body);
  if (!validation.isValid) {
    return failure(400, formatValidationIssues(validation.issues));
  }

  const { image, ...fields } = validation.value;
  const result = await service.processFullEvaluation({
    ...fields,
    image: { kind: 'bytes', data: image.data, mimeType: image.mimeType },
  });
  return { status: statusFor(result), body: result };
}

/**
 * Runs multer for the single `image` file. Oversized parts go on to the 413 handler;
 * any other rejected form (a file under another field, a second file, a malformed
 * body) answers 400.
 */
function receiveImage(upload: multer.Multer): RequestHandler {
  const single = upload.single('image');
  return (req, res, next) => {
    single(req, res, (error?: unknown) => {
      if (error === undefined || error === null) {
        next();
        return;
      }
      if (isPayloadTooLargeError(error)) {
        next(error);
        return;
      }
      logger.warn('Rejected multipart form on %s:', req.path, error);
      if (error instanceof multer.MulterError && error.code === 'LIMIT_UNEXPECTED_FILE') {
        sendError(res, 400, NO_IMAGE_FIELD);
        return;
      }
      sendError(res, 400, 'Bad request. Please check your input data and format.');
    });
  };
}

export function createApp(options: AppOptions) {
  const { service } = options;
  const app = express();

  const upload = multer({
    dest: options.uploadDir,
    limits: {
      fileSize: options.maxUploadBytes,
      fieldSize: options.maxUploadBytes,
      files: 1,
    },
  });

  app.use(cors({
    origin: options.corsOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));

  app.use(express.json({ limit: options.maxUploadBytes }));

  app.use((req, res, next) => {
    if (!HEALTH_PATHS.has(req.path)) {
      logger.info('Request: %s %s from %s', req.method, req.path, req.ip);
    }
    next();
  });

  app.get('/', (req, res) => {
    res.type('text/plain').send(`${SERVICE_NAME} is running.`);
  });

  app.get(['/health', '/api/health'], (req, res) => {
    res.json({ status: 'healthy', service: SERVICE_NAME, version: SERVICE_VERSION });
  });

  app.post('/api/ocr', async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!hasJsonBody(req.body)) {
        return sendError(res, 400, 'No JSON data provided');
      }

      const image = validateImageData(req.body.image, req.body.mime_type);
      if (!image.isValid) {
        return sendError(res, 400, formatValidationIssues(image.issues));
      }

      const result = await service.extractText({
        kind: 'bytes',
        data: image.value.data,
        mimeType: image.value.mimeType,
      });
      res.status(statusFor(result)).json(result);
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/evaluate', async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!hasJsonBody(req.body)) {
        return sendError(res, 400, 'No JSON data provided');
      }

      const validation = validateEvaluationRequest(req.body);
      if (!validation.isValid) {
        return sendError(res, 400, formatValidationIssues(validation.issues));
      }

      const result = await service.evaluateText(validation.value);
      res.status(statusFor(result)).json(result);
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/full_evaluation', receiveImage(upload), async (req: Request, res: Response, next: NextFunction) => {
    const uploaded = req.file;
    try {
      const handled = req.is('multipart/form-data')
        ? handleMultipartEvaluation(service, req)
        : handleJsonEvaluation(service, req.body);
      // The upload is deleted before the response goes out, whatever the outcome.
      const reply = await handled.finally(async () => {
        if (uploaded) {
          await removeUpload(uploaded.path);
        }
      });
      res.status(reply.status).json(reply.body);
    } catch (error) {
      next(error);
    }
  });

  app.use(notFoundHandler);
  app.use(createErrorHandler(options.maxUploadBytes));

  return app;
}
