import { SUPPORTED_IMAGE_TYPES } from '../types';
import type { ImageMimeType, ImagePayload } from '../types';
import {
  decodeStrictBase64,
  getDataUrlMimeType,
  isSupportedImageType,
  resolveImageMimeType,
  stripDataUrlPrefix,
} from './imageConverter';

export interface RequestValidationIssue {
  code:
    | 'missing-field'
    | 'invalid-field-type'
    | 'invalid-image'
    | 'unsupported-mime-type'
    | 'invalid-step-count';
  field: string;
  message: string;
}

export type ValidationResult<T> =
  | { isValid: true; value: T }
  | { isValid: false; issues: RequestValidationIssue[] };

export interface ValidatedEvaluationRequest {
  question: string;
  correctAnswer: string;
  studentAnswer: string;
  stepCount: number;
  priorHistory: string;
}

export interface ValidatedFullEvaluationFields {
  question: string;
  correctAnswer: string;
  stepCount: number;
  priorHistory: string;
}

export interface ValidatedFullEvaluationRequest extends ValidatedFullEvaluationFields {
  image: ImagePayload;
}

type RequestBody = Record<string, unknown>;

export function isRequestBody(value: unknown): value is RequestBody {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Renders issues as one message. Missing fields are reported together so the caller
 * sees every absent field at once; anything else reports the first issue.
 */
export function formatValidationIssues(issues: RequestValidationIssue[]): string {
  const missing = issues.filter((issue) => issue.code === 'missing-field').map((issue) => issue.field);
  if (missing.length > 0) {
    return `Missing required fields: ${missing.join(', ')}`;
  }
  return issues[0]?.message ?? 'Invalid request';
}

function collectMissingFields(body: RequestBody, fields: string[]): RequestValidationIssue[] {
  return fields
    .filter((field) => {
      const value = body[field];
      return typeof value !== 'string' || value.length === 0;
    })
    .map((field): RequestValidationIssue => ({
      code: 'missing-field',
      field,
      message: `${field} is required`,
    }));
}

function readStepCount(
  value: unknown,
  field: string
): { stepCount: number } | { issue: RequestValidationIssue } {
  if (value === undefined || value === null || value === '') {
    return { stepCount: 0 };
  }
  const parsed = typeof value === 'string' && /^\d+$/.test(value.trim()) ? Number(value.trim()) : value;
  if (typeof parsed !== 'number' || !Number.isSafeInteger(parsed) || parsed < 0) {
    return {
      issue: {
        code: 'invalid-step-count',
        field,
        message: `${field} must be a non-negative integer`,
      },
    };
  }
  return { stepCount: parsed };
}

function readHistory(
  value: unknown,
  field: string
): { history: string } | { issue: RequestValidationIssue } {
  if (value === undefined || value === null) {
    return { history: '' };
  }
  if (typeof value !== 'string') {
    return {
      issue: { code: 'invalid-field-type', field, message: `${field} must be a string` },
    };
  }
  return { history: value };
}

export function validateMimeType(mimeType: unknown): ValidationResult<ImageMimeType> {
  if (typeof mimeType !== 'string' || mimeType.length === 0) {
    return {
      isValid: false,
      issues: [{ code: 'missing-field', field: 'mime_type', message: 'MIME type is required' }],
    };
  }
  const normalized = mimeType.trim().toLowerCase();
  if (!isSupportedImageType(normalized)) {
    return {
      isValid: false,
      issues: [
        {
          code: 'unsupported-mime-type',
          field: 'mime_type',
          message: `Unsupported MIME type: ${mimeType}. Supported types: ${SUPPORTED_IMAGE_TYPES.join(', ')}`,
        },
      ],
    };
  }
  return { isValid: true, value: normalized };
}

/**
 * Validates a base64 (optionally data URL) image string and decodes it.
 * A separately declared mime type must be supported; otherwise the data URL's type
 * or the image's magic bytes decide.
 */
export function validateImageData(image: unknown, declaredMimeType?: unknown): ValidationResult<ImagePayload> {
  if (typeof image !== 'string' || image.length === 0) {
    return {
      isValid: false,
      issues: [{ code: 'invalid-image', field: 'image', message: 'Image data is required' }],
    };
  }

  let mimeHint: string | null = getDataUrlMimeType(image);
  if (declaredMimeType !== undefined && declaredMimeType !== null && declaredMimeType !== '') {
    const mime = validateMimeType(declaredMimeType);
    if (!mime.isValid) {
      return mime;
    }
    mimeHint = mime.value;
  }

  const data = decodeStrictBase64(stripDataUrlPrefix(image));
  if (!data) {
    return {
      isValid: false,
      issues: [{ code: 'invalid-image', field: 'image', message: 'Invalid base64 image data format' }],
    };
  }

  return {
    isValid: true,
    value: { data, mimeType: resolveImageMimeType(data, mimeHint) },
  };
}

export function validateEvaluationRequest(body: unknown): ValidationResult<ValidatedEvaluationRequest> {
  if (!isRequestBody(body)) {
    return {
      isValid: false,
      issues: [{ code: 'missing-field', field: 'body', message: 'No JSON data provided' }],
    };
  }

  const issues = collectMissingFields(body, ['question', 'correct_answer', 'student_answer']);
  const step = readStepCount(body.nextStepCount, 'nextStepCount');
  const history = readHistory(body.chat_history, 'chat_history');
  if ('issue' in step) {
    issues.push(step.issue);
  }
  if ('issue' in history) {
    issues.push(history.issue);
  }

  if (issues.length > 0 || 'issue' in step || 'issue' in history) {
    return { isValid: false, issues };
  }

  return {
    isValid: true,
    value: {
      question: String(body.question),
      correctAnswer: String(body.correct_answer),
      studentAnswer: String(body.student_answer),
      stepCount: step.stepCount,
      priorHistory: history.history,
    },
  };
}

/** Text fields of a full evaluation request (multipart form fields or JSON body). */
export function validateFullEvaluationFields(fields: unknown): ValidationResult<ValidatedFullEvaluationFields> {
  if (!isRequestBody(fields)) {
    return {
      isValid: false,
      issues: [{ code: 'missing-field', field: 'body', message: 'No JSON data provided' }],
    };
  }

  const issues = collectMissingFields(fields, ['question', 'correct_answer']);
  const step = readStepCount(fields.currentStepCount, 'currentStepCount');
  const history = readHistory(fields.chat_history, 'chat_history');
  if ('issue' in step) {
    issues.push(step.issue);
  }
  if ('issue' in history) {
    issues.push(history.issue);
  }

  if (issues.length > 0 || 'issue' in step || 'issue' in history) {
    return { isValid: false, issues };
  }

  return {
    isValid: true,
    value: {
      question: String(fields.question),
      correctAnswer: String(fields.correct_answer),
      stepCount: step.stepCount,
      priorHistory: history.history,
    },
  };
}

/** JSON variant of full evaluation: the image travels as a base64 or data URL string. */
export function validateFullEvaluationRequest(body: unknown): ValidationResult<ValidatedFullEvaluationRequest> {
  if (!isRequestBody(body)) {
    return {
      isValid: false,
      issues: [{ code: 'missing-field', field: 'body', message: 'No JSON data provided' }],
    };
  }

  const missing = collectMissingFields(body, ['image', 'question', 'correct_answer']);
  if (missing.length > 0) {
    return { isValid: false, issues: missing };
  }

  const image = validateImageData(body.image, body.mime_type);
  if (!image.isValid) {
    return image;
  }

  const fields = validateFullEvaluationFields(body);
  if (!fields.isValid) {
    return fields;
  }

  return { isValid: true, value: { ...fields.value, image: image.value } };
}
