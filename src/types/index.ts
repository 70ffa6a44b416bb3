export const SUPPORTED_IMAGE_TYPES = [
  'image/png',
  'image/jpeg',
  'image/jpg',
  'image/gif',
  'image/webp',
] as const;

export type ImageMimeType = (typeof SUPPORTED_IMAGE_TYPES)[number];

export const VERDICTS = ['correct', 'on_track', 'incorrect'] as const;

export type Verdict = (typeof VERDICTS)[number];

/** Decoded image bytes ready for a provider. */
export interface ImagePayload {
  data: Buffer;
  mimeType: ImageMimeType;
}

export type ImageSource =
  | { kind: 'path'; path: string; mimeType?: ImageMimeType }
  | { kind: 'bytes'; data: Buffer; mimeType: ImageMimeType }
  | { kind: 'base64'; data: string; mimeType: ImageMimeType };

export type OcrResult =
  | { success: true; text: string; error: null }
  | { success: false; text: null; error: string };

export interface EvaluationVerdict {
  evaluation: string;
  hint: string;
  verdict: Verdict;
}

export type EvaluationErrorKind = 'parse' | 'provider';

export type EvaluationOutcome =
  | ({ success: true } & EvaluationVerdict)
  | { success: false; kind: EvaluationErrorKind; error: string };

export interface EvaluationInput {
  question: string;
  correctAnswer: string;
  studentWork: string;
  priorHistory: string;
}

export interface TextEvaluationRequest {
  question: string;
  correctAnswer: string;
  studentAnswer: string;
  stepCount: number;
  priorHistory: string;
}

export interface FullEvaluationRequest {
  image: ImageSource;
  question: string;
  correctAnswer: string;
  stepCount: number;
  priorHistory: string;
}

export type TextEvaluationResult =
  | {
      success: true;
      evaluation: string;
      hint: string;
      verdict: Verdict;
      nextStepCount: number;
      error: null;
    }
  | {
      success: false;
      evaluation: null;
      hint: null;
      nextStepCount: number;
      error: string;
      errorKind: EvaluationErrorKind;
    };

export type FullEvaluationResult =
  | {
      success: true;
      extracted_text: string;
      evaluation: string;
      hint: string;
      verdict: Verdict;
      nextStepCount: number;
      is_finished: boolean;
      chat_history: string;
      error: null;
    }
  | {
      success: false;
      stage: 'ocr';
      error: string;
      extracted_text: null;
      evaluation: null;
    }
  | {
      success: false;
      stage: 'evaluation';
      errorKind: EvaluationErrorKind;
      error: string;
      extracted_text: string;
      evaluation: null;
      hint: null;
      nextStepCount: number;
      chat_history: string;
    };
