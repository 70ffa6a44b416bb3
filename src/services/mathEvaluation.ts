import type {
  FullEvaluationRequest,
  FullEvaluationResult,
  ImageSource,
  OcrResult,
  TextEvaluationRequest,
  TextEvaluationResult,
} from '../types';
import { logger } from '../utils/logger';
import { isFinishedVerdict } from './evaluator';
import type { EvaluatorClient } from './evaluator';
import type { OcrClient } from './ocr';

export function appendToTranscript(priorHistory: string, extractedText: string): string {
  return `${priorHistory}\n${extractedText}`;
}

function secondsSince(start: number): string {
  return ((Date.now() - start) / 1000).toFixed(2);
}

/**
 * OCR + evaluation pipeline. Holds no per-session state: the step counter and the
 * transcript arrive with each request and leave with its response.
 */
export class MathEvaluationService {
  constructor(
    private readonly ocr: OcrClient,
    private readonly evaluator: EvaluatorClient
  ) {}

  extractText(image: ImageSource): Promise<OcrResult> {
    return this.ocr.extractText(image);
  }

  async evaluateText(request: TextEvaluationRequest): Promise<TextEvaluationResult> {
    const nextStepCount = request.stepCount + 1;
    const outcome = await this.evaluator.evaluate({
      question: request.question,
      correctAnswer: request.correctAnswer,
      studentWork: request.studentAnswer,
      priorHistory: request.priorHistory,
    });

    if (!outcome.success) {
      return {
        success: false,
        evaluation: null,
        hint: null,
        nextStepCount,
        error: outcome.error,
        errorKind: outcome.kind,
      };
    }

    return {
      success: true,
      evaluation: outcome.evaluation,
      hint: outcome.hint,
      verdict: outcome.verdict,
      nextStepCount,
      error: null,
    };
  }

  async processFullEvaluation(request: FullEvaluationRequest): Promise<FullEvaluationResult> {
    let start = Date.now();
    const ocrResult = await this.ocr.extractText(request.image);
    logger.info('OCR processing time: %s seconds', secondsSince(start));

    if (!ocrResult.success) {
      logger.warn('OCR failed: %s', ocrResult.error);
      return {
        success: false,
        stage: 'ocr',
        error: `OCR failed: ${ocrResult.error}`,
        extracted_text: null,
        evaluation: null,
      };
    }

    const extractedText = ocrResult.text;
    start = Date.now();
    const outcome = await this.evaluator.evaluate({
      question: request.question,
      correctAnswer: request.correctAnswer,
      studentWork: extractedText,
      priorHistory: request.priorHistory,
    });
    logger.info('Evaluation processing time: %s seconds', secondsSince(start));

    const nextStepCount = request.stepCount + 1;
    // The student's step was captured even if judging it failed.
    const chatHistory = appendToTranscript(request.priorHistory, extractedText);

    if (!outcome.success) {
      return {
        success: false,
        stage: 'evaluation',
        errorKind: outcome.kind,
        error: `Evaluation failed: ${outcome.error}`,
        extracted_text: extractedText,
        evaluation: null,
        hint: null,
        nextStepCount,
        chat_history: chatHistory,
      };
    }

    return {
      success: true,
      extracted_text: extractedText,
      evaluation: outcome.evaluation,
      hint: outcome.hint,
      verdict: outcome.verdict,
      nextStepCount,
      is_finished: isFinishedVerdict(outcome.verdict),
      chat_history: chatHistory,
      error: null,
    };
  }
}
