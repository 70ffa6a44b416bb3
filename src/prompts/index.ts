import fs from 'fs';
import path from 'path';

export interface PromptSet {
  /** System instruction for the evaluator (the tutoring policy). */
  evaluation: string;
  /** Instruction sent alongside every image to the OCR model. */
  ocr: string;
}

export const EVALUATION_PROMPT_FILE = 'evaluation.md';
export const OCR_PROMPT_FILE = 'ocr.md';

function readPrompt(promptsDir: string, fileName: string): string {
  const filePath = path.join(promptsDir, fileName);
  const content = fs.readFileSync(filePath, 'utf-8').trim();
  if (!content) {
    throw new Error(`Prompt file is empty: ${filePath}`);
  }
  return content;
}

/**
 * Prompts are versioned assets under `prompts/` so the tutoring policy can change
 * without touching the orchestration code. Read once at startup.
 */
export function loadPrompts(promptsDir: string): PromptSet {
  return {
    evaluation: readPrompt(promptsDir, EVALUATION_PROMPT_FILE),
    ocr: readPrompt(promptsDir, OCR_PROMPT_FILE),
  };
}
