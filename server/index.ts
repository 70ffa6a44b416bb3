import 'dotenv/config';
import { loadConfig } from '../src/config';
import { loadPrompts } from '../src/prompts';
import { OpenAIEvaluatorClient } from '../src/services/evaluator';
import { MathEvaluationService } from '../src/services/mathEvaluation';
import { GeminiOcrClient, UnconfiguredOcrClient } from '../src/services/ocr';
import type { OcrClient } from '../src/services/ocr';
import { logger } from '../src/utils/logger';
import { createApp } from './app';

function main(): void {
  const config = loadConfig();

  // Pre-flight: without the evaluator credential there is nothing useful to serve.
  if (!config.openai.apiKey) {
    logger.error('FATAL: OPENAI_API_KEY environment variable is not set. Application will not start.');
    process.exit(1);
  }

  const prompts = loadPrompts(config.promptsDir);

  let ocr: OcrClient;
  if (config.gemini.apiKey) {
    ocr = GeminiOcrClient.fromApiKey(config.gemini.apiKey, config.gemini.model, prompts.ocr);
  } else {
    logger.warn('⚠️ Gemini API key not configured (GEMINI_API_KEY). Image OCR will be unavailable.');
    ocr = new UnconfiguredOcrClient();
  }

  const evaluator = OpenAIEvaluatorClient.fromApiKey({
    apiKey: config.openai.apiKey,
    baseURL: config.openai.baseURL,
    model: config.openai.model,
    systemPrompt: prompts.evaluation,
  });

  const app = createApp({
    service: new MathEvaluationService(ocr, evaluator),
    corsOrigins: config.corsOrigins,
    maxUploadBytes: config.maxUploadBytes,
    uploadDir: config.uploadDir,
  });

  const server = app.listen(config.port, config.host, () => {
    logger.info('🚀 Math Evaluation API running on http://%s:%d', config.host, config.port);
    logger.info('Evaluation model: %s, OCR model: %s', config.openai.model, config.gemini.model);
    logger.info('Debug mode: %s', config.debug ? 'On' : 'Off');
  });

  server.on('error', (error) => {
    logger.error('Failed to start server:', error);
    process.exit(1);
  });
}

main();
