import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { z } from 'zod';
import { VERDICTS } from '../types';
import type { EvaluationInput, EvaluationOutcome, Verdict } from '../types';
import { describeProviderError } from '../utils/errorHandler';
import { logger } from '../utils/logger';

export interface EvaluatorClient {
  evaluate(input: EvaluationInput): Promise<EvaluationOutcome>;
}

/** The part of the OpenAI client the evaluator calls. */
export interface CompletionModel {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming
      ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

/** "On Track", "on-track" and "on_track" all mean the same verdict. */
export function normalizeVerdict(value: string): string {
  return value.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

const verdictSchema = z
  .string()
  .transform(normalizeVerdict)
  .pipe(z.enum(VERDICTS));

export const evaluationResponseSchema = z.object({
  evaluation: z.string(),
  hint: z.string(),
  verdict: verdictSchema,
});

export type EvaluationResponse = z.infer<typeof evaluationResponseSchema>;

/** Removes ```json / ``` fences the model sometimes wraps around its JSON. */
export function stripJsonFences(text: string): string {
  return text.replace(/```json/gi, '').replace(/```/g, '').trim();
}

export function buildEvaluationMessage(input: EvaluationInput): string {
  return [
    `Question: ${input.question}`,
    `Correct Answer: ${input.correctAnswer}`,
    `Student's previous steps (context only, do not judge them; consult only when necessary): ${input.priorHistory}`,
    `Student's current step (evaluate this step only): ${input.studentWork}`,
  ].join('\n');
}

type ParsedEvaluation = { ok: true; value: EvaluationResponse } | { ok: false; error: string };

export function parseEvaluationResponse(raw: string): ParsedEvaluation {
  let json: unknown;
  try {
    json = JSON.parse(stripJsonFences(raw));
  } catch {
    // SyntaxError messages quote the input; the raw reply stays in the logs only.
    return { ok: false, error: 'reply is not valid JSON' };
  }

  const parsed = evaluationResponseSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return { ok: false, error: `${where}${issue?.message ?? 'unexpected response shape'}` };
  }
  return { ok: true, value: parsed.data };
}

export function isFinishedVerdict(verdict: Verdict): boolean {
  return verdict === 'correct';
}

/**
 * Judges one student step against the tutoring policy with an OpenAI model.
 * Provider failures and unparseable replies come back as distinct error kinds.
 */
export class OpenAIEvaluatorClient implements EvaluatorClient {
  constructor(
    private readonly client: CompletionModel,
    private readonly model: string,
    private readonly systemPrompt: string
  ) {}

  static fromApiKey(options: { apiKey: string; baseURL?: string; model: string; systemPrompt: string }) {
    const openai = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });
    return new OpenAIEvaluatorClient(openai, options.model, options.systemPrompt);
  }

  async evaluate(input: EvaluationInput): Promise<EvaluationOutcome> {
    let content: string;
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: this.systemPrompt },
          { role: 'user', content: buildEvaluationMessage(input) },
        ],
      });

      const reply = response.choices[0]?.message?.content;
      if (!reply) {
        throw new Error('Empty response from evaluation model');
      }
      content = reply;
    } catch (error) {
      logger.error('Evaluation request failed:', error);
      return {
        success: false,
        kind: 'provider',
        error: `An unexpected evaluation error occurred: ${describeProviderError(error)}`,
      };
    }

    const parsed = parseEvaluationResponse(content);
    if (!parsed.ok) {
      logger.error('Evaluation failed: could not decode JSON from model response (%s). Raw response: %s', parsed.error, content);
      return {
        success: false,
        kind: 'parse',
        error: `Invalid JSON response from evaluation API: ${parsed.error}`,
      };
    }

    logger.info('✅ Evaluated step, verdict: %s', parsed.value.verdict);
    logger.debug('Evaluation response: %s', content);
    return { success: true, ...parsed.value };
  }
}
