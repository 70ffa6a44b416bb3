import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import {
  buildEvaluationMessage,
  type CompletionModel,
  isFinishedVerdict,
  normalizeVerdict,
  OpenAIEvaluatorClient,
  parseEvaluationResponse,
  stripJsonFences,
} from './evaluator';

const SYSTEM_PROMPT = 'You are a patient math tutor.';

const INPUT = {
  question: 'Solve 2x+5=13',
  correctAnswer: 'x=4',
  studentWork: '2x=8',
  priorHistory: '2x+5=13',
};

const ON_TRACK_JSON = JSON.stringify({
  evaluation: '## Current Step Analysis\n\nYou subtracted $5$ correctly.',
  hint: 'Now divide both sides by $2$.',
  verdict: 'on track',
});

class ScriptedCompletionModel implements CompletionModel {
  readonly requests: ChatCompletionCreateParamsNonStreaming[] = [];

  constructor(private readonly reply: () => string | null) {}

  chat = {
    completions: {
      create: async (body: ChatCompletionCreateParamsNonStreaming) => {
        this.requests.push(body);
        return { choices: [{ message: { content: this.reply() } }] };
      },
    },
  };
}

describe('stripJsonFences', () => {
  it('removes a json fence', () => {
    assert.equal(stripJsonFences('```json\n{"a":1}\n```'), '{"a":1}');
  });

  it('removes a bare fence', () => {
    assert.equal(stripJsonFences('```\n{"a":1}\n```  '), '{"a":1}');
  });
});

describe('parseEvaluationResponse', () => {
  it('parses fenced and unfenced replies identically', () => {
    const plain = parseEvaluationResponse(ON_TRACK_JSON);
    const fenced = parseEvaluationResponse('```json\n' + ON_TRACK_JSON + '\n```');
    assert.equal(plain.ok, true);
    assert.deepEqual(fenced, plain);
  });

  it('normalizes the verdict spelling', () => {
    const parsed = parseEvaluationResponse(ON_TRACK_JSON);
    assert.equal(parsed.ok && parsed.value.verdict, 'on_track');
  });

  it('rejects prose', () => {
    const parsed = parseEvaluationResponse("I'm sorry, I can't help with that.");
    assert.deepEqual(parsed, { ok: false, error: 'reply is not valid JSON' });
  });

  it('rejects an unknown verdict', () => {
    const parsed = parseEvaluationResponse(JSON.stringify({ evaluation: 'e', hint: 'h', verdict: 'almost' }));
    assert.equal(parsed.ok, false);
    if (!parsed.ok) {
      assert.match(parsed.error, /^verdict: /);
    }
  });

  it('rejects a reply without a hint', () => {
    const parsed = parseEvaluationResponse(JSON.stringify({ evaluation: 'e', verdict: 'correct' }));
    assert.equal(parsed.ok, false);
    if (!parsed.ok) {
      assert.match(parsed.error, /^hint: /);
    }
  });
});

describe('normalizeVerdict', () => {
  it('maps spelling variants onto the enum values', () => {
    assert.equal(normalizeVerdict(' On Track '), 'on_track');
    assert.equal(normalizeVerdict('on-track'), 'on_track');
    assert.equal(normalizeVerdict('CORRECT'), 'correct');
    assert.equal(normalizeVerdict('Incorrect'), 'incorrect');
  });
});

describe('isFinishedVerdict', () => {
  it('is true only for correct', () => {
    assert.equal(isFinishedVerdict('correct'), true);
    assert.equal(isFinishedVerdict('incorrect'), false);
    assert.equal(isFinishedVerdict('on_track'), false);
  });
});

describe('buildEvaluationMessage', () => {
  it('embeds the question, answer, history and current step', () => {
    assert.equal(
      buildEvaluationMessage(INPUT),
      [
        'Question: Solve 2x+5=13',
        'Correct Answer: x=4',
        "Student's previous steps (context only, do not judge them; consult only when necessary): 2x+5=13",
        "Student's current step (evaluate this step only): 2x=8",
      ].join('\n')
    );
  });
});

describe('OpenAIEvaluatorClient', () => {
  it('sends the tutoring policy and the step, and returns the verdict', async () => {
    const model = new ScriptedCompletionModel(() => ON_TRACK_JSON);
    const client = new OpenAIEvaluatorClient(model, 'gpt-5-mini', SYSTEM_PROMPT);

    const outcome = await client.evaluate(INPUT);

    assert.deepEqual(outcome, {
      success: true,
      evaluation: '## Current Step Analysis\n\nYou subtracted $5$ correctly.',
      hint: 'Now divide both sides by $2$.',
      verdict: 'on_track',
    });
    assert.equal(model.requests.length, 1);
    assert.equal(model.requests[0].model, 'gpt-5-mini');
    assert.deepEqual(model.requests[0].messages, [
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: buildEvaluationMessage(INPUT) },
    ]);
  });

  it('reports an unparseable reply as a parse error', async () => {
    const model = new ScriptedCompletionModel(() => "I'm sorry, I can't help with that.");
    const client = new OpenAIEvaluatorClient(model, 'gpt-5-mini', SYSTEM_PROMPT);

    const outcome = await client.evaluate(INPUT);

    assert.equal(outcome.success, false);
    if (!outcome.success) {
      assert.equal(outcome.kind, 'parse');
      assert.equal(outcome.error, 'Invalid JSON response from evaluation API: reply is not valid JSON');
    }
  });

  it('reports a thrown provider error as a provider error', async () => {
    const model = new ScriptedCompletionModel(() => {
      throw new Error('401 Incorrect API key provided');
    });
    const client = new OpenAIEvaluatorClient(model, 'gpt-5-mini', SYSTEM_PROMPT);

    const outcome = await client.evaluate(INPUT);

    assert.deepEqual(outcome, {
      success: false,
      kind: 'provider',
      error: 'An unexpected evaluation error occurred: 401 Incorrect API key provided',
    });
  });

  it('treats an empty completion as a provider error', async () => {
    const model = new ScriptedCompletionModel(() => null);
    const client = new OpenAIEvaluatorClient(model, 'gpt-5-mini', SYSTEM_PROMPT);

    const outcome = await client.evaluate(INPUT);

    assert.deepEqual(outcome, {
      success: false,
      kind: 'provider',
      error: 'An unexpected evaluation error occurred: Empty response from evaluation model',
    });
  });
});
