import assert from 'node:assert/strict';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { after, before, describe, it } from 'node:test';
import type { Part } from '@google/generative-ai';
import { GeminiOcrClient, UnconfiguredOcrClient } from './ocr';
import type { VisionModel } from './ocr';

const OCR_PROMPT = 'Transcribe the handwriting.';
const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

class ScriptedVisionModel implements VisionModel {
  readonly requests: Array<Array<string | Part>> = [];

  constructor(private readonly reply: () => string) {}

  async generateContent(request: Array<string | Part>) {
    this.requests.push(request);
    return { response: { text: this.reply } };
  }
}

describe('GeminiOcrClient', () => {
  let tempDir: string;

  before(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ocr-test-'));
  });

  after(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('sends the image inline with the prompt and returns the text', async () => {
    const model = new ScriptedVisionModel(() => '2x = 8');
    const client = new GeminiOcrClient(model, OCR_PROMPT);

    const result = await client.extractText({ kind: 'bytes', data: PNG_BYTES, mimeType: 'image/png' });

    assert.deepEqual(result, { success: true, text: '2x = 8', error: null });
    assert.equal(model.requests.length, 1);
    assert.deepEqual(model.requests[0], [
      { inlineData: { data: 'iVBORw0KGgo=', mimeType: 'image/png' } },
      OCR_PROMPT,
    ]);
  });

  it('sends image/jpg as image/jpeg', async () => {
    const model = new ScriptedVisionModel(() => 'x = 4');
    const client = new GeminiOcrClient(model, OCR_PROMPT);

    await client.extractText({ kind: 'base64', data: '/9j/4A==', mimeType: 'image/jpg' });

    assert.deepEqual(model.requests[0]?.[0], { inlineData: { data: '/9j/4A==', mimeType: 'image/jpeg' } });
  });

  it('reads an image from disk and detects its type', async () => {
    const filePath = path.join(tempDir, 'upload-without-extension');
    fs.writeFileSync(filePath, PNG_BYTES);
    const model = new ScriptedVisionModel(() => '2x + 5 = 13');
    const client = new GeminiOcrClient(model, OCR_PROMPT);

    const result = await client.extractText({ kind: 'path', path: filePath });

    assert.deepEqual(result, { success: true, text: '2x + 5 = 13', error: null });
    assert.deepEqual(model.requests[0]?.[0], { inlineData: { data: 'iVBORw0KGgo=', mimeType: 'image/png' } });
  });

  it('reports a missing file without calling the model', async () => {
    const model = new ScriptedVisionModel(() => 'unused');
    const client = new GeminiOcrClient(model, OCR_PROMPT);
    const missing = path.join(tempDir, 'missing.png');

    const result = await client.extractText({ kind: 'path', path: missing });

    assert.deepEqual(result, { success: false, text: null, error: `Image file not found: ${missing}` });
    assert.equal(model.requests.length, 0);
  });

  it('reports provider failures', async () => {
    const model = new ScriptedVisionModel(() => {
      throw new Error('[GoogleGenerativeAI Error]: quota exceeded');
    });
    const client = new GeminiOcrClient(model, OCR_PROMPT);

    const result = await client.extractText({ kind: 'bytes', data: PNG_BYTES, mimeType: 'image/png' });

    assert.deepEqual(result, {
      success: false,
      text: null,
      error: 'Failed to extract text: [GoogleGenerativeAI Error]: quota exceeded',
    });
  });
});

describe('UnconfiguredOcrClient', () => {
  it('fails every call', async () => {
    const result = await new UnconfiguredOcrClient().extractText();
    assert.deepEqual(result, { success: false, text: null, error: 'OCR provider is not configured' });
  });
});
