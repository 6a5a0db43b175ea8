import { describe, it, expect } from 'vitest';
import { SectorClassifier, cleanAnswer, normalizeAnswer } from '../../src/services/sector-classifier.js';
import { isRetryableAnthropicError, type ClassificationModel } from '../../src/services/classification-model.js';
import { ClassifyError } from '../../src/errors.js';
import type { RateGate } from '../../src/utils/rate-limiter.js';

class ScriptedModel implements ClassificationModel {
  prompts: string[] = [];

  constructor(private readonly replies: Array<string | Error>) {}

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error('no scripted reply left');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

class CountingGate implements RateGate {
  acquired = 0;

  async acquire(): Promise<void> {
    this.acquired++;
  }
}

const CONTENT = 'Generali is an Italian insurance company founded in 1831.';

describe('normalizeAnswer', () => {
  it('accepts only a bare Yes or No', () => {
    expect(normalizeAnswer('Yes')).toBe('Yes');
    expect(normalizeAnswer(' no. ')).toBe('No');
    expect(normalizeAnswer('Yes, it is')).toBeNull();
  });
});

describe('cleanAnswer', () => {
  it('reads the first word through markup and translations', () => {
    expect(cleanAnswer('**Answer: No**')).toBe('No');
    expect(cleanAnswer('"Oui."')).toBe('Yes');
    expect(cleanAnswer('Não')).toBe('No');
    expect(cleanAnswer('Perhaps')).toBeNull();
    expect(cleanAnswer('')).toBeNull();
  });
});

describe('SectorClassifier', () => {
  it('returns a clean answer after one rate-limited request', async () => {
    const model = new ScriptedModel(['Yes']);
    const gate = new CountingGate();

    await expect(new SectorClassifier(model, gate).classify(CONTENT, 'Generali')).resolves.toBe('Yes');
    expect(gate.acquired).toBe(1);
    expect(model.prompts[0]).toContain('Organization: Generali');
    expect(model.prompts[0]).toContain(CONTENT);
  });

  it('asks a follow-up when the first answer is not a clean Yes or No', async () => {
    const model = new ScriptedModel(['Yes, it is an insurer.', 'Sim']);
    const gate = new CountingGate();

    await expect(new SectorClassifier(model, gate).classify(CONTENT, 'Generali')).resolves.toBe('Yes');
    expect(gate.acquired).toBe(2);
    expect(model.prompts[1].startsWith('Is "Generali" an insurance-sector organization')).toBe(true);
  });

  it('fails when the follow-up is unparseable too', async () => {
    const model = new ScriptedModel(['Maybe', 'I cannot tell']);
    const error = await new SectorClassifier(model, new CountingGate()).classify(CONTENT, 'Generali').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ClassifyError);
    if (error instanceof ClassifyError) {
      expect(error.message).toBe('Unparseable classifier answer: "I cannot tell"');
      expect(error.rawAnswer).toBe('I cannot tell');
      expect(error.stage).toBe('classify');
    }
  });

  it('wraps model failures', async () => {
    const model = new ScriptedModel([new Error('overloaded')]);
    await expect(new SectorClassifier(model, new CountingGate()).classify(CONTENT, 'AXA')).rejects.toThrow(
      'Classifier request failed for AXA: overloaded'
    );
  });
});

describe('isRetryableAnthropicError', () => {
  it('retries overloaded responses only', () => {
    expect(isRetryableAnthropicError(new Error('529 {"type":"error","error":{"type":"overloaded_error"}}'))).toBe(true);
    expect(isRetryableAnthropicError(new Error('invalid x-api-key'))).toBe(false);
  });
});
