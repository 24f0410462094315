import { describe, it, expect } from '@jest/globals';
import { classifyByKeywords, createIntentClassifier } from '../../src/core/intent.js';
import { silentLogger, stubLlm } from '../helpers/fakes.js';

const idle = { hasPendingQuestion: false };
const waiting = { hasPendingQuestion: true };

describe('classifyByKeywords', () => {
  it('should treat trip details as planning', () => {
    expect(classifyByKeywords('Japan please', idle)).toBe('PLANNING');
    expect(classifyByKeywords('hello, I want to plan a trip', idle)).toBe('PLANNING');
    expect(classifyByKeywords('3', idle)).toBe('PLANNING');
  });

  it('should recognize a plain greeting', () => {
    expect(classifyByKeywords('hello there', idle)).toBe('GREETING');
  });

  it('should read short replies as answers while a question is pending', () => {
    expect(classifyByKeywords('yes', waiting)).toBe('PLANNING');
    expect(classifyByKeywords('nope', waiting)).toBe('PLANNING');
    expect(classifyByKeywords('yes', idle)).toBe('UNKNOWN');
  });

  it('should flag unrelated chatter as off-topic', () => {
    expect(classifyByKeywords('what is the meaning of life', idle)).toBe('OFF_TOPIC');
    expect(classifyByKeywords('   ', idle)).toBe('UNKNOWN');
  });

  it('should keep chatter off-topic even while a question is pending', () => {
    expect(classifyByKeywords('tell me a joke', waiting)).toBe('OFF_TOPIC');
    expect(classifyByKeywords('sometime next spring, maybe', waiting)).toBe('PLANNING');
  });

  it('should treat a withdrawn field as planning', () => {
    expect(classifyByKeywords('forget the dates', idle)).toBe('PLANNING');
  });
});

describe('createIntentClassifier', () => {
  it('should use the model answer when it parses', async () => {
    const llm = stubLlm(['{"intent": "greeting"}']);
    const classifier = createIntentClassifier({ llm, log: silentLogger() });
    await expect(classifier.classify('good day to you', idle)).resolves.toBe('GREETING');
    expect(llm.prompts[0]).toContain('waiting for an answer to a question: no');
  });

  it('should map the model category other to off-topic', async () => {
    const classifier = createIntentClassifier({ llm: stubLlm(['{"intent": "other"}']), log: silentLogger() });
    await expect(classifier.classify('tell me a joke', waiting)).resolves.toBe('OFF_TOPIC');
  });

  it('should fall back to keywords on an invalid answer or an error', async () => {
    const invalid = createIntentClassifier({ llm: stubLlm(['{"intent": "weather"}']), log: silentLogger() });
    await expect(invalid.classify('hello there', idle)).resolves.toBe('GREETING');

    const failing = createIntentClassifier({ llm: stubLlm([new Error('offline')]), log: silentLogger() });
    await expect(failing.classify('Japan please', idle)).resolves.toBe('PLANNING');
  });

  it('should not call the model for empty text', async () => {
    const llm = stubLlm([]);
    await expect(createIntentClassifier({ llm }).classify('  ', idle)).resolves.toBe('UNKNOWN');
    expect(llm.prompts).toHaveLength(0);
  });
});
