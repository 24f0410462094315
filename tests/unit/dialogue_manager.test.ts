import { describe, it, expect } from '@jest/globals';
import {
  ALL_SET,
  FIX_PREFIX,
  GREETING_PREFIX,
  INTRO_PREFIX,
  REASK_PREFIX,
  REDIRECT_PREFIX,
  processTurn,
} from '../../src/core/dialogue_manager.js';
import { buildSummary } from '../../src/core/clarifier.js';
import type { FieldCandidate } from '../../src/schemas/extraction.js';
import { createSession } from '../../src/core/session_manager.js';
import {
  FIXED_NOW,
  completeRequirements,
  emptyResult,
  sessionWith,
  stubExtractor,
} from '../helpers/fakes.js';

const ASK_DATES = 'When are you planning to travel? A month or specific dates both work.';
const now = () => FIXED_NOW;

function cand<T>(value: T, correction = false): FieldCandidate<T> {
  return { value, confidenceHint: 'TENTATIVE', sourceSpan: null, correction };
}

describe('processTurn', () => {
  it('should ask the first question on an empty message without extracting', async () => {
    const extractor = stubExtractor();
    const out = await processTurn(createSession('s1', FIXED_NOW), '   ', 'UNKNOWN', { extractor, now });
    expect(out.reply).toBe('Where would you like to go?');
    expect(out.session.pendingQuestion).toEqual({ field: 'destination', kind: 'ASK' });
    expect(out.session.turnCount).toBe(1);
    expect(extractor.calls).toHaveLength(0);
  });

  it('should greet and ask the next question', async () => {
    const out = await processTurn(createSession('s1', FIXED_NOW), 'hello', 'GREETING', {
      extractor: stubExtractor(),
      now,
    });
    expect(out.reply).toBe(`${GREETING_PREFIX}Where would you like to go?`);
    expect(out.session.lastIntent).toBe('GREETING');
  });

  it('should introduce itself on an off-topic opener and redirect once data exists', async () => {
    const extractor = stubExtractor();
    const fresh = await processTurn(createSession('s1', FIXED_NOW), 'tell me a joke', 'OFF_TOPIC', { extractor, now });
    expect(fresh.reply).toBe(`${INTRO_PREFIX}Where would you like to go?`);

    const started = sessionWith({ destination: { value: 'Japan', confidence: 'TENTATIVE' } });
    const redirected = await processTurn(started, 'tell me a joke', 'OFF_TOPIC', { extractor, now });
    expect(redirected.reply).toBe(`${REDIRECT_PREFIX}${ASK_DATES}`);
    expect(redirected.session.requirements).toEqual(started.requirements);
    expect(extractor.calls).toHaveLength(0);
  });

  it('should re-ask the pending question on an unclear reply', async () => {
    const session = sessionWith(
      { destination: { value: 'Japan', confidence: 'TENTATIVE' } },
      { pendingQuestion: { field: 'dateRange', kind: 'ASK' } },
    );
    const out = await processTurn(session, 'hmm', 'UNKNOWN', { extractor: stubExtractor(), now });
    expect(out.reply).toBe(`${REASK_PREFIX}${ASK_DATES}`);
    expect(out.session.pendingQuestion).toEqual({ field: 'dateRange', kind: 'ASK' });
  });

  it('should acknowledge a new value and ask for the next field', async () => {
    const pendingQuestion = { field: 'destination' as const, kind: 'ASK' as const };
    const extractor = stubExtractor([{ ok: true, result: emptyResult({ fields: { destination: cand('Japan') } }) }]);
    const session = sessionWith({}, { pendingQuestion });
    const out = await processTurn(session, 'I want to go to Japan', 'PLANNING', { extractor, now });

    expect(out.reply).toBe(`Got it: Japan. ${ASK_DATES}`);
    expect(out.session.requirements.destination).toEqual({ value: 'Japan', confidence: 'TENTATIVE' });
    expect(out.session.pendingQuestion).toEqual({ field: 'dateRange', kind: 'ASK' });
    expect(out.session.updatedAt).toBe(FIXED_NOW.toISOString());
    expect(extractor.calls[0].ctx).toEqual({ pendingQuestion });
    expect(session.requirements.destination.confidence).toBe('UNSET');
  });

  it('should mention new preferences in the acknowledgement', async () => {
    const extractor = stubExtractor([{ ok: true, result: emptyResult({ preferences: ['temples'] }) }]);
    const out = await processTurn(createSession('s1', FIXED_NOW), 'we love temples', 'PLANNING', { extractor, now });
    expect(out.reply).toBe('Got it: preferences: temples. Where would you like to go?');
  });

  it('should keep state and re-ask when extraction fails', async () => {
    const session = sessionWith(
      { destination: { value: 'Japan', confidence: 'TENTATIVE' } },
      { pendingQuestion: { field: 'dateRange', kind: 'ASK' } },
    );
    const extractor = stubExtractor([{ ok: false, failure: { kind: 'TIMEOUT', message: 'extraction timed out' } }]);
    const out = await processTurn(session, 'sometime in spring', 'PLANNING', { extractor, now });

    expect(out.reply).toBe(`${REASK_PREFIX}${ASK_DATES}`);
    expect(out.extractionFailure).toEqual({ kind: 'TIMEOUT', message: 'extraction timed out' });
    expect(out.session.requirements).toEqual(session.requirements);
    expect(out.session.turnCount).toBe(1);
  });

  it('should clear the field under confirmation on a bare no', async () => {
    const session = sessionWith(
      {
        ...completeRequirements(),
        travelerCount: { value: 2, confidence: 'TENTATIVE' },
        status: 'COLLECTING',
      },
      { pendingQuestion: { field: 'travelerCount', kind: 'CONFIRM' } },
    );
    const out = await processTurn(session, 'no', 'PLANNING', { extractor: stubExtractor(), now });

    expect(out.session.requirements.travelerCount).toEqual({ value: null, confidence: 'UNSET' });
    expect(out.reply).toBe(`${FIX_PREFIX}How many people will be traveling?`);
    expect(out.session.pendingQuestion).toEqual({ field: 'travelerCount', kind: 'ASK' });
  });

  it('should replay the summary after completion unless the user corrects something', async () => {
    const session = sessionWith(completeRequirements());
    const extractor = stubExtractor();
    const out = await processTurn(session, 'sounds good, 2 people', 'PLANNING', { extractor, now });
    expect(out.reply).toBe(buildSummary(session.requirements));
    expect(out.readyForHandoff).toBe(true);
    expect(extractor.calls).toHaveLength(0);
  });

  it('should reopen a confirmed field on a correction after completion', async () => {
    const session = sessionWith(completeRequirements());
    const extractor = stubExtractor([{ ok: true, result: emptyResult({ fields: { travelerCount: cand(3, true) } }) }]);
    const out = await processTurn(session, 'actually make it 3 people', 'PLANNING', { extractor, now });

    expect(out.session.requirements.travelerCount).toEqual({ value: 3, confidence: 'TENTATIVE' });
    expect(out.session.requirements.status).toBe('COLLECTING');
    expect(out.readyForHandoff).toBe(false);
    expect(out.reply).toBe('Got it: 3 travelers. Just to confirm, there will be 3 travelers. Is that right?');
  });

  it('should pass a withdrawn field to the extractor after completion', async () => {
    const session = sessionWith(completeRequirements());
    const extractor = stubExtractor([{ ok: true, result: emptyResult({ rejected: ['budget'] }) }]);
    const out = await processTurn(session, 'scratch the budget', 'PLANNING', { extractor, now });

    expect(extractor.calls.map((c) => c.text)).toEqual(['scratch the budget']);
    expect(out.session.requirements.budget).toEqual({ value: null, confidence: 'UNSET' });
    expect(out.session.requirements.status).toBe('COLLECTING');
    expect(out.reply).toBe(`${FIX_PREFIX}What's your total budget for the trip?`);
    expect(out.session.pendingQuestion).toEqual({ field: 'budget', kind: 'ASK' });
  });

  it('should keep small talk short once everything is set', async () => {
    const session = sessionWith(completeRequirements());
    const extractor = stubExtractor();
    const greeting = await processTurn(session, 'hi', 'GREETING', { extractor, now });
    expect(greeting.reply).toBe(`Hello again! ${ALL_SET}`);
    const offTopic = await processTurn(session, 'what is the capital of Peru', 'OFF_TOPIC', { extractor, now });
    expect(offTopic.reply).toBe(ALL_SET);
    expect(offTopic.session.pendingQuestion).toBeNull();
  });
});
