import type { ExtractionResult, FieldCandidate } from '../schemas/extraction.js';
import {
  SLOT_ORDER,
  type BudgetT,
  type DateRangeT,
  type Slot,
  type SlotNameT,
  type TravelRequirementsT,
} from '../schemas/requirements.js';
import {
  budgetsEqual,
  dateRangesCompatible,
  destinationsCompatible,
  destinationsEqual,
  refineDateRange,
  refineDestination,
} from './normalize.js';

interface Comparator<T> {
  /** Same normalized value. */
  equal(a: T, b: T): boolean;
  /** Agrees with, possibly more or less specific than. */
  compatible(a: T, b: T): boolean;
  /** Pick the more specific of two compatible values. */
  refine(current: T, incoming: T): T;
}

const destinationCmp: Comparator<string> = {
  equal: destinationsEqual,
  compatible: destinationsCompatible,
  refine: refineDestination,
};

const dateRangeCmp: Comparator<DateRangeT> = {
  equal: (a, b) => a.start === b.start && a.end === b.end,
  compatible: dateRangesCompatible,
  refine: refineDateRange,
};

const travelerCmp: Comparator<number> = {
  equal: (a, b) => a === b,
  compatible: (a, b) => a === b,
  refine: (current) => current,
};

const budgetCmp: Comparator<BudgetT> = {
  equal: budgetsEqual,
  compatible: budgetsEqual,
  refine: (current) => current,
};

interface SlotMerge<T> {
  slot: Slot<T>;
  /** Value or confidence moved this turn. */
  changed: boolean;
  /** The stored value itself is new. */
  valueChanged: boolean;
}

export function mergeSlot<T>(
  slot: Slot<T>,
  candidate: FieldCandidate<T> | undefined,
  cmp: Comparator<T>,
  opts: { rejected: boolean; implicitConfirm: boolean },
): SlotMerge<T> {
  const unchanged: SlotMerge<T> = { slot, changed: false, valueChanged: false };

  if (!candidate) {
    if (opts.rejected) {
      if (slot.confidence === 'UNSET') return unchanged;
      return { slot: { value: null, confidence: 'UNSET' }, changed: true, valueChanged: true };
    }
    if (opts.implicitConfirm && slot.confidence === 'TENTATIVE') {
      return { slot: { value: slot.value, confidence: 'CONFIRMED' }, changed: true, valueChanged: false };
    }
    return unchanged;
  }

  const current = slot.value;
  if (current === null || slot.confidence === 'UNSET') {
    return { slot: { value: candidate.value, confidence: candidate.confidenceHint }, changed: true, valueChanged: true };
  }

  // A replacement for a rejected value is re-confirmed, however firmly it was phrased.
  if (opts.rejected) {
    return {
      slot: { value: candidate.value, confidence: 'TENTATIVE' },
      changed: true,
      valueChanged: !cmp.equal(current, candidate.value),
    };
  }

  if (slot.confidence === 'TENTATIVE') {
    if (cmp.compatible(current, candidate.value)) {
      const value = cmp.refine(current, candidate.value);
      return { slot: { value, confidence: 'CONFIRMED' }, changed: true, valueChanged: !cmp.equal(current, value) };
    }
    return { slot: { value: candidate.value, confidence: 'TENTATIVE' }, changed: true, valueChanged: true };
  }

  // CONFIRMED: only an explicit correction to a different value gets through.
  if (!candidate.correction || cmp.equal(current, candidate.value)) return unchanged;
  return { slot: { value: candidate.value, confidence: 'TENTATIVE' }, changed: true, valueChanged: true };
}

export function computeStatus(req: Omit<TravelRequirementsT, 'status'>): TravelRequirementsT['status'] {
  return SLOT_ORDER.every((f) => req[f].confidence === 'CONFIRMED') ? 'COMPLETE' : 'COLLECTING';
}

export interface MergeResult {
  requirements: TravelRequirementsT;
  /** Fields whose stored value changed (set, replaced or refined). */
  updated: SlotNameT[];
  /** Fields returned to UNSET. */
  cleared: SlotNameT[];
  addedPreferences: string[];
}

/**
 * Applies one successful extraction. TENTATIVE fields the turn neither mentions nor
 * rejects are confirmed.
 */
export function mergeExtraction(req: TravelRequirementsT, result: ExtractionResult): MergeResult {
  const rejected = new Set(result.rejected);
  const opts = (field: SlotNameT) => ({ rejected: rejected.has(field), implicitConfirm: true });

  const destination = mergeSlot(req.destination, result.fields.destination, destinationCmp, opts('destination'));
  const dateRange = mergeSlot(req.dateRange, result.fields.dateRange, dateRangeCmp, opts('dateRange'));
  const travelerCount = mergeSlot(req.travelerCount, result.fields.travelerCount, travelerCmp, opts('travelerCount'));
  const budget = mergeSlot(req.budget, result.fields.budget, budgetCmp, opts('budget'));

  const base = result.clearPreferences ? [] : req.preferences;
  const addedPreferences = result.preferences.filter((p, i, all) => !base.includes(p) && all.indexOf(p) === i);
  const preferences = [...base, ...addedPreferences];

  const merged = {
    destination: destination.slot,
    dateRange: dateRange.slot,
    travelerCount: travelerCount.slot,
    budget: budget.slot,
    preferences,
  };

  const outcomes: Record<SlotNameT, SlotMerge<unknown>> = { destination, dateRange, travelerCount, budget };
  return {
    requirements: { ...merged, status: computeStatus(merged) },
    updated: SLOT_ORDER.filter((f) => outcomes[f].valueChanged && outcomes[f].slot.confidence !== 'UNSET'),
    cleared: SLOT_ORDER.filter((f) => outcomes[f].changed && outcomes[f].slot.confidence === 'UNSET'),
    addedPreferences,
  };
}
