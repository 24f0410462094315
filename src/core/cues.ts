// Phrase cues shared by the dialogue manager, the extractors and the intent fallback.

export const MONTH_PATTERN =
  'jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?';

export const AFFIRMATION_CUE = /\b(?:definitely|exactly|confirmed|for sure|certainly|yes|yep|yeah|correct|that'?s right)\b/i;

export const BARE_NEGATION = /^\s*(?:no|nope|nah|not really|not quite|wrong|incorrect)\b/i;

export const CORRECTION_CUE = /\b(?:actually|change|instead|correction|update|switch|make it|rather)\b/i;

export const GREETING_CUE = /^\s*(?:hi|hello|hey|hiya|howdy|good (?:morning|afternoon|evening)|greetings)\b/i;

export const CLEAR_PREFERENCES_CUE =
  /\b(?:clear|drop|forget|remove|reset)\s+(?:all\s+)?(?:my\s+|the\s+)?preferences\b|\bno (?:particular |special )?preferences\b/i;

/** Names the field being withdrawn ("scratch the budget", "forget the dates"). */
export const REJECT_FIELD_CUE =
  /\b(?:forget|scratch|drop|remove|ignore)\s+(?:about\s+)?(?:the\s+|my\s+)?(destination|dates?|budget|travell?ers?|group size|party size)\b/i;

export const MONTH_CUE = new RegExp(`\\b(?:${MONTH_PATTERN})\\b`, 'i');

export const TRAVEL_CUE =
  /\b(?:trip|travel(?:l?ing)?|visit|vacation|holiday|fly|flight|go(?:ing)? to|destination|budget|people|travell?ers?|adults?|hotel|beach|tour|journey|getaway|honeymoon|weekend|week|days?|nights?|spring|summer|autumn|winter)\b/i;

export const NUMBER_CUE = /\d/;

export const CURRENCY_CUE = /[$€£¥]|\b(?:usd|eur|gbp|jpy|sgd|aud|cad|dollars?|euros?|pounds?|yen)\b/i;

export function hasAffirmation(text: string): boolean {
  return AFFIRMATION_CUE.test(text);
}

export function isBareNegation(text: string): boolean {
  return BARE_NEGATION.test(text);
}

export function hasCorrectionCue(text: string): boolean {
  return CORRECTION_CUE.test(text);
}

export function hasRejectionCue(text: string): boolean {
  return REJECT_FIELD_CUE.test(text);
}

export function looksLikePlanning(text: string): boolean {
  return (
    TRAVEL_CUE.test(text) ||
    NUMBER_CUE.test(text) ||
    MONTH_CUE.test(text) ||
    CURRENCY_CUE.test(text) ||
    REJECT_FIELD_CUE.test(text)
  );
}
