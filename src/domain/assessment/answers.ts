import type { AnswerValue, Question } from '../../shared/types';
import { InvalidAnswerValueError } from '../../shared/errors';
import { sanitizeInput } from '../../shared/validation';

/**
 * Check a raw answer against the question's declared type and options.
 * Returns the value to store (free text comes back sanitized).
 */
export function validateAnswerValue(question: Question, value: unknown): AnswerValue {
  const fail = (reason: string): never => {
    throw new InvalidAnswerValueError(question.id, reason);
  };

  switch (question.type) {
    case 'free_text': {
      if (typeof value !== 'string') return fail('expected text');
      const cleaned = sanitizeInput(value);
      if (cleaned.length === 0) return fail('answer is empty');
      return cleaned;
    }

    case 'single_choice': {
      if (typeof value !== 'string') return fail('expected one option value');
      if (!question.options?.some((o) => o.value === value)) {
        return fail(`"${value}" is not one of the options`);
      }
      return value;
    }

    case 'multiple_choice': {
      if (!Array.isArray(value) || value.length === 0) {
        return fail('expected a non-empty list of option values');
      }
      const selected: string[] = [];
      for (const item of value) {
        if (typeof item !== 'string') return fail('option values must be strings');
        if (!question.options?.some((o) => o.value === item)) {
          return fail(`"${item}" is not one of the options`);
        }
        if (selected.includes(item)) return fail(`"${item}" is selected twice`);
        selected.push(item);
      }
      return selected;
    }

    case 'numeric': {
      if (typeof value !== 'number' || !Number.isFinite(value)) return fail('expected a number');
      if (question.min !== undefined && value < question.min) {
        return fail(`must be at least ${question.min}`);
      }
      if (question.max !== undefined && value > question.max) {
        return fail(`must be at most ${question.max}`);
      }
      return value;
    }
  }
}

/**
 * Human-readable form of a stored answer: option labels instead of values.
 */
export function renderAnswer(question: Question, value: AnswerValue): string {
  const labelOf = (v: string): string => question.options?.find((o) => o.value === v)?.label ?? v;

  if (Array.isArray(value)) {
    return value.map(labelOf).join(', ');
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return question.options ? labelOf(value) : value;
}
