import { describe, expect, it } from 'vitest';
import type { Question } from '../../shared/types';
import { InvalidAnswerValueError } from '../../shared/errors';
import { renderAnswer, validateAnswerValue } from './answers';

const freeText: Question = { id: 'q_text', prompt: 'Tell us', type: 'free_text', isCompulsory: true };

const single: Question = {
  id: 'q_single',
  prompt: 'Pick one',
  type: 'single_choice',
  isCompulsory: true,
  options: [
    { value: 'male', label: 'Male' },
    { value: 'female', label: 'Female' },
  ],
};

const multiple: Question = {
  id: 'q_multi',
  prompt: 'Pick some',
  type: 'multiple_choice',
  isCompulsory: true,
  options: [
    { value: 'left_arm', label: 'Left arm' },
    { value: 'jaw', label: 'Jaw' },
  ],
};

const numeric: Question = { id: 'q_num', prompt: 'Score', type: 'numeric', isCompulsory: true, min: 0, max: 10 };

describe('validateAnswerValue', () => {
  it('sanitizes free text', () => {
    expect(validateAnswerValue(freeText, '  bad\u0007 cough \n')).toBe('bad cough');
  });

  it('rejects empty free text', () => {
    expect(() => validateAnswerValue(freeText, '   ')).toThrow(InvalidAnswerValueError);
    expect(() => validateAnswerValue(freeText, 42)).toThrow('Invalid answer for q_text: expected text');
  });

  it('accepts only declared options for single choice', () => {
    expect(validateAnswerValue(single, 'female')).toBe('female');
    expect(() => validateAnswerValue(single, 'Female')).toThrow(
      'Invalid answer for q_single: "Female" is not one of the options'
    );
  });

  it('requires distinct declared options for multiple choice', () => {
    expect(validateAnswerValue(multiple, ['jaw', 'left_arm'])).toEqual(['jaw', 'left_arm']);
    expect(() => validateAnswerValue(multiple, [])).toThrow(InvalidAnswerValueError);
    expect(() => validateAnswerValue(multiple, ['jaw', 'jaw'])).toThrow('"jaw" is selected twice');
    expect(() => validateAnswerValue(multiple, 'jaw')).toThrow(InvalidAnswerValueError);
  });

  it('checks numeric bounds', () => {
    expect(validateAnswerValue(numeric, 7.5)).toBe(7.5);
    expect(() => validateAnswerValue(numeric, 11)).toThrow('must be at most 10');
    expect(() => validateAnswerValue(numeric, -1)).toThrow('must be at least 0');
    expect(() => validateAnswerValue(numeric, Number.NaN)).toThrow('expected a number');
    expect(() => validateAnswerValue(numeric, '7')).toThrow('expected a number');
  });
});

describe('renderAnswer', () => {
  it('uses option labels for choice answers', () => {
    expect(renderAnswer(single, 'female')).toBe('Female');
    expect(renderAnswer(multiple, ['left_arm', 'jaw'])).toBe('Left arm, Jaw');
  });

  it('keeps free text and numbers as they are', () => {
    expect(renderAnswer(freeText, 'since Monday')).toBe('since Monday');
    expect(renderAnswer(numeric, 4)).toBe('4');
  });
});
