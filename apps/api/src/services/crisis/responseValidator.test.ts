import { describe, expect, it } from 'vitest';
import {
  DIAGNOSTIC_BOUNDARY_REPLY,
  ESCALATION_REDIRECT_REPLY,
  TREATMENT_BOUNDARY_REPLY,
  validateGeneratedText,
} from './responseValidator.js';

describe('validateGeneratedText', () => {
  it('returns null for empty output', () => {
    expect(validateGeneratedText('')).toBeNull();
    expect(validateGeneratedText('   \n ')).toBeNull();
  });

  it('passes safe text through, trimmed', () => {
    expect(validateGeneratedText('  That sounds hard. Want to talk it through?  ')).toBe(
      'That sounds hard. Want to talk it through?',
    );
  });

  it('does not flag ordinary empathy', () => {
    const text = 'It sounds like you have a lot on your plate this week.';
    expect(validateGeneratedText(text)).toBe(text);
  });

  it('replaces diagnostic claims', () => {
    expect(validateGeneratedText('You have generalized anxiety disorder.')).toBe(DIAGNOSTIC_BOUNDARY_REPLY);
  });

  it('replaces treatment advice', () => {
    expect(validateGeneratedText('You should take melatonin before bed.')).toBe(TREATMENT_BOUNDARY_REPLY);
  });

  it('checks escalation before the other categories', () => {
    expect(validateGeneratedText('Thoughts of suicide can be a symptom of a disorder.')).toBe(
      ESCALATION_REDIRECT_REPLY,
    );
  });

  it('checks diagnostic claims before treatment advice', () => {
    expect(validateGeneratedText('Your diagnosis means you need medication.')).toBe(DIAGNOSTIC_BOUNDARY_REPLY);
  });

  it.each([
    ['a plural', 'These sound like symptoms of anxiety disorders.', DIAGNOSTIC_BOUNDARY_REPLY],
    ['a third-person verb', 'Only a professional diagnoses that kind of thing.', DIAGNOSTIC_BOUNDARY_REPLY],
    ['a past tense', 'A doctor prescribed something similar for my friend.', TREATMENT_BOUNDARY_REPLY],
    ['a hyphenated compound', 'Self-harming is never your fault.', ESCALATION_REDIRECT_REPLY],
  ])('catches %s of a listed phrase', (_label, text, expected) => {
    expect(validateGeneratedText(text)).toBe(expected);
  });

  it('matches phrases across line breaks', () => {
    expect(validateGeneratedText('I think you should\ntake a break from the treatment\nplan talk.')).toBe(
      TREATMENT_BOUNDARY_REPLY,
    );
  });
});
