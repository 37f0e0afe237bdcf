import type { FieldLimits } from '../config/env.js';
import { categoryAt, JOB_CATEGORIES } from '../shared/categories.js';
import { ValidationError } from '../shared/errors.js';
import { isValidContact, validateField } from '../shared/validation.js';

/**
 * Submission wizard state. Each step carries exactly the fields collected so far,
 * so a state can never claim a field it has not validated.
 */
export type WizardState =
  | { step: 'idle' }
  | { step: 'awaiting_title' }
  | { step: 'awaiting_description'; title: string }
  | { step: 'awaiting_contact'; title: string; description: string }
  | { step: 'awaiting_category'; title: string; description: string; contact: string };

export type WizardStep = WizardState['step'];

export type ActiveStep = Exclude<WizardStep, 'idle'>;

export interface ListingDraft {
  title: string;
  description: string;
  contact: string;
  category: string;
}

export interface WizardRules {
  limits: FieldLimits;
  /** Require a phone number or @username on top of the length check. */
  strictContact: boolean;
}

export type TextStepResult =
  | { kind: 'advanced'; state: WizardState }
  | { kind: 'invalid'; error: ValidationError }
  | { kind: 'ignored' };

export type CategoryStepResult =
  | { kind: 'complete'; draft: ListingDraft }
  | { kind: 'invalid'; error: ValidationError }
  | { kind: 'ignored' };

export const IDLE: WizardState = { step: 'idle' };

export function begin(): WizardState {
  return { step: 'awaiting_title' };
}

function attempt(fn: () => WizardState): TextStepResult {
  try {
    return { kind: 'advanced', state: fn() };
  } catch (err) {
    if (err instanceof ValidationError) {
      return { kind: 'invalid', error: err };
    }
    throw err;
  }
}

/**
 * Feed a text message to the wizard. Invalid input leaves the state as it was;
 * text in idle or category steps is not part of the flow.
 */
export function acceptText(state: WizardState, input: string, rules: WizardRules): TextStepResult {
  switch (state.step) {
    case 'awaiting_title':
      return attempt(() => ({
        step: 'awaiting_description',
        title: validateField('title', input, rules.limits),
      }));
    case 'awaiting_description': {
      const { title } = state;
      return attempt(() => ({
        step: 'awaiting_contact',
        title,
        description: validateField('description', input, rules.limits),
      }));
    }
    case 'awaiting_contact': {
      const { title, description } = state;
      return attempt(() => {
        const contact = validateField('contact', input, rules.limits);
        if (rules.strictContact && !isValidContact(contact)) {
          throw new ValidationError('contact', 'must be a phone number or @username');
        }
        return {
          step: 'awaiting_category',
          title,
          description,
          contact,
        };
      });
    }
    case 'idle':
    case 'awaiting_category':
      return { kind: 'ignored' };
    default: {
      const _exhaustive: never = state;
      return _exhaustive;
    }
  }
}

export function acceptCategory(state: WizardState, index: number): CategoryStepResult {
  if (state.step !== 'awaiting_category') {
    return { kind: 'ignored' };
  }
  const category = categoryAt(index);
  if (!category) {
    return {
      kind: 'invalid',
      error: new ValidationError('category', `index must be between 0 and ${JOB_CATEGORIES.length - 1}`),
    };
  }
  return {
    kind: 'complete',
    draft: {
      title: state.title,
      description: state.description,
      contact: state.contact,
      category,
    },
  };
}
