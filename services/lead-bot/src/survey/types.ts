/**
 * Типы survey-движка: шаги, сессия, ответы пользователя и решения движка.
 */

export const COMPLETE = 'COMPLETE' as const;
export type Complete = typeof COMPLETE;

export type StepId = string;
export type AnswerKey = string;

export interface StepOption {
  value: string;
  labelKey: string;
}

export interface BranchRule {
  /** Accepted values (option values) that route to `to`. */
  equals: string[];
  to: StepId | Complete;
}

export type NextRule =
  | { kind: 'fixed'; to: StepId | Complete }
  | { kind: 'branch'; rules: BranchRule[]; otherwise: StepId | Complete };

export type ValidatorName = 'name' | 'phone' | 'text';

interface StepBase {
  id: StepId;
  promptKey: string;
  /** Intro steps (e.g. a "start" button) record nothing. */
  answerKey?: AnswerKey;
  /** Position shown in the progress bar; steps without it show no bar. */
  progress?: number;
  next: NextRule;
}

export interface ChoiceStep extends StepBase {
  kind: 'choice';
  options: StepOption[];
}

export interface MultiChoiceStep extends StepBase {
  kind: 'multi';
  options: StepOption[];
  doneKey: string;
  minSelected?: number;
}

export interface TextStep extends StepBase {
  kind: 'text';
  validator: ValidatorName;
  acceptsContact?: boolean;
}

export type StepDefinition = ChoiceStep | MultiChoiceStep | TextStep;

export interface SurveyCatalogue {
  entry: StepId;
  /** Total shown in "n/total" progress. */
  progressTotal: number;
  /** The step whose accepted value becomes the session's interface language. */
  languageStep?: StepId;
  steps: StepDefinition[];
}

export interface UserProfile {
  username: string | null;
  displayName: string | null;
}

export type SessionSource = 'telegram' | 'website';

export interface SurveySession {
  userId: string;
  currentStep: StepId | Complete;
  answers: Record<AnswerKey, string>;
  language: string;
  /** Steps answered on the current path, oldest first. */
  history: StepId[];
  /** Unconfirmed picks of the active multi-choice step. */
  selection: string[];
  profile: UserProfile;
  source: SessionSource;
  createdAt: string;
  lastActivityAt: string;
  completedAt: string | null;
}

export type UserReply =
  | { type: 'text'; text: string }
  | { type: 'option'; stepId: StepId; value: string }
  | { type: 'contact'; phone: string };

export type ValidationResult =
  | { ok: true; value: string }
  | { ok: false; reasonKey: string; params?: Record<string, string | number> };

export interface PromptOptionView {
  value: string;
  label: string;
  selected?: boolean;
}

export interface PromptView {
  stepId: StepId;
  kind: StepDefinition['kind'];
  text: string;
  options: PromptOptionView[];
  /** Label of the confirm button of a multi-choice step. */
  doneLabel?: string;
  acceptsContact: boolean;
  language: string;
}

export type EngineDecision =
  | { kind: 'prompt'; prompt: PromptView }
  | { kind: 'reprompt'; prompt: PromptView; reason: string }
  | { kind: 'advance'; prompt: PromptView }
  | { kind: 'stale'; prompt: PromptView }
  | { kind: 'complete'; session: SurveySession }
  | { kind: 'already_complete'; language: string }
  | { kind: 'busy' };
