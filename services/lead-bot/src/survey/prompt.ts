import type { Localization } from '../lib/localization.js';
import type { PromptView, StepDefinition, SurveySession } from './types.js';

/** Reserved option value of the confirm button of a multi-choice step. */
export const DONE_VALUE = '__done__';

/**
 * Строка прогресса: ▓▓▓░░░░░░░ 3/7
 */
export function formatProgressBar(current: number, total: number): string {
  const ratio = total > 0 ? Math.min(current / total, 1) : 0;
  const filled = Math.round(ratio * 10);
  const bar = '▓'.repeat(filled) + '░'.repeat(10 - filled);
  return `${bar} ${current}/${total}`;
}

export function renderPrompt(
  step: StepDefinition,
  session: SurveySession,
  localization: Localization,
  progressTotal: number,
): PromptView {
  const lang = session.language;
  const question = localization.t(step.promptKey, lang, {
    name: session.answers.name ?? session.profile.displayName ?? '',
  });
  const text = step.progress !== undefined
    ? `${formatProgressBar(step.progress, progressTotal)}\n${question}`
    : question;

  if (step.kind === 'text') {
    return {
      stepId: step.id,
      kind: step.kind,
      text,
      options: [],
      acceptsContact: step.acceptsContact === true,
      language: lang,
    };
  }

  const selected = new Set(step.kind === 'multi' ? session.selection : []);
  return {
    stepId: step.id,
    kind: step.kind,
    text,
    options: step.options.map(option => ({
      value: option.value,
      label: localization.t(option.labelKey, lang),
      ...(step.kind === 'multi' ? { selected: selected.has(option.value) } : {}),
    })),
    ...(step.kind === 'multi' ? { doneLabel: localization.t(step.doneKey, lang) } : {}),
    acceptsContact: false,
    language: lang,
  };
}
