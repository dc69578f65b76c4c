/**
 * Шаги опроса для подбора курса
 *
 * Язык интерфейса → приветствие → 7 вопросов (имя, уровень, цель, формат,
 * ожидания, дата старта, телефон). Ветвление задаётся данными: цель «Другое»
 * добавляет уточняющий вопрос.
 */

import { COMPLETE, type StepOption, type SurveyCatalogue } from './types.js';

const option = (group: string, value: string): StepOption => ({
  value,
  labelKey: `${group}.${value}`,
});

export const SURVEY_PROGRESS_TOTAL = 7;

export const SURVEY_CATALOGUE: SurveyCatalogue = {
  entry: 'language',
  progressTotal: SURVEY_PROGRESS_TOTAL,
  languageStep: 'language',
  steps: [
    {
      id: 'language',
      kind: 'choice',
      promptKey: 'ask_language',
      answerKey: 'language',
      options: [option('language', 'ru'), option('language', 'en')],
      next: { kind: 'fixed', to: 'greeting' },
    },
    {
      id: 'greeting',
      kind: 'choice',
      promptKey: 'start_greeting',
      options: [option('greeting', 'start')],
      next: { kind: 'fixed', to: 'name' },
    },
    {
      id: 'name',
      kind: 'text',
      promptKey: 'ask_name',
      answerKey: 'name',
      validator: 'name',
      progress: 1,
      next: { kind: 'fixed', to: 'level' },
    },
    {
      id: 'level',
      kind: 'choice',
      promptKey: 'ask_level',
      answerKey: 'level',
      progress: 2,
      options: ['beginner', 'elementary', 'intermediate', 'advanced', 'not_sure']
        .map(value => option('level', value)),
      next: { kind: 'fixed', to: 'goal' },
    },
    {
      id: 'goal',
      kind: 'choice',
      promptKey: 'ask_goal',
      answerKey: 'goal',
      progress: 3,
      options: ['general', 'conversational', 'travel', 'business', 'exam', 'children', 'other']
        .map(value => option('goal', value)),
      next: {
        kind: 'branch',
        rules: [{ equals: ['other'], to: 'goal_details' }],
        otherwise: 'format',
      },
    },
    {
      id: 'goal_details',
      kind: 'text',
      promptKey: 'ask_goal_details',
      answerKey: 'goal_details',
      validator: 'text',
      progress: 3,
      next: { kind: 'fixed', to: 'format' },
    },
    {
      id: 'format',
      kind: 'choice',
      promptKey: 'ask_format',
      answerKey: 'format',
      progress: 4,
      options: ['individual', 'pair', 'group', 'online'].map(value => option('format', value)),
      next: { kind: 'fixed', to: 'expectations' },
    },
    {
      id: 'expectations',
      kind: 'multi',
      promptKey: 'ask_expectations',
      answerKey: 'expectations',
      doneKey: 'done',
      minSelected: 1,
      progress: 5,
      options: ['variety', 'plateau', 'tasks', 'feedback', 'ease', 'other']
        .map(value => option('expectations', value)),
      next: { kind: 'fixed', to: 'start_date' },
    },
    {
      id: 'start_date',
      kind: 'choice',
      promptKey: 'ask_start_date',
      answerKey: 'start_date',
      progress: 6,
      options: ['now', 'next_week', 'couple_weeks', 'undecided'].map(value => option('start_date', value)),
      next: { kind: 'fixed', to: 'phone' },
    },
    {
      id: 'phone',
      kind: 'text',
      promptKey: 'ask_phone',
      answerKey: 'phone',
      validator: 'phone',
      acceptsContact: true,
      progress: 7,
      next: { kind: 'fixed', to: COMPLETE },
    },
  ],
};
