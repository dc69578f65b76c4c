/**
 * Dialog Engine — state machine опроса
 *
 * Один вызов = один переход: проверка ответа по правилу текущего шага,
 * запись ответа, вычисление следующего шага, сохранение сессии.
 * Движок не ходит ни в Telegram, ни в Google Sheets: он возвращает решение
 * (re-prompt / advance / complete), а вызывающий код его отображает.
 */

import { createLogger } from '../lib/logger.js';
import type { Localization } from '../lib/localization.js';
import { SessionBusyError, UnknownStepError } from './errors.js';
import { DONE_VALUE, formatProgressBar, renderPrompt } from './prompt.js';
import type { StepRegistry } from './registry.js';
import { createFreshSession, type SessionStore } from './sessionStore.js';
import { UserLock } from './userLock.js';
import { VALIDATORS } from './validators.js';
import {
  COMPLETE,
  type EngineDecision,
  type MultiChoiceStep,
  type PromptView,
  type StepDefinition,
  type StepOption,
  type SurveySession,
  type UserProfile,
  type UserReply,
} from './types.js';

const log = createLogger({ module: 'dialogEngine' });

export interface DialogEngineOptions {
  registry: StepRegistry;
  store: SessionStore;
  localization: Localization;
  defaultLanguage: string;
  /** Sessions idle for longer than this are removed by expireIdle(). */
  idleTimeoutMs: number;
  locks?: UserLock;
}

export interface SurveyStatus {
  completed: boolean;
  answeredCount: number;
  progress: string | null;
  prompt: PromptView | null;
  language: string;
}

type Evaluation =
  | { kind: 'accepted'; value: string }
  | { kind: 'toggled'; selection: string[] }
  | { kind: 'rejected'; reasonKey: string; params?: Record<string, string | number> };

/**
 * Нормализация для сравнения ответа с вариантами: регистр, пробелы,
 * эмодзи и знаки препинания не учитываются.
 */
export function normalizeChoice(raw: string): string {
  return raw
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

export class DialogEngine {
  private readonly registry: StepRegistry;
  private readonly store: SessionStore;
  private readonly localization: Localization;
  private readonly defaultLanguage: string;
  private readonly idleTimeoutMs: number;
  private readonly locks: UserLock;

  constructor(options: DialogEngineOptions) {
    this.registry = options.registry;
    this.store = options.store;
    this.localization = options.localization;
    this.defaultLanguage = options.defaultLanguage;
    this.idleTimeoutMs = options.idleTimeoutMs;
    this.locks = options.locks ?? new UserLock();
  }

  // =====================================================
  // Операции
  // =====================================================

  /**
   * Начать опрос заново: удалить сессию и создать новую на входном шаге.
   * Ждёт завершения текущего перехода этого пользователя.
   */
  async restart(userId: string, profile?: UserProfile): Promise<EngineDecision> {
    return this.locks.run<EngineDecision>(userId, async () => {
      await this.store.delete(userId);
      const session = createFreshSession(
        userId,
        { entryStepId: this.registry.entryStepId(), defaultLanguage: this.defaultLanguage },
        profile,
      );
      await this.store.save(session);

      log.info({ userId }, 'Survey session started');
      return { kind: 'prompt', prompt: this.promptFor(session) };
    });
  }

  /**
   * Обработать ответ пользователя на текущий шаг
   */
  async handleReply(userId: string, reply: UserReply, profile?: UserProfile): Promise<EngineDecision> {
    try {
      return await this.locks.tryRun(userId, () => this.applyReply(userId, reply, profile));
    } catch (err) {
      if (err instanceof SessionBusyError) {
        log.warn({ userId, reply: reply.type }, 'Reply rejected, previous one still in flight');
        return { kind: 'busy' };
      }
      throw err;
    }
  }

  /**
   * Вернуться к предыдущему отвеченному шагу. Ответ сохраняется и
   * перезаписывается при повторном ответе.
   */
  async goBack(userId: string): Promise<EngineDecision> {
    try {
      return await this.locks.tryRun<EngineDecision>(userId, async () => {
        const session = await this.store.get(userId);
        if (session.currentStep === COMPLETE) {
          return { kind: 'already_complete', language: session.language };
        }

        const current = this.requireStep(session);
        const previous = session.history.at(-1);
        if (previous === undefined) {
          return {
            kind: 'reprompt',
            prompt: this.promptFor(session, current),
            reason: this.localization.t('back_unavailable', session.language),
          };
        }

        session.history = session.history.slice(0, -1);
        session.currentStep = previous;
        session.lastActivityAt = new Date().toISOString();

        const step = this.requireStep(session);
        const earlier = step.answerKey ? session.answers[step.answerKey] : undefined;
        session.selection = step.kind === 'multi' && earlier ? earlier.split(',').filter(Boolean) : [];

        await this.store.save(session);
        log.info({ userId, from: current.id, to: step.id }, 'Went back one step');
        return { kind: 'prompt', prompt: this.promptFor(session, step) };
      });
    } catch (err) {
      if (err instanceof SessionBusyError) return { kind: 'busy' };
      throw err;
    }
  }

  /**
   * Текущий прогресс без изменения сессии
   */
  async status(userId: string): Promise<SurveyStatus | null> {
    const session = await this.store.find(userId);
    if (!session) return null;

    const answeredCount = Object.keys(session.answers).length;
    if (session.currentStep === COMPLETE) {
      return { completed: true, answeredCount, progress: null, prompt: null, language: session.language };
    }

    const step = this.requireStep(session);
    const progress = step.progress !== undefined
      ? formatProgressBar(step.progress - 1, this.registry.catalogue.progressTotal)
      : null;
    return {
      completed: false,
      answeredCount,
      progress,
      prompt: this.promptFor(session, step),
      language: session.language,
    };
  }

  /**
   * Удалить сессии без активности дольше таймаута. Проверка и удаление идут
   * под тем же per-user lock, что и переходы; занятые пользователи пропускаются.
   */
  async expireIdle(now: Date = new Date()): Promise<number> {
    const isIdle = (session: SurveySession) =>
      now.getTime() - Date.parse(session.lastActivityAt) > this.idleTimeoutMs;

    let expired = 0;
    for (const candidate of await this.store.list()) {
      if (!isIdle(candidate)) continue;
      try {
        await this.locks.tryRun(candidate.userId, async () => {
          const fresh = await this.store.find(candidate.userId);
          if (fresh && isIdle(fresh)) {
            await this.store.delete(candidate.userId);
            expired++;
          }
        });
      } catch (err) {
        if (!(err instanceof SessionBusyError)) throw err;
        log.debug({ userId: candidate.userId }, 'Skipping expiry of busy session');
      }
    }

    if (expired > 0) {
      log.info({ expired }, 'Idle survey sessions expired');
    }
    return expired;
  }

  // =====================================================
  // Переход
  // =====================================================

  private async applyReply(
    userId: string,
    reply: UserReply,
    profile?: UserProfile,
  ): Promise<EngineDecision> {
    // store.get returns a copy; nothing below is visible until save()
    const session = await this.store.get(userId, profile);
    if (profile) session.profile = { ...profile };

    if (session.currentStep === COMPLETE) {
      return { kind: 'already_complete', language: session.language };
    }

    const step = this.requireStep(session);
    const now = new Date().toISOString();
    session.lastActivityAt = now;

    // Button of an earlier message (double tap, old keyboard)
    if (reply.type === 'option' && reply.stepId !== step.id) {
      log.debug({ userId, stepId: reply.stepId, current: step.id }, 'Stale button press');
      await this.store.save(session);
      return { kind: 'stale', prompt: this.promptFor(session, step) };
    }

    const evaluation = this.evaluate(step, session, reply);

    if (evaluation.kind === 'rejected') {
      await this.store.save(session);
      return {
        kind: 'reprompt',
        prompt: this.promptFor(session, step),
        reason: this.localization.t(evaluation.reasonKey, session.language, evaluation.params),
      };
    }

    if (evaluation.kind === 'toggled') {
      session.selection = evaluation.selection;
      await this.store.save(session);
      return { kind: 'prompt', prompt: this.promptFor(session, step) };
    }

    const value = evaluation.value;
    if (step.answerKey) {
      session.answers[step.answerKey] = value;
    }
    if (step.id === this.registry.catalogue.languageStep) {
      session.language = value;
    }
    session.history = [...session.history, step.id];
    session.selection = [];

    const next = this.registry.resolveNext(step, value);

    if (next === COMPLETE) {
      session.currentStep = COMPLETE;
      session.completedAt = now;
      session.answers = this.answersOnPath(session);
      await this.store.save(session);

      log.info({ userId, answers: Object.keys(session.answers).length }, 'Survey completed');
      return { kind: 'complete', session };
    }

    session.currentStep = next;
    const nextStep = this.requireStep(session);
    await this.store.save(session);

    log.debug({ userId, from: step.id, to: nextStep.id }, 'Step accepted');
    return { kind: 'advance', prompt: this.promptFor(session, nextStep) };
  }

  private evaluate(step: StepDefinition, session: SurveySession, reply: UserReply): Evaluation {
    const raw = reply.type === 'text' ? reply.text : reply.type === 'option' ? reply.value : reply.phone;

    if (step.kind === 'text') {
      // контакт принимается только шагом с кнопкой «поделиться контактом»
      if (reply.type === 'option' || (reply.type === 'contact' && !step.acceptsContact)) {
        return { kind: 'rejected', reasonKey: 'invalid_choice' };
      }
      const result = VALIDATORS[step.validator](raw);
      return result.ok
        ? { kind: 'accepted', value: result.value }
        : { kind: 'rejected', reasonKey: result.reasonKey, params: result.params };
    }

    if (reply.type === 'contact') {
      return { kind: 'rejected', reasonKey: 'invalid_choice' };
    }

    if (step.kind === 'multi') {
      return this.evaluateMulti(step, session, raw);
    }

    const option = this.matchOption(step.options, raw);
    return option
      ? { kind: 'accepted', value: option.value }
      : { kind: 'rejected', reasonKey: 'invalid_choice' };
  }

  private evaluateMulti(step: MultiChoiceStep, session: SurveySession, raw: string): Evaluation {
    if (raw === DONE_VALUE || this.matchesLabel(step.doneKey, raw)) {
      const minSelected = step.minSelected ?? 0;
      if (session.selection.length < minSelected) {
        return { kind: 'rejected', reasonKey: 'validation.select_at_least', params: { min: minSelected } };
      }
      // Catalogue order, so the same picks always give the same value
      const picked = step.options
        .map(option => option.value)
        .filter(value => session.selection.includes(value));
      return { kind: 'accepted', value: picked.join(',') };
    }

    const option = this.matchOption(step.options, raw);
    if (!option) {
      return { kind: 'rejected', reasonKey: 'invalid_choice' };
    }

    const selection = session.selection.includes(option.value)
      ? session.selection.filter(value => value !== option.value)
      : [...session.selection, option.value];
    return { kind: 'toggled', selection };
  }

  private matchOption(options: StepOption[], raw: string): StepOption | null {
    const needle = normalizeChoice(raw);
    if (!needle) return null;
    return options.find(option =>
      normalizeChoice(option.value) === needle || this.matchesLabel(option.labelKey, raw),
    ) ?? null;
  }

  /** Whether `raw` equals the translation of `key` in any loaded language. */
  private matchesLabel(key: string, raw: string): boolean {
    const needle = normalizeChoice(raw);
    if (!needle) return false;
    return this.localization
      .languages()
      .some(lang => this.localization.has(key, lang) && normalizeChoice(this.localization.t(key, lang)) === needle);
  }

  /** Drops answers of steps left behind after going back and taking another branch. */
  private answersOnPath(session: SurveySession): Record<string, string> {
    const onPath: Record<string, string> = {};
    for (const stepId of session.history) {
      const key = this.registry.get(stepId)?.answerKey;
      if (key && session.answers[key] !== undefined) {
        onPath[key] = session.answers[key];
      }
    }
    return onPath;
  }

  private requireStep(session: SurveySession): StepDefinition {
    const step = this.registry.get(session.currentStep);
    if (!step) {
      log.error({ userId: session.userId, stepId: session.currentStep }, 'Session points at unknown step');
      throw new UnknownStepError(session.currentStep, session.userId);
    }
    return step;
  }

  private promptFor(session: SurveySession, step: StepDefinition = this.requireStep(session)): PromptView {
    return renderPrompt(step, session, this.localization, this.registry.catalogue.progressTotal);
  }
}
