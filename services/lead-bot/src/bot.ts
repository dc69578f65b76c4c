import TelegramBot from 'node-telegram-bot-api';
import type { AppConfig } from './config.js';
import { createLogger } from './lib/logger.js';
import type { Localization } from './lib/localization.js';
import type { LeadDispatcher } from './lib/leadDispatcher.js';
import type { RateLimiter, RateLimitKind } from './lib/rateLimiter.js';
import type { LeadsSheet } from './lib/sheets.js';
import { parseCallbackData, promptMarkup, removeKeyboard } from './lib/telegram.js';
import type { DialogEngine } from './survey/engine.js';
import { CorruptSessionError, UnknownStepError } from './survey/errors.js';
import type { LeadStatus } from './survey/exportRecord.js';
import type { EngineDecision, PromptView, UserProfile, UserReply } from './survey/types.js';

const logger = createLogger({ module: 'bot' });

export type BotApi = Pick<TelegramBot, 'sendMessage' | 'answerCallbackQuery' | 'editMessageReplyMarkup'>;

export type StatusUpdater = Pick<LeadsSheet, 'updateStatus'>;

export interface LeadBotDeps {
  bot: BotApi;
  engine: DialogEngine;
  dispatcher: LeadDispatcher;
  statusUpdater: StatusUpdater;
  localization: Localization;
  rateLimiter: RateLimiter;
  config: Pick<AppConfig, 'staffChatId' | 'defaultLanguage' | 'exportLanguage'>;
}

function profileOf(user: TelegramBot.User): UserProfile {
  const displayName = [user.first_name, user.last_name].filter(Boolean).join(' ');
  return {
    username: user.username ?? null,
    displayName: displayName || null,
  };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// Сессия не читается или ссылается на удалённый шаг: прогресс не сбрасываем, просим /restart
function errorKey(err: unknown): string {
  return err instanceof CorruptSessionError || err instanceof UnknownStepError
    ? 'errors.session_unreadable'
    : 'errors.generic';
}

/**
 * Telegram-транспорт: апдейты → решения движка → сообщения
 */
export class LeadBot {
  constructor(private readonly deps: LeadBotDeps) {}

  private t(key: string, lang: string, params?: Record<string, string | number>): string {
    return this.deps.localization.t(key, lang, params);
  }

  private async languageOf(userId: string): Promise<string> {
    const status = await this.deps.engine.status(userId);
    return status?.language ?? this.deps.config.defaultLanguage;
  }

  private async allow(chatId: number, userId: string, kind: RateLimitKind): Promise<boolean> {
    const decision = this.deps.rateLimiter.check(userId, kind);
    if (decision.allowed) return true;

    await this.deps.bot.sendMessage(chatId, this.t('rate_limited', await this.languageOf(userId), {
      seconds: decision.retryAfterSeconds,
    }));
    return false;
  }

  // =====================================================
  // Сообщения
  // =====================================================

  async handleMessage(msg: TelegramBot.Message): Promise<void> {
    const from = msg.from;
    if (!from || from.is_bot) return;
    // Чат менеджеров — только кнопки статуса
    if (String(msg.chat.id) === this.deps.config.staffChatId) return;

    const chatId = msg.chat.id;
    const userId = String(from.id);

    try {
      const text = msg.text?.trim();
      if (text?.startsWith('/')) {
        if (!(await this.allow(chatId, userId, 'command'))) return;
        await this.handleCommand(chatId, userId, text, profileOf(from));
        return;
      }

      let reply: UserReply;
      if (msg.contact) {
        reply = { type: 'contact', phone: msg.contact.phone_number };
      } else if (text !== undefined) {
        reply = { type: 'text', text };
      } else {
        await this.deps.bot.sendMessage(chatId, this.t('unsupported_message', await this.languageOf(userId)));
        return;
      }

      if (!(await this.allow(chatId, userId, 'message'))) return;

      const decision = await this.deps.engine.handleReply(userId, reply, profileOf(from));
      await this.render(chatId, decision);
    } catch (err) {
      logger.error({ userId, error: errorMessage(err) }, 'Error handling message');
      await this.deps.bot.sendMessage(chatId, this.t(errorKey(err), this.deps.config.defaultLanguage));
    }
  }

  private async handleCommand(chatId: number, userId: string, text: string, profile: UserProfile): Promise<void> {
    // "/start@my_bot payload" → "start"
    const command = text.slice(1).split(/[\s@]/)[0].toLowerCase();

    switch (command) {
      case 'start':
      case 'restart':
      case 'trash': {
        logger.info({ userId, command }, 'Survey restart requested');
        await this.render(chatId, await this.deps.engine.restart(userId, profile));
        return;
      }
      case 'back': {
        await this.render(chatId, await this.deps.engine.goBack(userId));
        return;
      }
      case 'status': {
        const status = await this.deps.engine.status(userId);
        if (!status) {
          await this.deps.bot.sendMessage(chatId, this.t('status.none', this.deps.config.defaultLanguage));
          return;
        }
        if (status.completed || !status.prompt) {
          await this.deps.bot.sendMessage(chatId, this.t('status.completed', status.language));
          return;
        }
        const summary = this.t('status.in_progress', status.language, { answered: status.answeredCount });
        await this.deps.bot.sendMessage(chatId, status.progress ? `${summary}\n${status.progress}` : summary);
        await this.sendPrompt(chatId, status.prompt);
        return;
      }
      case 'help': {
        await this.deps.bot.sendMessage(chatId, this.t('help', await this.languageOf(userId)));
        return;
      }
      default:
        await this.deps.bot.sendMessage(chatId, this.t('unknown_command', await this.languageOf(userId)));
    }
  }

  // =====================================================
  // Кнопки
  // =====================================================

  async handleCallbackQuery(query: TelegramBot.CallbackQuery): Promise<void> {
    const action = parseCallbackData(query.data);
    const message = query.message;

    if (action.type === 'unknown' || !message) {
      await this.deps.bot.answerCallbackQuery(query.id);
      return;
    }

    if (action.type === 'status') {
      await this.handleStatusChange(query, message, action.status, action.leadId);
      return;
    }

    const chatId = message.chat.id;
    const userId = String(query.from.id);

    try {
      if (!this.deps.rateLimiter.check(userId, 'callback').allowed) {
        await this.deps.bot.answerCallbackQuery(query.id, {
          text: this.t('rate_limited_short', await this.languageOf(userId)),
        });
        return;
      }

      const decision = await this.deps.engine.handleReply(
        userId,
        { type: 'option', stepId: action.stepId, value: action.value },
        profileOf(query.from),
      );

      if (decision.kind === 'stale') {
        await this.deps.bot.answerCallbackQuery(query.id, {
          text: this.t('stale_button', decision.prompt.language),
        });
        return;
      }
      await this.deps.bot.answerCallbackQuery(query.id);

      // Отметка в multi-choice: перерисовываем клавиатуру того же сообщения
      if (decision.kind === 'prompt' && decision.prompt.kind === 'multi') {
        const markup = promptMarkup(decision.prompt, this.deps.localization);
        if (markup && 'inline_keyboard' in markup) {
          await this.deps.bot.editMessageReplyMarkup(markup, { chat_id: chatId, message_id: message.message_id });
          return;
        }
      }

      await this.render(chatId, decision);
    } catch (err) {
      logger.error({ userId, data: query.data, error: errorMessage(err) }, 'Error handling callback');
      await this.deps.bot.sendMessage(chatId, this.t(errorKey(err), this.deps.config.defaultLanguage));
    }
  }

  private async handleStatusChange(
    query: TelegramBot.CallbackQuery,
    message: TelegramBot.Message,
    status: LeadStatus,
    leadId: string,
  ): Promise<void> {
    const lang = this.deps.config.exportLanguage;
    const chatId = message.chat.id;

    if (String(chatId) !== this.deps.config.staffChatId) {
      await this.deps.bot.answerCallbackQuery(query.id, { text: this.t('staff.not_allowed', lang) });
      return;
    }

    try {
      const result = await this.deps.statusUpdater.updateStatus(leadId, status);

      if (result.kind === 'not_found') {
        await this.deps.bot.answerCallbackQuery(query.id, { text: this.t('staff.lead_not_found', lang) });
        return;
      }

      await this.deps.bot.answerCallbackQuery(query.id);
      await this.deps.bot.editMessageReplyMarkup({ inline_keyboard: [] }, {
        chat_id: chatId,
        message_id: message.message_id,
      });

      const text = result.kind === 'updated'
        ? this.t('staff.status_updated', lang, { status: result.status })
        : this.t('staff.status_already', lang, { status: result.current });
      await this.deps.bot.sendMessage(chatId, text);

      logger.info({ leadId, status, result: result.kind, by: query.from.id }, 'Staff status callback handled');
    } catch (err) {
      logger.error({ leadId, status, error: errorMessage(err) }, 'Failed to update lead status');
      await this.deps.bot.sendMessage(chatId, this.t('staff.status_error', lang));
    }
  }

  // =====================================================
  // Отрисовка решений движка
  // =====================================================

  private async sendPrompt(chatId: number, prompt: PromptView): Promise<void> {
    const markup = promptMarkup(prompt, this.deps.localization);
    await this.deps.bot.sendMessage(chatId, prompt.text, markup ? { reply_markup: markup } : {});
  }

  private async render(chatId: number, decision: EngineDecision): Promise<void> {
    switch (decision.kind) {
      case 'prompt':
      case 'advance':
      case 'stale':
        await this.sendPrompt(chatId, decision.prompt);
        return;

      case 'reprompt':
        await this.deps.bot.sendMessage(chatId, `⚠️ ${decision.reason}`);
        await this.sendPrompt(chatId, decision.prompt);
        return;

      case 'busy':
        await this.deps.bot.sendMessage(chatId, this.t('busy', this.deps.config.defaultLanguage));
        return;

      case 'already_complete':
        await this.deps.bot.sendMessage(chatId, this.t('already_complete', decision.language));
        return;

      case 'complete': {
        const { session } = decision;
        // Ошибки таблицы/уведомления логируются внутри и пользователю не видны
        const dispatched = this.deps.dispatcher.dispatch(session);
        try {
          await this.deps.bot.sendMessage(
            chatId,
            this.t('thanks', session.language, { name: session.answers.name ?? '' }),
            { reply_markup: removeKeyboard() },
          );
        } finally {
          await dispatched;
        }
        return;
      }
    }
  }
}

export function createTelegramBot(token: string): TelegramBot {
  return new TelegramBot(token, { polling: true });
}

export function registerHandlers(bot: TelegramBot, leadBot: LeadBot): void {
  bot.on('message', msg => {
    leadBot.handleMessage(msg).catch(err => {
      logger.error({ error: errorMessage(err) }, 'Unhandled message error');
    });
  });
  bot.on('callback_query', query => {
    leadBot.handleCallbackQuery(query).catch(err => {
      logger.error({ error: errorMessage(err) }, 'Unhandled callback error');
    });
  });
  bot.on('polling_error', err => {
    logger.error({ error: err.message }, 'Polling error');
  });

  logger.info('Telegram bot initialized (polling)');
}
