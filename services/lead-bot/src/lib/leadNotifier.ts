import type TelegramBot from 'node-telegram-bot-api';
import type { Localization } from './localization.js';
import { createLogger } from './logger.js';
import { statusKeyboard } from './telegram.js';
import { formatLeadSummary, type ExportRecord } from '../survey/exportRecord.js';

const log = createLogger({ module: 'leadNotifier' });

export interface LeadNotifier {
  notify(record: ExportRecord): Promise<void>;
}

export type StaffBot = Pick<TelegramBot, 'sendMessage'>;

/**
 * Заявка в чат менеджеров с кнопками статуса
 */
export class TelegramLeadNotifier implements LeadNotifier {
  constructor(
    private readonly bot: StaffBot,
    private readonly chatId: string,
    private readonly localization: Localization,
    private readonly lang: string,
  ) {}

  async notify(record: ExportRecord): Promise<void> {
    await this.bot.sendMessage(this.chatId, formatLeadSummary(record, this.localization, this.lang), {
      parse_mode: 'HTML',
      reply_markup: statusKeyboard(record.leadId, this.localization, this.lang),
    });
    log.info({ leadId: record.leadId, chatId: this.chatId }, 'Lead sent to staff chat');
  }
}
