import { createLogger } from './logger.js';
import type { LeadNotifier } from './leadNotifier.js';
import { normalizeSession, type ExportOptions, type ExportRecord } from '../survey/exportRecord.js';
import type { SurveySession } from '../survey/types.js';

const log = createLogger({ module: 'leadDispatcher' });

export interface LeadSink {
  append(record: ExportRecord): Promise<void>;
}

export interface DispatchResult {
  record: ExportRecord;
  persisted: boolean;
  notified: boolean;
  duplicate: boolean;
}

const MAX_REMEMBERED_LEADS = 1000;

/**
 * Завершённая сессия → таблица + чат менеджеров. Запись и уведомление
 * независимы: ошибка одного не отменяет другое. Повторная отправка той же
 * заявки (тот же leadId) в таблицу не пишется.
 */
export class LeadDispatcher {
  private readonly persisted = new Set<string>();

  constructor(
    private readonly sink: LeadSink,
    private readonly notifier: LeadNotifier,
    private readonly exportOptions: ExportOptions,
  ) {}

  async dispatch(session: SurveySession): Promise<DispatchResult> {
    const record = normalizeSession(session, this.exportOptions);

    if (this.persisted.has(record.leadId)) {
      log.info({ leadId: record.leadId }, 'Lead already dispatched, skipping');
      return { record, persisted: true, notified: false, duplicate: true };
    }

    const [saved, sent] = await Promise.allSettled([
      this.sink.append(record),
      this.notifier.notify(record),
    ]);

    if (saved.status === 'fulfilled') {
      this.remember(record.leadId);
    } else {
      log.error({ leadId: record.leadId, error: errorMessage(saved.reason) }, 'Failed to persist lead');
    }
    if (sent.status === 'rejected') {
      log.error({ leadId: record.leadId, error: errorMessage(sent.reason) }, 'Failed to notify staff');
    }

    log.info({
      leadId: record.leadId,
      persisted: saved.status === 'fulfilled',
      notified: sent.status === 'fulfilled',
    }, 'Lead dispatched');

    return {
      record,
      persisted: saved.status === 'fulfilled',
      notified: sent.status === 'fulfilled',
      duplicate: false,
    };
  }

  private remember(leadId: string): void {
    this.persisted.add(leadId);
    if (this.persisted.size > MAX_REMEMBERED_LEADS) {
      const oldest = this.persisted.values().next();
      if (!oldest.done) this.persisted.delete(oldest.value);
    }
  }
}

function errorMessage(reason: unknown): string {
  return reason instanceof Error ? reason.message : String(reason);
}
