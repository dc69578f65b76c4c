/**
 * Google Sheets: один лист на месяц, строка = заявка
 */

import { google, type sheets_v4 } from 'googleapis';
import type { Localization } from './localization.js';
import { createLogger } from './logger.js';
import { withRetry } from './retry.js';
import {
  EXPORT_FIELDS,
  LEAD_STATUSES,
  headerRow,
  monthName,
  parseLeadId,
  toRow,
  type ExportRecord,
  type LeadStatus,
} from '../survey/exportRecord.js';

const log = createLogger({ module: 'sheets' });

/** The spreadsheet operations the bot needs. Rows are 1-based, columns 0-based. */
export interface SpreadsheetClient {
  sheetTitles(): Promise<string[]>;
  addSheet(title: string): Promise<void>;
  appendRow(title: string, row: string[]): Promise<void>;
  readRows(title: string): Promise<string[][]>;
  updateCell(title: string, row: number, column: number, value: string): Promise<void>;
}

export function columnLetter(column: number): string {
  let n = column + 1;
  let letters = '';
  while (n > 0) {
    const rem = (n - 1) % 26;
    letters = String.fromCharCode(65 + rem) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

const quote = (title: string) => `'${title.replace(/'/g, "''")}'`;

export class GoogleSpreadsheetClient implements SpreadsheetClient {
  constructor(
    private readonly sheets: sheets_v4.Sheets,
    private readonly spreadsheetId: string,
  ) {}

  static fromServiceAccount(keyFile: string, spreadsheetId: string): GoogleSpreadsheetClient {
    const auth = new google.auth.GoogleAuth({
      keyFile,
      scopes: ['https://www.googleapis.com/auth/spreadsheets'],
    });
    return new GoogleSpreadsheetClient(google.sheets({ version: 'v4', auth }), spreadsheetId);
  }

  async sheetTitles(): Promise<string[]> {
    const res = await this.sheets.spreadsheets.get({
      spreadsheetId: this.spreadsheetId,
      fields: 'sheets.properties.title',
    });
    return (res.data.sheets ?? []).flatMap(sheet => {
      const title = sheet.properties?.title;
      return title ? [title] : [];
    });
  }

  async addSheet(title: string): Promise<void> {
    await this.sheets.spreadsheets.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: { requests: [{ addSheet: { properties: { title } } }] },
    });
  }

  async appendRow(title: string, row: string[]): Promise<void> {
    await this.sheets.spreadsheets.values.append({
      spreadsheetId: this.spreadsheetId,
      range: `${quote(title)}!A1`,
      // RAW: телефоны вида +7999… не превращаются в числа/формулы
      valueInputOption: 'RAW',
      insertDataOption: 'INSERT_ROWS',
      requestBody: { values: [row] },
    });
  }

  async readRows(title: string): Promise<string[][]> {
    const res = await this.sheets.spreadsheets.values.get({
      spreadsheetId: this.spreadsheetId,
      range: `${quote(title)}!A:${columnLetter(EXPORT_FIELDS.length - 1)}`,
    });
    const values: unknown[][] = res.data.values ?? [];
    return values.map(row => row.map(cell => String(cell ?? '')));
  }

  async updateCell(title: string, row: number, column: number, value: string): Promise<void> {
    await this.sheets.spreadsheets.values.update({
      spreadsheetId: this.spreadsheetId,
      range: `${quote(title)}!${columnLetter(column)}${row}`,
      valueInputOption: 'RAW',
      requestBody: { values: [[value]] },
    });
  }
}

// =====================================================
// Заявки
// =====================================================

export type StatusUpdate =
  | { kind: 'updated'; status: string }
  | { kind: 'unchanged'; current: string }
  | { kind: 'not_found' };

export interface LeadsSheetOptions {
  localization: Localization;
  exportLanguage: string;
  timezone: string;
  attempts?: number;
  retryDelayMs?: number;
}

const STATUS_COLUMN = EXPORT_FIELDS.indexOf('status');
const LEAD_ID_COLUMN = EXPORT_FIELDS.indexOf('leadId');

export class LeadsSheet {
  private readonly knownSheets = new Set<string>();

  constructor(
    private readonly client: SpreadsheetClient,
    private readonly options: LeadsSheetOptions,
  ) {}

  private statusLabel(status: LeadStatus): string {
    return this.options.localization.t(`lead_status.${status}`, this.options.exportLanguage);
  }

  /**
   * Лист месяца; создаётся с заголовком при первой заявке
   */
  async ensureSheet(title: string): Promise<void> {
    if (this.knownSheets.has(title)) return;

    const titles = await this.client.sheetTitles();
    const created = !titles.includes(title);
    if (created) {
      await this.client.addSheet(title);
      log.info({ title }, 'Month sheet created');
    }
    // лист мог остаться пустым, если запись заголовка упала на прошлой попытке
    if (created || (await this.client.readRows(title)).length === 0) {
      await this.client.appendRow(title, headerRow(this.options.localization, this.options.exportLanguage));
    }
    this.knownSheets.add(title);
  }

  async append(record: ExportRecord): Promise<void> {
    await withRetry(async () => {
      await this.ensureSheet(record.month);
      await this.client.appendRow(record.month, toRow(record));
    }, {
      attempts: this.options.attempts ?? 3,
      delayMs: this.options.retryDelayMs ?? 1000,
      label: 'sheets.append',
    });

    log.info({ leadId: record.leadId, sheet: record.month }, 'Lead saved to sheet');
  }

  /**
   * Статус двигается только вперёд: Новая → В работе → Обработано
   */
  async updateStatus(leadId: string, status: LeadStatus): Promise<StatusUpdate> {
    const parsed = parseLeadId(leadId);
    if (!parsed) return { kind: 'not_found' };

    const { localization, exportLanguage, timezone } = this.options;
    const sheet = monthName(parsed.completedAt, timezone, localization, exportLanguage);
    const rows = await this.client.readRows(sheet);

    const index = rows.findIndex(row => row[LEAD_ID_COLUMN] === leadId);
    if (index === -1) {
      log.warn({ leadId, sheet }, 'Lead not found in sheet');
      return { kind: 'not_found' };
    }

    const current = rows[index][STATUS_COLUMN] ?? '';
    const currentRank = LEAD_STATUSES.findIndex(s => this.statusLabel(s) === current);
    if (currentRank >= LEAD_STATUSES.indexOf(status)) {
      return { kind: 'unchanged', current };
    }

    const label = this.statusLabel(status);
    await this.client.updateCell(sheet, index + 1, STATUS_COLUMN, label);
    log.info({ leadId, sheet, status }, 'Lead status updated');
    return { kind: 'updated', status: label };
  }
}
