export * from './types.js';
export * from './errors.js';
export { StepRegistry, createStepRegistry } from './registry.js';
export { SURVEY_CATALOGUE, SURVEY_PROGRESS_TOTAL } from './steps.js';
export { VALIDATORS, sanitizeText, validateName, validatePhone, validateText } from './validators.js';
export { UserLock } from './userLock.js';
export {
  SessionStore,
  MemorySessionStore,
  RedisSessionStore,
  createFreshSession,
  type RedisClient,
  type SessionDefaults,
} from './sessionStore.js';
export { DONE_VALUE, formatProgressBar, renderPrompt } from './prompt.js';
export { DialogEngine, normalizeChoice, type DialogEngineOptions, type SurveyStatus } from './engine.js';
export {
  EXPORT_FIELDS,
  LEAD_STATUSES,
  buildLeadId,
  parseLeadId,
  createExternalSession,
  formatLeadSummary,
  formatTimestamp,
  headerRow,
  monthName,
  normalizeSession,
  toRow,
  type ExportField,
  type ExportOptions,
  type ExportRecord,
  type ExternalLead,
  type LeadStatus,
} from './exportRecord.js';
