/**
 * Step catalogue or locale files are inconsistent. Raised at start-up only.
 */
export class ConfigurationError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid survey configuration:\n- ${problems.join('\n- ')}`);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

/**
 * A session points at a step the registry does not know. Session/registry
 * drift; the session is left as is so the progress is not lost.
 */
export class UnknownStepError extends Error {
  readonly stepId: string;
  readonly userId: string;

  constructor(stepId: string, userId: string) {
    super(`Unknown survey step "${stepId}" for user ${userId}`);
    this.name = 'UnknownStepError';
    this.stepId = stepId;
    this.userId = userId;
  }
}

/**
 * A stored session cannot be read back (bad JSON, or a shape from another
 * release). Never replaced by a fresh session behind the user's back.
 */
export class CorruptSessionError extends Error {
  readonly userId: string;
  readonly reason: string;

  constructor(userId: string, reason: string) {
    super(`Stored session of user ${userId} is unreadable: ${reason}`);
    this.name = 'CorruptSessionError';
    this.userId = userId;
    this.reason = reason;
  }
}

export class UnknownAnswerKeyError extends Error {
  readonly keys: string[];

  constructor(keys: string[]) {
    super(`Unknown answer keys: ${keys.join(', ')}`);
    this.name = 'UnknownAnswerKeyError';
    this.keys = keys;
  }
}

export class SessionBusyError extends Error {
  readonly userId: string;

  constructor(userId: string) {
    super(`Session of user ${userId} is busy`);
    this.name = 'SessionBusyError';
    this.userId = userId;
  }
}
