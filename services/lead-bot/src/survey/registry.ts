import type { Localization } from '../lib/localization.js';
import { ConfigurationError } from './errors.js';
import {
  COMPLETE,
  type AnswerKey,
  type Complete,
  type NextRule,
  type StepDefinition,
  type StepId,
  type SurveyCatalogue,
} from './types.js';

function targetsOf(rule: NextRule): Array<StepId | Complete> {
  return rule.kind === 'fixed'
    ? [rule.to]
    : [...rule.rules.map(r => r.to), rule.otherwise];
}

/** Frozen copy of a step: options, branch rules and `next` included. */
function freezeStep(step: StepDefinition): StepDefinition {
  const copy = structuredClone(step);
  if (copy.kind !== 'text') {
    copy.options.forEach(option => Object.freeze(option));
    Object.freeze(copy.options);
  }
  if (copy.next.kind === 'branch') {
    for (const rule of copy.next.rules) {
      Object.freeze(rule.equals);
      Object.freeze(rule);
    }
    Object.freeze(copy.next.rules);
  }
  Object.freeze(copy.next);
  return Object.freeze(copy);
}

export class StepRegistry {
  readonly catalogue: SurveyCatalogue;
  private readonly byId: ReadonlyMap<StepId, StepDefinition>;
  private readonly ordered: readonly StepDefinition[];

  constructor(catalogue: SurveyCatalogue) {
    const steps = catalogue.steps.map(freezeStep);
    Object.freeze(steps);
    this.catalogue = Object.freeze({ ...catalogue, steps });
    this.ordered = steps;
    // Duplicates are reported by validate(); the first definition wins here.
    const byId = new Map<StepId, StepDefinition>();
    for (const step of steps) {
      if (!byId.has(step.id)) byId.set(step.id, step);
    }
    this.byId = byId;
  }

  entryStepId(): StepId {
    return this.catalogue.entry;
  }

  has(stepId: string): boolean {
    return this.byId.has(stepId);
  }

  get(stepId: StepId): StepDefinition | null {
    return this.byId.get(stepId) ?? null;
  }

  steps(): readonly StepDefinition[] {
    return this.ordered;
  }

  answerKeys(): AnswerKey[] {
    return this.ordered.flatMap(step => (step.answerKey ? [step.answerKey] : []));
  }

  stepForAnswerKey(key: AnswerKey): StepDefinition | null {
    return this.ordered.find(step => step.answerKey === key) ?? null;
  }

  /**
   * Следующий шаг по статическому правилу `next`
   */
  resolveNext(step: StepDefinition, acceptedValue: string): StepId | Complete {
    const rule = step.next;
    if (rule.kind === 'fixed') return rule.to;
    const matched = rule.rules.find(r => r.equals.includes(acceptedValue));
    return matched ? matched.to : rule.otherwise;
  }

  /**
   * Checks the catalogue: unique ids and answer keys, known targets, an
   * acyclic `next` graph draining into COMPLETE, every step reachable from the
   * entry, and (when given) a translation of every prompt and option label
   * in every loaded language. Throws ConfigurationError listing all problems.
   */
  validate(localization?: Localization): void {
    const problems: string[] = [];
    const seenIds = new Set<StepId>();
    const seenAnswerKeys = new Set<AnswerKey>();

    for (const step of this.ordered) {
      if (seenIds.has(step.id)) problems.push(`duplicate step id "${step.id}"`);
      seenIds.add(step.id);

      if (step.id === COMPLETE) problems.push(`step id "${COMPLETE}" is reserved`);

      if (step.answerKey) {
        if (seenAnswerKeys.has(step.answerKey)) {
          problems.push(`duplicate answer key "${step.answerKey}" on step "${step.id}"`);
        }
        seenAnswerKeys.add(step.answerKey);
      }

      if (step.kind === 'choice' || step.kind === 'multi') {
        if (step.options.length === 0) problems.push(`step "${step.id}" has no options`);
        const values = step.options.map(o => o.value);
        if (new Set(values).size !== values.length) {
          problems.push(`step "${step.id}" has duplicate option values`);
        }
      }

      for (const target of targetsOf(step.next)) {
        if (target !== COMPLETE && !this.byId.has(target)) {
          problems.push(`step "${step.id}" routes to unknown step "${target}"`);
        }
      }

      if (step.next.kind === 'branch' && step.kind !== 'text') {
        const values = new Set(step.options.map(o => o.value));
        for (const rule of step.next.rules) {
          for (const value of rule.equals) {
            if (!values.has(value)) {
              problems.push(`step "${step.id}" branches on unknown option "${value}"`);
            }
          }
        }
      }
    }

    if (!this.byId.has(this.catalogue.entry)) {
      problems.push(`entry step "${this.catalogue.entry}" is not defined`);
    }

    const languageStep = this.catalogue.languageStep;
    if (languageStep !== undefined && this.byId.get(languageStep)?.kind !== 'choice') {
      problems.push(`language step "${languageStep}" must be a defined choice step`);
    }

    if (!this.ordered.some(step => targetsOf(step.next).includes(COMPLETE))) {
      problems.push(`no step routes to ${COMPLETE}`);
    }

    problems.push(...this.findCycles());
    problems.push(...this.findUnreachable());

    if (localization) {
      problems.push(...this.findMissingTranslations(localization));
    }

    if (problems.length > 0) {
      throw new ConfigurationError(problems);
    }
  }

  private findCycles(): string[] {
    const problems: string[] = [];
    const state = new Map<StepId, 'visiting' | 'done'>();

    const visit = (stepId: StepId, path: StepId[]): void => {
      const mark = state.get(stepId);
      if (mark === 'done') return;
      if (mark === 'visiting') {
        const cycle = [...path.slice(path.indexOf(stepId)), stepId];
        problems.push(`cycle detected: ${cycle.join(' -> ')}`);
        return;
      }
      const step = this.byId.get(stepId);
      if (!step) return;

      state.set(stepId, 'visiting');
      for (const target of targetsOf(step.next)) {
        if (target !== COMPLETE) visit(target, [...path, stepId]);
      }
      state.set(stepId, 'done');
    };

    for (const step of this.ordered) visit(step.id, []);
    return problems;
  }

  private findUnreachable(): string[] {
    const reachable = new Set<StepId>();
    const queue: StepId[] = [this.catalogue.entry];

    while (queue.length > 0) {
      const stepId = queue.shift();
      if (stepId === undefined || reachable.has(stepId)) continue;
      const step = this.byId.get(stepId);
      if (!step) continue;
      reachable.add(stepId);
      for (const target of targetsOf(step.next)) {
        if (target !== COMPLETE) queue.push(target);
      }
    }

    return this.ordered
      .filter(step => !reachable.has(step.id))
      .map(step => `step "${step.id}" is unreachable from the entry step`);
  }

  private findMissingTranslations(localization: Localization): string[] {
    const problems: string[] = [];

    for (const lang of localization.languages()) {
      for (const step of this.ordered) {
        const keys = [step.promptKey];
        if (step.kind === 'choice' || step.kind === 'multi') {
          keys.push(...step.options.map(o => o.labelKey));
        }
        if (step.kind === 'multi') keys.push(step.doneKey);

        for (const key of keys) {
          if (!localization.has(key, lang)) {
            problems.push(`missing "${key}" in locale "${lang}" (step "${step.id}")`);
          }
        }
      }
    }

    return problems;
  }
}

export function createStepRegistry(catalogue: SurveyCatalogue): StepRegistry {
  return new StepRegistry(catalogue);
}
