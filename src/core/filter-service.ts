import { logger } from '../middleware/logger.js';
import { evaluateFilters, type FilterDecision, type FilterSubject } from './filter-engine.js';
import { parseFilterConditions } from '../utils/filter-conditions.js';
import type { FilterRepository } from '../utils/db-backend.js';
import type { FilterRule } from '../utils/db-types.js';
import type { Result } from '../utils/formatting.js';

const RULE_NAME_PATTERN = /^[A-Za-z0-9][\w.-]{0,63}$/;

export interface SaveFilterRequest {
  name: string;
  /** Raw conditions as an operator typed them; validated before storing. */
  conditions: unknown;
  exclusive?: boolean;
  enabled?: boolean;
  description?: string | null;
  createdBy?: string | null;
}

export interface FilterService {
  /** Storage failures allow card creation with no matches. */
  evaluate(message: FilterSubject): Promise<FilterDecision>;
  /** Auto-watch needs the global flag and at least one matched rule. */
  shouldAutoWatch(matched: readonly string[]): Promise<boolean>;
  /** Create the rule, or replace the one with the same name. */
  save(request: SaveFilterRequest): Promise<Result<FilterRule>>;
  list(): Promise<FilterRule[]>;
  get(name: string): Promise<FilterRule | undefined>;
  delete(name: string): Promise<boolean>;
  setEnabled(name: string, enabled: boolean): Promise<boolean>;
  isAutoWatchEnabled(): Promise<boolean>;
  setAutoWatch(enabled: boolean): Promise<void>;
}

/**
 * Filter administration plus the evaluation boundary used by the card
 * lifecycle.
 */
export function createFilterService(repository: FilterRepository): FilterService {
  return {
    async evaluate(message: FilterSubject): Promise<FilterDecision> {
      let rules: FilterRule[];
      try {
        rules = await repository.listEnabled();
      } catch (err) {
        logger.warn({ err }, 'Filter rules unavailable; allowing card creation');
        return { allow: true, matched: [] };
      }
      return evaluateFilters(message, rules);
    },

    async shouldAutoWatch(matched: readonly string[]): Promise<boolean> {
      if (matched.length === 0) return false;
      try {
        return await repository.getAutoWatchEnabled();
      } catch (err) {
        logger.warn({ err }, 'Auto-watch flag unavailable; not watching');
        return false;
      }
    },

    async save(request: SaveFilterRequest): Promise<Result<FilterRule>> {
      const name = request.name.trim();
      if (!RULE_NAME_PATTERN.test(name)) {
        return { ok: false, error: 'name must be 1-64 letters, digits, dots, dashes or underscores' };
      }

      const conditions = parseFilterConditions(request.conditions);
      if (!conditions.ok) return { ok: false, error: conditions.error };

      const rule = await repository.save({
        name,
        conditions: conditions.value,
        exclusive: request.exclusive ?? false,
        enabled: request.enabled ?? true,
        description: request.description ?? null,
        createdBy: request.createdBy ?? null,
      });
      logger.info({ rule: rule.name, exclusive: rule.exclusive }, 'Filter rule saved');
      return { ok: true, value: rule };
    },

    list: () => repository.listAll(),
    get: (name) => repository.findByName(name),

    async delete(name: string): Promise<boolean> {
      const deleted = await repository.delete(name);
      if (deleted) logger.info({ rule: name }, 'Filter rule deleted');
      return deleted;
    },

    async setEnabled(name: string, enabled: boolean): Promise<boolean> {
      const updated = await repository.setEnabled(name, enabled);
      if (updated) logger.info({ rule: name, enabled }, 'Filter rule toggled');
      return updated;
    },

    isAutoWatchEnabled: () => repository.getAutoWatchEnabled(),

    async setAutoWatch(enabled: boolean): Promise<void> {
      await repository.setAutoWatchEnabled(enabled);
      logger.info({ enabled }, 'Auto-watch toggled');
    },
  };
}
