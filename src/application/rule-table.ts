import { EVENT_TYPES, RuleNotFoundError } from '../domain/index.js';
import type { Reward, SalesEventType } from '../domain/index.js';
import type { BaseLogger } from 'pino';
import { findAllRules, seedRules } from '../infrastructure/db/index.js';
import type { Executor, RuleRow, RuleSeed } from '../infrastructure/db/index.js';

export interface RewardRule {
  readonly event_type: string;
  readonly gold_value: number;
  readonly xp_value: number;
  readonly display_name: string;
  readonly description: string;
}

/**
 * Immutable snapshot of the reward rules, keyed by event type.
 *
 * Built once at start-up from the `rules` table and shared by every
 * request; lookups are synchronous and never touch the database.
 */
export class RuleTable {
  private readonly byType: ReadonlyMap<string, RewardRule>;

  constructor(rules: readonly RewardRule[]) {
    this.byType = new Map(rules.map((r) => [r.event_type, r]));
  }

  static fromRows(rows: readonly RuleRow[]): RuleTable {
    return new RuleTable(rows.map((r) => ({
      event_type: r.event_type,
      gold_value: r.gold_value,
      xp_value: r.xp_value,
      display_name: r.display_name,
      description: r.description,
    })));
  }

  get size(): number {
    return this.byType.size;
  }

  /** @throws RuleNotFoundError when no rule is configured for the type. */
  resolve(eventType: string): Reward {
    const rule = this.byType.get(eventType);
    if (rule === undefined) {
      throw new RuleNotFoundError(eventType);
    }
    return { gold: rule.gold_value, xp: rule.xp_value };
  }

  /** Enumerated event types that have no rule; should be empty. */
  missingEventTypes(): SalesEventType[] {
    return EVENT_TYPES.filter((t) => !this.byType.has(t));
  }
}

/**
 * Seeds missing rules, then snapshots the `rules` table.
 *
 * Existing rows are never overwritten, so edits made in the table
 * survive restarts. Event types left without a rule are reported but
 * do not stop start-up; requests for them answer with RULE_NOT_FOUND.
 */
export async function loadRuleTable(
  db: Executor,
  seeds: readonly RuleSeed[],
  log: Pick<BaseLogger, 'info' | 'warn'>,
): Promise<RuleTable> {
  const inserted = await seedRules(db, seeds);
  if (inserted.length > 0) {
    log.info({ event_types: inserted }, 'Seeded reward rules');
  }

  const table = RuleTable.fromRows(await findAllRules(db));

  const missing = table.missingEventTypes();
  if (missing.length > 0) {
    log.warn({ event_types: missing }, 'Event types without a reward rule');
  }

  log.info({ count: table.size }, 'Reward rules loaded');
  return table;
}
