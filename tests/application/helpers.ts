import { RuleTable } from '../../src/application/index.js';
import type { RewardRule } from '../../src/application/index.js';

export const DEFAULT_RULES: RewardRule[] = [
  { event_type: 'call_dial', gold_value: 15, xp_value: 5, display_name: 'Dial Attempt', description: '' },
  { event_type: 'call_connect', gold_value: 100, xp_value: 40, display_name: 'Call Connected', description: '' },
  { event_type: 'email_sent', gold_value: 10, xp_value: 3, display_name: 'Email Sent', description: '' },
  { event_type: 'meeting_booked', gold_value: 1000, xp_value: 500, display_name: 'Meeting Booked', description: '' },
  { event_type: 'meeting_attended', gold_value: 500, xp_value: 200, display_name: 'Meeting Attended', description: '' },
];

/** Rule table with every event type configured; drop entries via `without`. */
export function makeRuleTable(without: string[] = []): RuleTable {
  return new RuleTable(DEFAULT_RULES.filter((r) => !without.includes(r.event_type)));
}
