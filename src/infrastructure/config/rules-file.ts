import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError, EVENT_TYPES } from '../../domain/index.js';
import type { RuleSeed } from '../db/index.js';

const ruleSeedSchema = z.object({
  event_type: z.enum(EVENT_TYPES),
  gold_value: z.number().int().min(0),
  xp_value: z.number().int().min(0),
  display_name: z.string().min(1).max(100),
  description: z.string().default(''),
});

const ruleFileSchema = z
  .array(ruleSeedSchema)
  .refine(
    (seeds) => new Set(seeds.map((s) => s.event_type)).size === seeds.length,
    { message: 'Each event_type may appear only once' },
  );

/**
 * Loads the reward rule seed file (JSON array).
 *
 * Relative paths resolve against the working directory.
 *
 * @throws ConfigError when the file is missing, not JSON, or invalid.
 */
export function loadRuleSeeds(filePath: string): RuleSeed[] {
  const absolute = resolve(process.cwd(), filePath);

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(absolute, 'utf-8'));
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read rules file ${absolute}: ${reason}`);
  }

  const parsed = ruleFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => ({ path: i.path, message: i.message }));
    throw new ConfigError(`Invalid rules file ${absolute}`, issues);
  }

  return parsed.data;
}
