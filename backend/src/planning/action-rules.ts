import * as fs from "node:fs";
import yaml from "js-yaml";
import { z } from "zod";
import { ok, err, Result } from "neverthrow";
import { ActionCategorySchema, RiskLevelSchema } from "@intentflow/shared";

// ─── Schema ─────────────────────────────────────────────

const CompensationRuleSchema = z.object({
  name: z.string().min(1),
  label: z.string().min(1),
});

const PrerequisiteSchema = z.object({
  keyword: z.string().min(1),
  rule: z.string().min(1),
});

export const ActionRuleSchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9_]*$/),
  verbs: z.array(z.string().min(1)).min(1),
  label: z.string().min(1),
  category: ActionCategorySchema,
  risk_level: RiskLevelSchema,
  side_effects: z.boolean(),
  parallel_safe: z.boolean().default(false),
  duration_ms: z.number().int().min(0).default(1000),
  compensation: CompensationRuleSchema.nullable().default(null),
  prerequisites: z.array(PrerequisiteSchema).default([]),
});

export const ActionRuleSetSchema = z
  .object({
    stopwords: z.array(z.string()).default([]),
    rules: z.array(ActionRuleSchema).min(1),
  })
  .superRefine((set, ctx) => {
    const names = new Set(set.rules.map((r) => r.name));
    for (const rule of set.rules) {
      for (const pre of rule.prerequisites) {
        if (!names.has(pre.rule)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `rule ${rule.name} names unknown prerequisite ${pre.rule}`,
          });
        }
      }
    }
  });

export type ActionRule = z.infer<typeof ActionRuleSchema>;
export type ActionRuleSet = z.infer<typeof ActionRuleSetSchema>;

// ─── Loading ────────────────────────────────────────────

export class RuleLoadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RuleLoadError";
  }
}

export function parseActionRules(raw: unknown): Result<ActionRuleSet, RuleLoadError> {
  const parsed = ActionRuleSetSchema.safeParse(raw);
  if (!parsed.success) {
    return err(
      new RuleLoadError(
        `Invalid action rules: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
      ),
    );
  }
  return ok(parsed.data);
}

export function loadActionRules(filePath: string): Result<ActionRuleSet, RuleLoadError> {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (e) {
    return err(new RuleLoadError(`Cannot read ${filePath}: ${String(e)}`));
  }
  try {
    return parseActionRules(yaml.load(content));
  } catch (e) {
    return err(new RuleLoadError(`Cannot parse ${filePath}: ${String(e)}`));
  }
}

// ─── Lookup ─────────────────────────────────────────────

export class RuleIndex {
  private readonly byVerb = new Map<string, ActionRule>();
  private readonly byName = new Map<string, ActionRule>();
  readonly stopwords: ReadonlySet<string>;

  constructor(set: ActionRuleSet) {
    this.stopwords = new Set(set.stopwords.map((w) => w.toLowerCase()));
    for (const rule of set.rules) {
      this.byName.set(rule.name, rule);
      for (const verb of rule.verbs) {
        // First rule to claim a verb keeps it.
        if (!this.byVerb.has(verb.toLowerCase())) {
          this.byVerb.set(verb.toLowerCase(), rule);
        }
      }
    }
  }

  forVerb(word: string): ActionRule | undefined {
    return this.byVerb.get(word.toLowerCase());
  }

  named(name: string): ActionRule | undefined {
    return this.byName.get(name);
  }

  all(): ActionRule[] {
    return [...this.byName.values()];
  }
}
