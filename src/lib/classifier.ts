import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors";
import type { TransactionRecord } from "./parsers";

export const OTHER_CATEGORY = "Other";

export const DEFAULT_RULES_URL = new URL(
  "../../config/vendor-rules.json",
  import.meta.url
);

const ruleSchema = z.object({
  category: z
    .string()
    .min(1)
    .refine((value) => value !== OTHER_CATEGORY, {
      message: `"${OTHER_CATEGORY}" is reserved for unmatched records`,
    }),
  label: z.string().min(1).optional(),
  pattern: z.string().min(1),
  match: z.enum(["substring", "regex"]).default("substring"),
});

const ruleFileSchema = z.object({
  rules: z.array(ruleSchema).min(1),
});

export type VendorRule = z.infer<typeof ruleSchema>;
export type VendorRuleInput = z.input<typeof ruleSchema>;

export type CompiledRule = {
  category: string;
  label: string;
  test: (upperDescription: string) => boolean;
};

export type ClassifiedRecord = TransactionRecord & { category: string };

export type Classification = {
  classified: ClassifiedRecord[];
  included: ClassifiedRecord[];
  excludedBySign: ClassifiedRecord[];
  unmatched: ClassifiedRecord[];
};

export function compileRules(rules: readonly VendorRuleInput[]): CompiledRule[] {
  return rules.map((input, index) => {
    const parsed = ruleSchema.safeParse(input);
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid rule #${index + 1}: ${parsed.error.issues
          .map((issue) => issue.message)
          .join("; ")}`
      );
    }
    const rule = parsed.data;
    const label = rule.label ?? rule.category;
    if (rule.match === "substring") {
      const needle = rule.pattern.toUpperCase();
      return {
        category: rule.category,
        label,
        test: (upper) => upper.includes(needle),
      };
    }
    let regex: RegExp;
    try {
      regex = new RegExp(rule.pattern, "i");
    } catch (error) {
      throw new ConfigError(
        `Invalid pattern for ${rule.category}: ${errorMessage(error)}`
      );
    }
    return {
      category: rule.category,
      label,
      test: (upper) => regex.test(upper),
    };
  });
}

export async function loadRules(filePath?: string): Promise<CompiledRule[]> {
  const source = filePath ?? DEFAULT_RULES_URL;
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(source, "utf-8"));
  } catch (error) {
    throw new ConfigError(
      `Cannot read rules from ${String(source)}: ${errorMessage(error)}`
    );
  }
  const parsed = ruleFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid rules file ${String(source)}: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`
    );
  }
  return compileRules(parsed.data.rules);
}

// First match wins: rule order is significant.
export function classify(
  description: string,
  rules: readonly CompiledRule[]
): string {
  const upper = description.toUpperCase();
  return rules.find((rule) => rule.test(upper))?.category ?? OTHER_CATEGORY;
}

export function categoryLabel(
  category: string,
  rules: readonly CompiledRule[]
): string {
  return rules.find((rule) => rule.category === category)?.label ?? category;
}

export function classifyLedger(
  records: readonly TransactionRecord[],
  rules: readonly CompiledRule[]
): Classification {
  const result: Classification = {
    classified: [],
    included: [],
    excludedBySign: [],
    unmatched: [],
  };
  for (const record of records) {
    const tagged: ClassifiedRecord = Object.freeze({
      ...record,
      category: classify(record.description, rules),
    });
    result.classified.push(tagged);
    if (tagged.category === OTHER_CATEGORY) {
      result.unmatched.push(tagged);
    } else if (tagged.amountCents > 0) {
      result.included.push(tagged);
    } else {
      result.excludedBySign.push(tagged);
    }
  }
  return result;
}
