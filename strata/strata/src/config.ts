import { isUndefined, omitBy } from "lodash-es";
import * as z from "zod";
import { DeclarationError } from "./errors";

export const StrataConfigSchema = z
  .object({
    /** declared fields are type-checked on every write, unknown keys follow `allowExtra` */
    strict: z.boolean(),
    /** keys outside the field declarations may be stored */
    allowExtra: z.boolean(),
    /** a declared field that does not match its type is coerced before it is rejected */
    coerce: z.boolean(),
    /** stored values must survive a JSON round trip */
    enforceJson: z.boolean(),
    /** plain nested records are turned into containers when read */
    autoConvert: z.boolean(),
  })
  .strict();

export type StrataConfig = z.infer<typeof StrataConfigSchema>;

export const defaultConfig: Readonly<StrataConfig> = Object.freeze({
  strict: false,
  allowExtra: true,
  coerce: false,
  enforceJson: false,
  autoConvert: true,
});

export function parseConfig(options: unknown, modelName: string): Partial<StrataConfig> {
  const parsed = StrataConfigSchema.partial().safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`);
    throw new DeclarationError(`invalid configuration for ${modelName}: ${issues.join("; ")}`);
  }
  // options passed as undefined fall back to the inherited value
  return omitBy(parsed.data, isUndefined);
}
