import { z } from "zod";

const blankToUndefined = (value: unknown) =>
    typeof value === "string" && value.trim().length === 0 ? undefined : value;

const envSchema = z.object({
    SCHEDULER_PERSISTENCE_PATH: z.preprocess(blankToUndefined, z.string().trim().optional()),
    SCHEDULER_DB_URL: z.preprocess(blankToUndefined, z.string().trim().optional()),
    SCHEDULER_TIMEZONE: z.preprocess(blankToUndefined, z.string().trim().optional()),
    SCHEDULER_MAX_INSTANCES: z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional()),
    SCHEDULER_RETENTION_DAYS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional()),
    SCHEDULER_MISFIRE_GRACE_SECONDS: z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().optional())
});

export type ConfigEnv = z.infer<typeof envSchema>;

/**
 * Reads the SCHEDULER_* deployment variables.
 * Expects: numeric values are integers; blank values count as unset.
 */
export function configEnvParse(env: Record<string, string | undefined>): ConfigEnv {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const key = issue?.path.join(".") ?? "environment";
        throw new Error(`Invalid ${key}: ${issue?.message ?? "unparseable value"}`);
    }
    return parsed.data;
}
