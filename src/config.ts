import "dotenv/config";
import { z } from "zod";

const BoolFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((v) => v === "true" || v === "1");

/** Validate & normalize environment variables */
const EnvSchema = z.object({
  HISTORY_DB_PATH: z.string().default("./data/history.db"),
  INPUT_PATH: z.string().optional(),
  OUTPUT_PATH: z.string().default("./data/observation.json"),
  KEYWORDS_PATH: z.string().optional(),
  USE_LLM: BoolFlag,
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  LLM_MODEL: z.string().default("gpt-4o-mini"),
  LLM_LIMIT: z.coerce.number().int().nonnegative().default(50),
});

export type Config = z.infer<typeof EnvSchema>;

const env = EnvSchema.parse(process.env);

export const cfg: Config = {
  ...env,
};
