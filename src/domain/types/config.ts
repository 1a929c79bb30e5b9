import { z } from 'zod/v4';

/** Process-wide tester settings. Built once, frozen, shared by every test. */
export interface TesterConfig {
  /** Compiler binary under test. */
  readonly binaryPath: string;
  /** Project root; fixture names and artifact paths are relative to it. */
  readonly root: string;
  /** Base directory for per-fixture artifacts (`<root>/target/tester`). */
  readonly buildBase: string;
  /** Overwrite expected outputs instead of comparing against them. */
  readonly bless: boolean;
  readonly verbose: boolean;
}

/** Any value other than the literal "0" turns a flag variable on. */
const EnvFlag = z
  .string()
  .optional()
  .transform((value) => value !== undefined && value !== '0');

const NonEmpty = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value));

export const TesterEnvSchema = z.object({
  TESTER_MODE: z.string().optional(),
  TESTER_BLESS: EnvFlag,
  TESTER_COMPILER: NonEmpty,
  TESTER_ROOT: NonEmpty,
  TESTER_THREADS: NonEmpty.pipe(z.coerce.number<string>().int().positive().optional()),
});

export type TesterEnv = z.infer<typeof TesterEnvSchema>;
