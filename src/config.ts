import dotenv from 'dotenv';
import path from 'path';
import {z} from 'zod';

dotenv.config();

export interface AppConfig {
  botToken: string;
  dataDir: string;
  questionsFile: string;
  usersFile: string;
  port: number;
  host: string;
  /** null disables session expiry */
  sessionTimeoutSeconds: number | null;
  sessionSweepCron: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const text = z.preprocess(blankToUndefined, z.string().trim().optional());

const EnvSchema = z.object({
  TELEGRAM_BOT_TOKEN: text,
  BOT_TOKEN: text,
  DATA_DIR: text,
  QUESTIONS_FILE: text,
  USERS_FILE: text,
  HOST: text,
  SESSION_SWEEP_CRON: text,
  PORT: z.preprocess(
    blankToUndefined,
    z.coerce.number({invalid_type_error: 'must be a number'})
      .int('must be an integer')
      .min(0, 'must be between 0 and 65535')
      .max(65535, 'must be between 0 and 65535')
      .default(5000)
  ),
  // 0 disables expiry
  SESSION_TIMEOUT_SECONDS: z.preprocess(
    blankToUndefined,
    z.coerce.number({invalid_type_error: 'must be a number'})
      .int('must be an integer')
      .min(0, 'must not be negative')
      .optional()
  ),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')} ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const vars = parsed.data;
  const botToken = vars.TELEGRAM_BOT_TOKEN ?? vars.BOT_TOKEN;

  if (!botToken) {
    throw new ConfigError('TELEGRAM_BOT_TOKEN is not set in the environment');
  }

  const dataDir = vars.DATA_DIR ?? 'data';

  return {
    botToken,
    dataDir,
    questionsFile: vars.QUESTIONS_FILE ?? path.join(dataDir, 'questions.json'),
    usersFile: vars.USERS_FILE ?? path.join(dataDir, 'users.json'),
    port: vars.PORT,
    host: vars.HOST ?? '0.0.0.0',
    sessionTimeoutSeconds: vars.SESSION_TIMEOUT_SECONDS || null,
    sessionSweepCron: vars.SESSION_SWEEP_CRON ?? '* * * * *',
  };
}
