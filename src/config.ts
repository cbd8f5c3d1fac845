import 'dotenv/config';
import { EnvSchema } from './domain/schemas.js';

export interface AppConfig {
  color: boolean;
  debug: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);
  return {
    color: !parsed.NO_COLOR,
    debug: parsed.PACECALC_DEBUG
  };
}

export const CONFIG: AppConfig = loadConfig();
