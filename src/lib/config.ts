import { z } from 'zod';

const tableSizeEnvSchema = z.coerce.number().int().min(2).max(9).catch(9);
const flagEnvSchema = z
  .string()
  .optional()
  .transform((value) => value === '1' || value?.toLowerCase() === 'true');

export interface HandScriptConfig {
  defaultTableSize: number;
  debug: boolean;
}

export function readConfig(env: NodeJS.ProcessEnv = process.env): HandScriptConfig {
  return {
    defaultTableSize: tableSizeEnvSchema.parse(env.HAND_SCRIPT_TABLE_SIZE ?? 9),
    debug: flagEnvSchema.parse(env.HAND_SCRIPT_DEBUG),
  };
}

export const config: HandScriptConfig = readConfig();
