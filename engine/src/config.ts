import * as fs from 'fs';
import * as path from 'path';
import { Config, ConfigSchema } from '@forgeloop/shared';

export const CONFIG_FILE = '.forgeloop.json';

export function loadConfig(workspaceRoot: string): Config {
  const configPath = path.join(workspaceRoot, CONFIG_FILE);

  // No config file means an offline run on defaults
  if (!fs.existsSync(configPath)) {
    return ConfigSchema.parse({});
  }

  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new Error(
      `Config file ${configPath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const parseResult = ConfigSchema.safeParse(rawConfig);

  if (!parseResult.success) {
    throw new Error(
      `Invalid config file: ${parseResult.error.message}`
    );
  }

  return parseResult.data;
}

export function getApiKey(provider: 'openai' | 'anthropic'): string {
  const envVar = provider === 'openai' ? 'OPENAI_API_KEY' : 'ANTHROPIC_API_KEY';
  const key = process.env[envVar];

  if (!key) {
    throw new Error(
      `Missing ${envVar} environment variable. Set it or switch "provider" to "offline" in ${CONFIG_FILE}.`
    );
  }

  return key;
}
