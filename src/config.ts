import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { DEFAULT_BOARD_FILE, DEFAULT_JQL, DEFAULT_TICKETS_FOLDER } from './constants.js';
import { ConfigurationError } from './errors.js';
import type { SyncConfig, VaultConfig } from './types/sync.js';

// Unset and empty variables are treated alike
const emptyAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const required = (name: string) =>
  z.preprocess(
    emptyAsUndefined,
    z.string({ required_error: `${name} must be set` }).trim().min(1, `${name} must be set`),
  );

const withDefault = (fallback: string) =>
  z.preprocess(emptyAsUndefined, z.string().trim().min(1).default(fallback));

const vaultEnvSchema = z.object({
  OBSIDIAN_VAULT_PATH: required('OBSIDIAN_VAULT_PATH'),
  JIRA_TICKETS_FOLDER: withDefault(DEFAULT_TICKETS_FOLDER),
  JIRA_BOARD_FILE: withDefault(DEFAULT_BOARD_FILE),
});

const syncEnvSchema = vaultEnvSchema.extend({
  JIRA_HOST: required('JIRA_HOST'),
  JIRA_TOKEN: required('JIRA_TOKEN'),
  JIRA_USER: z.preprocess(emptyAsUndefined, z.string().optional()),
  JIRA_JQL: withDefault(DEFAULT_JQL),
});

/**
 * Load variables from a .env file into process.env. Variables already set in
 * the environment win over the file.
 */
export function loadEnvFile(path?: string): void {
  loadDotenv(path ? { path } : undefined);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SyncConfig {
  const data = parseEnv(syncEnvSchema, env);
  return {
    jiraHost: data.JIRA_HOST,
    jiraUser: data.JIRA_USER,
    jiraToken: data.JIRA_TOKEN,
    vaultPath: data.OBSIDIAN_VAULT_PATH,
    jql: data.JIRA_JQL,
    ticketsFolder: data.JIRA_TICKETS_FOLDER,
    boardFile: data.JIRA_BOARD_FILE,
  };
}

/**
 * Only the vault location settings, for commands that never talk to Jira.
 */
export function loadVaultConfig(env: NodeJS.ProcessEnv = process.env): VaultConfig {
  const data = parseEnv(vaultEnvSchema, env);
  return {
    vaultPath: data.OBSIDIAN_VAULT_PATH,
    ticketsFolder: data.JIRA_TICKETS_FOLDER,
    boardFile: data.JIRA_BOARD_FILE,
  };
}

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: NodeJS.ProcessEnv): z.output<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map(issue =>
      issue.path.length > 0 && !issue.message.includes(String(issue.path[0]))
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    );
    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`, problems);
  }
  return result.data;
}
