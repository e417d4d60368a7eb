import type { Document } from './document.js';

export interface Issue {
  key: string;
  summary: string;
  status: string;
  priority?: string;
  issueType?: string;
  description?: Document;
  link: string;
  created?: string;
  updated?: string;
}

export interface SyncConfig {
  jiraHost: string;
  jiraUser?: string;
  jiraToken: string;
  vaultPath: string;
  jql: string;
  ticketsFolder: string;
  boardFile: string;
}

export type VaultConfig = Pick<SyncConfig, 'vaultPath' | 'ticketsFolder' | 'boardFile'>;

export type MergeMode = 'created' | 'merged' | 'marker-missing';

export type FileOutcome = 'created' | 'updated' | 'unchanged';

export interface SyncResult {
  created: number;
  updated: number;
  unchanged: number;
  recovered: number;
  board: 'written' | 'unchanged' | 'skipped' | 'failed';
  errors: Array<{ key: string; error: string }>;
}
