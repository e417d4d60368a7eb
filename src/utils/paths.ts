import { join } from 'node:path';
import { LOCK_FILE } from '../constants.js';
import type { VaultConfig } from '../types/sync.js';

export function getTicketsDir(config: VaultConfig): string {
  return join(config.vaultPath, config.ticketsFolder);
}

export function getBoardFilePath(config: VaultConfig): string {
  return join(config.vaultPath, config.boardFile);
}

export function getLockFilePath(config: VaultConfig): string {
  return join(config.vaultPath, LOCK_FILE);
}
