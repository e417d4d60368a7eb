import { existsSync } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { loadEnvFile, loadVaultConfig } from '../config.js';
import { FsFileStore } from '../core/file-store.js';
import { hasMarker } from '../core/safe-merge.js';
import type { VaultConfig } from '../types/sync.js';
import { getBoardFilePath, getTicketsDir } from '../utils/paths.js';
import { logger } from '../utils/logger.js';

export interface VaultStatus {
  ticketsDir: string;
  boardPath: string;
  ticketFiles: number;
  withNotesMarker: number;
  boardExists: boolean;
}

export async function collectVaultStatus(config: VaultConfig): Promise<VaultStatus> {
  const ticketsDir = getTicketsDir(config);
  const boardPath = getBoardFilePath(config);
  const status: VaultStatus = {
    ticketsDir,
    boardPath,
    ticketFiles: 0,
    withNotesMarker: 0,
    boardExists: existsSync(boardPath),
  };

  if (!existsSync(ticketsDir)) {
    return status;
  }

  const store = new FsFileStore();
  const files = (await readdir(ticketsDir)).filter(f => f.endsWith('.md'));
  status.ticketFiles = files.length;
  for (const file of files) {
    const content = await store.read(join(ticketsDir, file));
    if (content !== null && hasMarker(content)) {
      status.withNotesMarker++;
    }
  }

  return status;
}

export async function statusCommand(options: { envFile?: string }): Promise<void> {
  loadEnvFile(options.envFile);
  const config = loadVaultConfig();
  const status = await collectVaultStatus(config);

  logger.info(`Vault:   ${config.vaultPath}`);
  logger.info(`Tickets: ${status.ticketsDir}`);
  logger.info(`Board:   ${status.boardPath}${status.boardExists ? '' : ' (not generated yet)'}`);

  if (status.ticketFiles === 0) {
    logger.warn('No ticket files found. Run `jvsync sync` first.');
    return;
  }

  logger.info(`Ticket files: ${status.ticketFiles}`);
  logger.info(`With notes marker: ${status.withNotesMarker}`);
  if (status.withNotesMarker < status.ticketFiles) {
    logger.dim(`${status.ticketFiles - status.withNotesMarker} file(s) will get a new marker on the next sync.`);
  }
}
