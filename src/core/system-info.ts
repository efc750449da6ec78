import { MANAGER_IDS } from '../config/schema.js';
import type { ManagerStatus, SystemInfo } from '../types/operations.js';
import { MANAGERS } from './managers.js';
import { getInstalledPackages } from './search.js';
import type { Session } from './session.js';
import { readTextFile } from '../utils/fs.js';

const RECENT_LOG_LINES = 5;

export function tailLog(path: string, count = RECENT_LOG_LINES): string[] {
  const text = readTextFile(path);
  if (text === null) return [];
  return text
    .split('\n')
    .filter((line) => line.trim() !== '')
    .slice(-count);
}

export async function collectSystemInfo(session: Session): Promise<SystemInfo> {
  const installed = await getInstalledPackages(session);
  const managers: ManagerStatus[] = [];
  for (const id of MANAGER_IDS) {
    managers.push({
      id,
      displayName: MANAGERS[id].displayName,
      installed: await session.runner.which(id),
    });
  }
  return {
    installedCount: installed.length,
    managers,
    recentLog: tailLog(session.paths.logFile),
  };
}
