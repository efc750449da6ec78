export { parseSearchOutput, buildPackageLookup } from './search-output.js';
export { resolve, rankCandidates, similarity, DEFAULT_CUTOFF, DEFAULT_MAX_RESULTS } from './fuzzy.js';
export { MANAGERS, isAurHelper, planUpdate } from './managers.js';
export type { UpdatePlan } from './managers.js';
export { ProcessRunner, formatCommand, DEFAULT_TIMEOUT_MS, TIMEOUT_MESSAGE } from './runner.js';
export type { CommandRunner } from './runner.js';
export { createSession, type Session, type SessionOptions } from './session.js';
export { validatePackageName, isValidPackageName } from './validation.js';
export { backupSystemState } from './backup.js';
export { searchPackages, findSimilar, packageExists, getInstalledPackages } from './search.js';
export { installPackage } from './install.js';
export { removePackage, REMOVE_MODE_PHASES } from './remove.js';
export { updateSystem } from './update.js';
export { removeOrphans, listOrphans } from './orphans.js';
export { installHelper } from './helper.js';
export { collectSystemInfo } from './system-info.js';
