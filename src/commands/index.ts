export { registerShell } from './shell.js';
export { registerSearch } from './search.js';
export { registerInstall } from './install.js';
export { registerRemove } from './remove.js';
export { registerUpdate } from './update.js';
export { registerOrphans } from './orphans.js';
export { registerInfo } from './info.js';
export { registerConfig } from './config.js';
export { registerVersion } from './version.js';
