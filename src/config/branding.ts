export const APP_NAME = 'pacmate';
export const DISPLAY_NAME = 'Pacmate';
export const DESCRIPTION = 'Interactive front-end for pacman and AUR helpers';
export const CONFIG_DIR = 'pacmate';
export const CONFIG_FILE = 'config.json';
export const LOG_FILE = 'pacmate.log';
export const ENV_PREFIX = 'PACMATE';
export const AUR_BASE_URL = 'https://aur.archlinux.org';

export function envVar(suffix: string): string {
  return `${ENV_PREFIX}_${suffix.toUpperCase()}`;
}
