import { z } from 'zod';

// ── Managers and modes ──────────────────────────────────────────────

export const MANAGER_IDS = ['pacman', 'yay', 'paru'] as const;
export const AUR_HELPER_IDS = ['yay', 'paru'] as const;
export const REMOVE_MODES = ['simple', 'full', 'purge'] as const;
export const UPDATE_MODES = ['standard', 'full', 'refresh', 'force'] as const;

export const ManagerIdSchema = z.enum(MANAGER_IDS);
export const AurHelperIdSchema = z.enum(AUR_HELPER_IDS);
export const RemoveModeSchema = z.enum(REMOVE_MODES);
export const UpdateModeSchema = z.enum(UPDATE_MODES);

// ── Package names ───────────────────────────────────────────────────

const packageNamePattern = /^[a-zA-Z0-9][a-zA-Z0-9@._+-]*$/;

export const MAX_PACKAGE_NAME_LENGTH = 255;

export const PackageNameSchema = z
  .string()
  .max(MAX_PACKAGE_NAME_LENGTH, `At most ${MAX_PACKAGE_NAME_LENGTH} characters`)
  .regex(packageNamePattern, 'Alphanumeric start, then alphanumerics and @._+-');

// ── Configuration ───────────────────────────────────────────────────

export const MAX_SEARCH_RESULTS_LIMIT = 50;

// Each key falls back to its own default, so one bad value does not reset the rest.
export const ConfigSchema = z.object({
  default_manager: ManagerIdSchema.catch('pacman'),
  auto_confirm: z.boolean().catch(false),
  show_progress: z.boolean().catch(true),
  backup_before_operations: z.boolean().catch(true),
  max_search_results: z.number().int().min(1).max(MAX_SEARCH_RESULTS_LIMIT).catch(10),
  search_cutoff: z.number().min(0).max(1).catch(0.3),
  colors_enabled: z.boolean().catch(true),
});

export const CONFIG_KEYS = [
  'default_manager',
  'auto_confirm',
  'show_progress',
  'backup_before_operations',
  'max_search_results',
  'search_cutoff',
  'colors_enabled',
] as const;

export const ConfigKeySchema = z.enum(CONFIG_KEYS);

const BooleanTextSchema = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

// Strict variants for values typed on the command line.
export const ConfigValueSchemas = {
  default_manager: ManagerIdSchema,
  auto_confirm: BooleanTextSchema,
  show_progress: BooleanTextSchema,
  backup_before_operations: BooleanTextSchema,
  max_search_results: z.coerce.number().int().min(1).max(MAX_SEARCH_RESULTS_LIMIT),
  search_cutoff: z.coerce.number().min(0).max(1),
  colors_enabled: BooleanTextSchema,
} as const;
