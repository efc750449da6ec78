import type { z } from 'zod';
import type {
  ConfigSchema,
  ConfigKeySchema,
  ManagerIdSchema,
  AurHelperIdSchema,
  RemoveModeSchema,
  UpdateModeSchema,
} from '../config/schema.js';

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigKey = z.infer<typeof ConfigKeySchema>;
export type ManagerId = z.infer<typeof ManagerIdSchema>;
export type AurHelperId = z.infer<typeof AurHelperIdSchema>;
export type RemoveMode = z.infer<typeof RemoveModeSchema>;
export type UpdateMode = z.infer<typeof UpdateModeSchema>;
