import { PackageNameSchema } from '../config/schema.js';

export function validatePackageName(name: string): string | null {
  const result = PackageNameSchema.safeParse(name);
  return result.success ? null : result.error.issues[0]?.message ?? 'Invalid package name';
}

export function isValidPackageName(name: string): boolean {
  return validatePackageName(name) === null;
}
