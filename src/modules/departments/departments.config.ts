import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import * as joi from 'joi';

export const DEPARTMENT_DIRECTORY = 'DEPARTMENT_DIRECTORY';

/** Department name (lower-case) → reviewer identity. */
export type DepartmentDirectory = Readonly<Record<string, string>>;

const directorySchema = joi
  .object()
  .pattern(joi.string().trim().min(1), joi.string().trim().min(1))
  .min(1)
  .required();

export function parseDepartmentDirectory(raw: unknown): DepartmentDirectory {
  const { error, value } = directorySchema.validate(raw);
  if (error) {
    throw new Error(`Department directory validation error: ${error.message}`);
  }

  const directory: Record<string, string> = {};
  for (const [department, reviewer] of Object.entries<string>(value)) {
    directory[department.trim().toLowerCase()] = reviewer.trim();
  }
  return Object.freeze(directory);
}

export function loadDepartmentDirectory(file: string): DepartmentDirectory {
  const raw: unknown = JSON.parse(readFileSync(resolve(process.cwd(), file), 'utf8'));
  return parseDepartmentDirectory(raw);
}
