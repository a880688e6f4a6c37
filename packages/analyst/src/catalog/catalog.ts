import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { DataStoreAccessor } from '../store/index.js';
import type { FunctionRegistry } from '../registry/index.js';
import { CatalogValidationError } from '../types/index.js';
import type { FunctionSpec } from '../types/index.js';
import { CATEGORY_PARAMETERS, QUERY_CATEGORIES, categoryHandler } from './categories.js';
import type { QueryCategory } from './categories.js';

const parameterSchema = z
  .object({
    type: z.enum(['string', 'number', 'integer', 'boolean']),
    required: z.boolean(),
    description: z.string().min(1).optional(),
  })
  .strict();

const entrySchema = z
  .object({
    category: z.enum(QUERY_CATEGORIES),
    // Provider tool names: letters, digits, underscore and dash, at most 64.
    name: z.string().regex(/^[a-zA-Z0-9_-]{1,64}$/, 'must match ^[a-zA-Z0-9_-]{1,64}$'),
    description: z.string().min(1),
    parameters: z.record(parameterSchema),
  })
  .strict();

const catalogSchema = z.array(entrySchema).min(1, 'catalog has no entries');

export type CatalogEntry = FunctionSpec & {
  readonly category: QueryCategory;
};

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(catalog)';
  return `${path}: ${issue.message}`;
}

function categoryIssues(entry: CatalogEntry, index: number): ReadonlyArray<string> {
  const issues: Array<string> = [];
  const known = CATEGORY_PARAMETERS[entry.category];

  for (const [name, expected] of Object.entries(known)) {
    const declared = entry.parameters[name];
    if (expected.required && !declared) {
      issues.push(`${index}.parameters: ${entry.category} requires '${name}'`);
    } else if (expected.required && declared && !declared.required) {
      issues.push(`${index}.parameters.${name}: must be required for ${entry.category}`);
    }
  }

  for (const [name, declared] of Object.entries(entry.parameters)) {
    const expected = known[name];
    if (!expected) {
      issues.push(`${index}.parameters.${name}: not a parameter of ${entry.category}`);
    } else if (expected.type !== declared.type) {
      issues.push(`${index}.parameters.${name}: expected type ${expected.type}, got ${declared.type}`);
    }
  }

  return issues;
}

/**
 * Validates catalog entries. Throws CatalogValidationError listing every
 * problem, including entries whose parameters do not fit their category.
 */
export function parseCatalog(input: unknown): ReadonlyArray<CatalogEntry> {
  const parsed = catalogSchema.safeParse(input);
  if (!parsed.success) {
    throw new CatalogValidationError(parsed.error.issues.map(formatIssue));
  }

  const issues = parsed.data.flatMap((entry, index) => categoryIssues(entry, index));
  if (issues.length > 0) {
    throw new CatalogValidationError(issues);
  }

  return parsed.data;
}

export async function loadCatalogFile(path: string): Promise<ReadonlyArray<CatalogEntry>> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CatalogValidationError([`${path}: ${reason}`]);
  }
  return parseCatalog(raw);
}

/** Registers every entry against the accessor operation of its category. */
export function bindCatalog(
  registry: FunctionRegistry,
  entries: ReadonlyArray<CatalogEntry>,
  accessor: DataStoreAccessor,
): void {
  for (const entry of entries) {
    const spec: FunctionSpec = {
      name: entry.name,
      description: entry.description,
      parameters: entry.parameters,
    };
    registry.register(spec, categoryHandler(entry.category, accessor, entry.name));
  }
}
