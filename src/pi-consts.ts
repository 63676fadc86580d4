import { z } from 'zod';
import { InvalidArgumentError } from './errors.js';

// Token sets accepted by the PI Web API query parameters of the same name.

export const updateOptionSchema = z.enum([
  'Replace',
  'Insert',
  'NoReplace',
  'ReplaceOnly',
  'InsertNoCompression',
  'Remove',
]);
export type UpdateOption = z.infer<typeof updateOptionSchema>;
export const UpdateOption = updateOptionSchema.enum;

export const bufferOptionSchema = z.enum(['DoNotBuffer', 'BufferIfPossible', 'Buffer']);
export type BufferOption = z.infer<typeof bufferOptionSchema>;
export const BufferOption = bufferOptionSchema.enum;

/** How recordedattime resolves a time that has no stored sample. */
export const retrievalModeSchema = z.enum([
  'Exact',
  'Before',
  'After',
  'Interpolated',
  'AtOrBefore',
  'AtOrAfter',
  'Auto',
]);
export type RetrievalMode = z.infer<typeof retrievalModeSchema>;
export const RetrievalMode = retrievalModeSchema.enum;

export const summaryTypeSchema = z.enum([
  'Total',
  'Average',
  'Minimum',
  'Maximum',
  'Range',
  'StdDev',
  'PopulationStdDev',
  'Count',
  'PercentGood',
  'All',
  'AllForNonNumeric',
]);
export type SummaryType = z.infer<typeof summaryTypeSchema>;
export const SummaryType = summaryTypeSchema.enum;

function invalidToken(kind: string, value: string, options: readonly string[]): InvalidArgumentError {
  return new InvalidArgumentError(`Invalid ${kind} "${value}". Expected one of: ${options.join(', ')}`);
}

export function parseUpdateOption(value: string): UpdateOption {
  const result = updateOptionSchema.safeParse(value);
  if (!result.success) throw invalidToken('update option', value, updateOptionSchema.options);
  return result.data;
}

export function parseBufferOption(value: string): BufferOption {
  const result = bufferOptionSchema.safeParse(value);
  if (!result.success) throw invalidToken('buffer option', value, bufferOptionSchema.options);
  return result.data;
}

export function parseRetrievalMode(value: string): RetrievalMode {
  const result = retrievalModeSchema.safeParse(value);
  if (!result.success) throw invalidToken('retrieval mode', value, retrievalModeSchema.options);
  return result.data;
}

export function parseSummaryType(value: string): SummaryType {
  const result = summaryTypeSchema.safeParse(value);
  if (!result.success) throw invalidToken('summary type', value, summaryTypeSchema.options);
  return result.data;
}
