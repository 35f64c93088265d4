/**
 * Zod schema for the pipeline configuration supplied with `start`.
 *
 * Unlike the tool-output schemas this one is strict: unknown keys and
 * missing required fields are rejected before any subprocess is launched.
 */

import { z } from 'zod';

const MAX_STAGE_TIMEOUT_SECONDS = 2 * 60 * 60;

const nonBlank = (max: number) => z.string().trim().min(1).max(max);

export const RunModeSchema = z.enum(['test', 'production']);

export const IdeaSourceSchema = z.enum(['source_a', 'source_b']);

/** Document-stage policy when a topic fails and no retry is configured. */
export const FailureModeSchema = z.enum(['partial', 'fail_fast']);

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date in YYYY-MM-DD format')
  .refine((value) => {
    const parsed = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value);
  }, 'Invalid calendar date');

const timeoutSeconds = z.number().int().positive().max(MAX_STAGE_TIMEOUT_SECONDS);

export const IdeaConfigSchema = z.object({
  source: IdeaSourceSchema,
  startDate: isoDate.optional(),
  label: nonBlank(200).optional(),
  focus: nonBlank(1000).optional(),
  combinedTopics: z.boolean().optional(),
}).strict();

export const DocConfigSchema = z.object({
  audience: nonBlank(500),
  docType: nonBlank(200),
  size: nonBlank(100),
  outputLocation: nonBlank(1000),
  styleFile: nonBlank(1000).optional(),
  storyFile: nonBlank(1000).optional(),
  mode: RunModeSchema.optional(),
  failureMode: FailureModeSchema,
}).strict();

export const PipelineConfigSchema = z.object({
  name: nonBlank(200),
  mode: RunModeSchema,
  idea: IdeaConfigSchema,
  doc: DocConfigSchema,
  retryOnFailure: z.boolean(),
  stage1Timeout: timeoutSeconds,
  stage2Timeout: timeoutSeconds,
}).strict();

export type RunMode = z.infer<typeof RunModeSchema>;
export type FailureMode = z.infer<typeof FailureModeSchema>;
export type IdeaConfig = z.infer<typeof IdeaConfigSchema>;
export type DocConfig = z.infer<typeof DocConfigSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export const EXAMPLE_PIPELINE_CONFIG: PipelineConfig = {
  name: 'My Content Pipeline',
  mode: 'test',
  idea: {
    source: 'source_a',
    startDate: '2025-01-01',
    label: 'AIQ',
    focus: 'AI transformation and business strategy',
    combinedTopics: false,
  },
  doc: {
    audience: 'business executives',
    docType: 'blog post',
    size: '800 words',
    outputLocation: './output',
    failureMode: 'partial',
  },
  retryOnFailure: true,
  stage1Timeout: 600,
  stage2Timeout: 300,
};
