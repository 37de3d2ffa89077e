import { z } from 'zod';
import { AUTHOR_ASSOCIATIONS, REVIEW_POLICIES, STATE_FILTERS } from '../types/pull-request.js';
import { AUTHORING_MODES } from '../git/authoring.js';

const labelListSchema = z.array(z.string().min(1));

const originSchema = z
  .object({
    url: z.string().min(1),
    use_merge: z.boolean().optional(),
    required_labels: labelListSchema.optional(),
    retryable_labels: labelListSchema.optional(),
    required_status_context_names: labelListSchema.optional(),
    required_check_runs: labelListSchema.optional(),
    review_state: z.enum(REVIEW_POLICIES).nullable().optional(),
    review_approvers: z.array(z.enum(AUTHOR_ASSOCIATIONS)).min(1).optional(),
    branch: z.string().min(1).nullable().optional(),
    state: z.enum(STATE_FILTERS).optional(),
    baseline_from_branch: z.boolean().optional(),
    first_parent: z.boolean().optional(),
    partial_fetch: z.boolean().optional(),
    describe_version: z.boolean().optional(),
    force_import: z.boolean().optional(),
  })
  .refine(
    (origin) => {
      const required = origin.required_labels ?? [];
      return (origin.retryable_labels ?? []).every((l) => required.includes(l));
    },
    { message: 'retryable_labels must be a subset of required_labels' },
  )
  .refine(
    (origin) => origin.review_approvers === undefined || (origin.review_state ?? null) !== null,
    { message: 'review_approvers requires review_state to be set' },
  );

const githubSchema = z.object({
  host: z.string().min(1).optional(),
  cache_dir: z.string().min(1).optional(),
});

const authoringSchema = z.object({
  mode: z.enum(AUTHORING_MODES).optional(),
  default_author: z.string().regex(/^.+ <[^>]*>$/, 'default_author must look like "Name <email>"').optional(),
  allowlist: z.array(z.string()).optional(),
});

export const originConfigFileSchema = z.object({
  github: githubSchema.optional(),
  origin: originSchema.optional(),
  authoring: authoringSchema.optional(),
});

export type OriginConfigFile = z.infer<typeof originConfigFileSchema>;
export type OriginSection = NonNullable<OriginConfigFile['origin']>;
export type GitHubSection = NonNullable<OriginConfigFile['github']>;
export type AuthoringSection = NonNullable<OriginConfigFile['authoring']>;
