import { z } from 'zod';
import { AUTHOR_ASSOCIATIONS } from '../types/pull-request.js';

// ─── GitHub REST response schemas ───────────────────────────────────────────
// Only the fields the origin reads are declared; everything else is stripped.

const userSchema = z.object({
  login: z.string(),
});

export const pullRequestSchema = z.object({
  number: z.number().int(),
  state: z.enum(['open', 'closed']),
  title: z.string(),
  body: z.string().nullable().optional(),
  html_url: z.string(),
  user: userSchema,
  assignees: z.array(userSchema).nullable().optional(),
  requested_reviewers: z.array(userSchema).nullable().optional(),
  head: z.object({
    sha: z.string(),
    ref: z.string(),
    label: z.string(),
  }),
  base: z.object({
    sha: z.string(),
    ref: z.string(),
  }),
  // Absent on list endpoints; null while GitHub is still computing it.
  mergeable: z.boolean().nullable().optional(),
});

export const pullRequestListSchema = z.array(pullRequestSchema);

export const issueSchema = z.object({
  number: z.number().int(),
  labels: z.array(z.object({ name: z.string() })),
});

export const reviewSchema = z.object({
  // Deleted accounts come back as null
  user: userSchema.nullable(),
  author_association: z.enum(AUTHOR_ASSOCIATIONS),
  commit_id: z.string().nullable(),
  state: z.string(),
});

export const reviewListSchema = z.array(reviewSchema);

export const combinedStatusSchema = z.object({
  sha: z.string(),
  state: z.enum(['error', 'failure', 'pending', 'success']),
  statuses: z.array(z.object({
    context: z.string(),
    state: z.enum(['error', 'failure', 'pending', 'success']),
  })),
});

export const checkRunsSchema = z.object({
  total_count: z.number().int(),
  check_runs: z.array(z.object({
    name: z.string(),
    status: z.string(),
    conclusion: z.string().nullable(),
  })),
});

export type RawPullRequest = z.infer<typeof pullRequestSchema>;
export type RawReview = z.infer<typeof reviewSchema>;
