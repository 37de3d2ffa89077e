export { createPrOrigin, ORIGIN_TYPE } from './origin.js';
export type { PrOrigin, PrOriginConfig, PrOriginDeps } from './origin.js';
export {
  parseReference,
  selectPullRequestForCommit,
  COMPLETE_SHA1_PATTERN,
} from './reference.js';
export type { PullRequestReference, ReferenceContext } from './reference.js';
export { createGatingEngine, LABEL_POLL_ATTEMPTS, LABEL_POLL_DELAY_MS } from './gating.js';
export type { GatingConfig, GatingEngine, GatingEngineDeps, AdmissionResult } from './gating.js';
export { REVIEW_POLICY_PREDICATES, computeApproverState } from './review-policy.js';
export type { ApproverState, RejectedReview, ReviewPredicate } from './review-policy.js';
export { pollUntil, defaultSleep } from './poll.js';
export type { PollOptions, PollResult, Sleep } from './poll.js';
export {
  planFetch,
  createFetchOrchestrator,
  LOCAL_PR_HEAD_REF,
  LOCAL_PR_MERGE_REF,
  LOCAL_PR_BASE_BRANCH,
} from './fetch.js';
export type { FetchPlan, FetchOptions, FetchResult, FetchOrchestrator } from './fetch.js';
export { assembleRevision } from './assembler.js';
export type { AssembleInput, AssemblerDeps } from './assembler.js';
export { createPrReader } from './reader.js';
export type { PrReaderOptions } from './reader.js';
export { loadRunConfig, DEFAULT_REVIEW_APPROVERS } from './config.js';
export type { CliOptions, RunConfig, RunConfigDeps } from './config.js';
export { createLogger, noopLogger } from './logger.js';
export type { Logger, LoggerLike, LoggerDeps, LogContext } from './logger.js';
export * from './labels.js';
