/**
 * Main entry point - exports all public APIs
 */

export { StudyflowCLI } from './cli';
export type { CliIO, CliOptions } from './cli';
export { CommandService, AGENT_CAPABILITIES } from './commands';
export type { CommandServiceDeps, LmsClient } from './commands';
export { ConfirmTokenIssuer, hashToken } from './confirm_tokens';
export type { ConsumeResult, IssuedToken, TokenBinding } from './confirm_tokens';
export { IdempotencyLedger } from './idempotency_ledger';
export { HistoryStore, HistoryStoreError } from './history_store';
export { WorkflowMachine, successorOf } from './workflow_machine';
export type { StageContext, AdvanceResult, RunResult } from './workflow_machine';
export { SubmissionGate, parseSubmitTarget } from './submission_gate';
export type { SubmitRequest, SubmitOutcome } from './submission_gate';
export { DeterministicRubricScorer, parseRubricCriteria } from './rubric_scorer';
export type { RubricScorer, RubricScoreRow } from './rubric_scorer';
export { CanvasClient, LmsClientError } from './lms_client';
export type { AssignmentSource, SubmissionTransport, LmsAssignment, LmsCourse } from './lms_client';
export { loadPolicy, policyForCourse, enforceDoPolicy, evaluateSubmitPolicy } from './policy';
export type { PolicyFile, PolicyRule } from './policy';
export { loadSettings } from './config';
export type { Settings } from './config';
export { StudyflowError, ErrorFactory, toStudyflowError } from './structured_error';
export type { ErrorKind, StructuredError } from './structured_error';
export { SCHEMA_VERSION } from './envelope';
export type { Envelope } from './envelope';
export { SchemaValidator } from './schema_validator';
export type { ValidationResult, JsonSchema } from './schema_validator';
export type { RunRecord, WorkflowState, WorkflowMode } from './run_types';
