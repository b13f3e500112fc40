export * from './types';
export { RetryPolicy } from './retry_policy';
export type { RetryDecision, RetryContext, RetryPolicyConfig } from './retry_policy';
export { RunStateMachine, numberingProblem } from './run_state_machine';
export type { RunEvent, RunEffect, Transition, ResumePoint, RunStateMachineOptions, OutcomeKind } from './run_state_machine';
export { AckTracker, deadlineFor } from './ack_tracker';
export type { DeadlineListener } from './ack_tracker';
export { CommandJournal, JournalError } from './journal';
export type { RunRecord, AttemptRecord, RebuiltRun, JournalOptions } from './journal';
export { ExecutionOrchestrator, RunHandle } from './execution_orchestrator';
export type { OrchestratorOptions, RecoverOptions, RunOutcome, DispatchNotice, OutcomeNotice } from './execution_orchestrator';
export { MoonrakerController, MoonrakerError } from './moonraker_controller';
export type { FetchLike, HttpRequestInit, HttpResponse, MoonrakerOptions } from './moonraker_controller';
