/**
 * Retry Policy - decides whether a faulted command is sent again.
 *
 * A command may be retried `maxRetries` times after its first attempt, with
 * exponential backoff between attempts. Once the bound is used up the fault
 * is escalated and the run stops; a command is never skipped.
 */

import { RETRY, backoffDelayMs } from '../config';
import { CommonRecoveryOptions, ErrorCode, RecoveryOption } from '../structured_error';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type RetryDecision =
    | {
        decision: 'RETRY';
        /** 1-based retry number (attempt number minus one) */
        retryNumber: number;
        delayMs: number;
        reasoning: string;
    }
    | {
        decision: 'ESCALATE';
        selected_option: RecoveryOption;
        reasoning: string;
    };

export interface RetryContext {
    seq: number;
    /** Dispatch attempts made so far, including the one that just faulted */
    attempts: number;
    code: ErrorCode;
    reason: string;
}

export interface RetryPolicyConfig {
    maxRetries?: number;
    backoffBaseMs?: number;
    backoffMaxMs?: number;
}

/* -------------------------------------------------------------------------- */
/* Retry Policy                                                               */
/* -------------------------------------------------------------------------- */

export class RetryPolicy {
    readonly maxRetries: number;
    private readonly backoffBaseMs: number;
    private readonly backoffMaxMs: number;

    constructor(config: RetryPolicyConfig = {}) {
        this.maxRetries = Math.max(0, config.maxRetries ?? RETRY.MAX_RETRIES);
        this.backoffBaseMs = config.backoffBaseMs ?? RETRY.BACKOFF_BASE_MS;
        this.backoffMaxMs = config.backoffMaxMs ?? RETRY.BACKOFF_MAX_MS;
    }

    /** Largest number of dispatches any one command may receive. */
    get maxAttempts(): number {
        return this.maxRetries + 1;
    }

    evaluate(context: RetryContext): RetryDecision {
        if (context.attempts > this.maxRetries) {
            const reasoning =
                `Retries exhausted for seq ${context.seq}: ${context.attempts} attempts ` +
                `(limit ${this.maxRetries} retries), last fault: ${context.reason}`;
            return {
                decision: 'ESCALATE',
                selected_option: CommonRecoveryOptions.escalateToHuman(reasoning),
                reasoning,
            };
        }

        const retryNumber = context.attempts;
        return {
            decision: 'RETRY',
            retryNumber,
            delayMs: this.delayFor(retryNumber),
            reasoning: `Retry ${retryNumber}/${this.maxRetries} for seq ${context.seq} after ${context.code}: ${context.reason}`,
        };
    }

    delayFor(retryNumber: number): number {
        return backoffDelayMs(retryNumber, this.backoffBaseMs, this.backoffMaxMs);
    }
}
