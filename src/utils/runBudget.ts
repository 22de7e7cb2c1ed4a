/**
 * src/utils/runBudget.ts
 *
 * Token accounting for one pipeline run. Spend is estimated with a fixed
 * per-call constant rather than provider usage reports, so the ceiling can be
 * checked before a call is made. Nothing is written to disk: every
 * invocation starts from zero.
 */

import { log } from 'crawlee';
import { BudgetExceeded } from './errors.js';

export interface BudgetSnapshot {
    tokensUsed: number;
    ceiling: number;
    itemIndex: number;
}

export class RunBudget {
    private tokensUsed = 0;
    private itemIndex = 0;

    constructor(
        readonly ceiling: number,
        readonly tokensPerCall: number,
    ) {}

    /** True when one more call would push the estimate past the ceiling. */
    wouldExceed(): boolean {
        return this.tokensUsed + this.tokensPerCall > this.ceiling;
    }

    /** Throws BudgetExceeded when another call is not affordable. */
    assertAffordable(): void {
        if (this.wouldExceed()) {
            throw new BudgetExceeded(this.tokensUsed, this.ceiling);
        }
    }

    recordCall(): void {
        this.tokensUsed += this.tokensPerCall;
        log.debug(`[RunBudget] ${this.tokensUsed}/${this.ceiling} estimated tokens used`);
    }

    advance(): void {
        this.itemIndex++;
    }

    snapshot(): BudgetSnapshot {
        return { tokensUsed: this.tokensUsed, ceiling: this.ceiling, itemIndex: this.itemIndex };
    }
}
