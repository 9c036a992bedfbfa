// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * basic-spending.ts
 *
 * Demonstrates the core spending-governance workflow:
 *   1. Adapt a ledger, notifier and family directory to the engine.
 *   2. Configure a child's threshold, a blocked category and a weekly limit.
 *   3. Check spends and record one that needs no approval.
 *   4. Open a spending request and approve it.
 *   5. Inspect limit usage and request statistics.
 *
 * Run: npx tsx examples/basic-spending.ts
 */

import {
  EVENT_NOTIFICATION_FAILED,
  EVENT_REQUEST_RESOLVED,
  InsufficientFundsError,
  SpendingGovernanceEngine,
  formatMoney,
} from '../src/index.js';
import type {
  FamilyDirectory,
  Ledger,
  LedgerDebitRequest,
  LedgerDebitResult,
  NotificationPayload,
  Notifier,
} from '../src/index.js';

// ----------------------------------------------------------------------------
// Collaborators.  A real host would call its transaction service and push
// notification provider here.
// ----------------------------------------------------------------------------

class InMemoryLedger implements Ledger {
  readonly #balances = new Map<string, number>([['maya', 40]]);
  #sequence = 0;

  async debit(request: LedgerDebitRequest): Promise<LedgerDebitResult> {
    const balance = this.#balances.get(request.childId) ?? 0;
    if (request.amount > balance) {
      throw new InsufficientFundsError(request.childId, request.amount, balance);
    }
    const newBalance = balance - request.amount;
    this.#balances.set(request.childId, newBalance);
    this.#sequence += 1;
    return { transactionId: `txn-${this.#sequence}`, newBalance };
  }
}

const consoleNotifier: Notifier = {
  async notifyFamily(familyId: string, message: string, payload: NotificationPayload) {
    console.log(`  [family ${familyId}] ${message} (${payload.type})`);
  },
  async notifyChild(childId: string, message: string, payload: NotificationPayload) {
    console.log(`  [child ${childId}] ${message} (${payload.type})`);
  },
};

const families: FamilyDirectory = {
  async getFamilyId(childId: string) {
    return childId === 'maya' ? 'rivera-family' : undefined;
  },
};

async function main(): Promise<void> {
  // --------------------------------------------------------------------------
  // 1. Initialise the engine.
  // --------------------------------------------------------------------------
  const engine = new SpendingGovernanceEngine(
    { ledger: new InMemoryLedger(), notifier: consoleNotifier, families },
    { defaults: { approvalThreshold: 10 } },
  );
  engine.events.on(EVENT_REQUEST_RESOLVED, (event) => {
    console.log(`  request ${event.requestId} → ${event.status}`);
  });
  engine.events.on(EVENT_NOTIFICATION_FAILED, (event) => {
    console.warn(`  notification to ${event.recipient} failed: ${event.error}`);
  });

  // --------------------------------------------------------------------------
  // 2. Configure policy.
  // --------------------------------------------------------------------------
  await engine.upsertCategoryRule('maya', {
    categoryId: 'candy',
    restriction: 'blocked',
    restrictionReason: 'No candy purchases',
  });
  await engine.upsertSpendingLimit('maya', { period: 'weekly', limitAmount: 30 });

  // --------------------------------------------------------------------------
  // 3. Check and spend.
  // --------------------------------------------------------------------------
  console.log('\n=== Checks ===');
  for (const [amount, categoryId] of [[4, 'candy'], [8, 'books'], [18, 'toys']] as const) {
    const result = await engine.checkSpending('maya', amount, categoryId);
    const verdict = !result.canSpend
      ? `DENY: ${result.blockReason}`
      : result.requiresApproval
        ? 'NEEDS APPROVAL'
        : 'ALLOW';
    console.log(`  ${formatMoney(amount)} on ${categoryId}: ${verdict}`);
  }

  const direct = await engine.recordDirectSpend('maya', { amount: 8, description: 'Comic book', categoryId: 'books' });
  console.log(`  spent directly, transaction ${direct.transactionId}, balance ${formatMoney(direct.newBalance)}`);

  // --------------------------------------------------------------------------
  // 4. Request and approve.
  // --------------------------------------------------------------------------
  console.log('\n=== Request ===');
  const request = await engine.createRequest('maya', {
    amount: 18,
    description: 'Kite',
    categoryId: 'toys',
  });
  await engine.respondToRequest(request.id, {
    approved: true,
    respondedBy: 'parent-alex',
    comment: 'Saved up for this one',
    isLearningMoment: true,
  });

  // --------------------------------------------------------------------------
  // 5. Usage.
  // --------------------------------------------------------------------------
  console.log('\n=== Limits ===');
  for (const status of await engine.getLimitStatuses('maya')) {
    console.log(
      `  ${status.period}: ${formatMoney(status.spentAmount)} spent, ` +
        `${formatMoney(status.remainingAmount)} of ${formatMoney(status.limitAmount)} left`,
    );
  }

  const stats = await engine.getRequestStatistics('maya');
  console.log(`\n  requests: ${stats.total}, approved: ${stats.approved}, rate: ${stats.approvalRate}`);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
