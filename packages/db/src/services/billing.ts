import {
  idSchema,
  usageIncrementSchema,
  usageMetrics,
  type PlanDuration,
  type UsageMetric,
} from '@traceforge/schema'
import { and, eq, gt, lte, or, sql } from 'drizzle-orm'
import {
  NotFoundError,
  SubscriptionInactiveError,
  UsageLimitExceededError,
} from '../errors'
import type { Database } from '../registry'
import { plans, subscriptions, usage, type Plan, type Subscription, type Usage } from '../schema/billing'

/** Reset date of counters that never reset. */
export const LIFETIME_RESET = new Date('9999-12-31T23:59:59.999Z')

/**
 * Next reset after `from`: one calendar month or year later, with the day
 * clamped to the target month's length (Jan 31 → Feb 28/29).
 */
export function nextReset(from: Date, duration: PlanDuration): Date {
  if (duration === 'lifetime') return new Date(LIFETIME_RESET)

  const months = duration === 'monthly' ? 1 : 12
  const target = new Date(
    Date.UTC(
      from.getUTCFullYear(),
      from.getUTCMonth() + months,
      1,
      from.getUTCHours(),
      from.getUTCMinutes(),
      from.getUTCSeconds(),
      from.getUTCMilliseconds(),
    ),
  )
  const lastDay = new Date(
    Date.UTC(target.getUTCFullYear(), target.getUTCMonth() + 1, 0),
  ).getUTCDate()
  target.setUTCDate(Math.min(from.getUTCDate(), lastDay))
  return target
}

/** Steps `resetDate` forward by whole periods until it is after `at`. */
export function rollForward(resetDate: Date, duration: PlanDuration, at: Date): Date {
  let next = nextReset(resetDate, duration)
  while (next <= at) {
    next = nextReset(next, duration)
  }
  return next
}

export type BillingServiceOptions = {
  now?: () => Date
}

/**
 * Tenant subscriptions and per-metric usage counters.
 *
 * A limit of `-1` never blocks. Counters copy their limit from the plan when
 * created and again whenever the tenant changes plan. A plan change also
 * pulls each reset date in to the new plan's first reset when that comes
 * sooner. A counter whose reset date has passed is reset on its next use as
 * well as by {@link resetUsage}.
 */
export function createBillingService(db: Database, options: BillingServiceOptions = {}) {
  const now = options.now ?? (() => new Date())

  async function getPlan(name: string): Promise<Plan> {
    const [plan] = await db
      .select()
      .from(plans)
      .where(and(eq(plans.name, name), eq(plans.isActive, true)))
      .limit(1)
    if (!plan) {
      throw new NotFoundError('plan', name)
    }
    return plan
  }

  /** Puts the tenant on `planName`, replacing its current subscription. */
  async function subscribe(tenantId: string, planName: string): Promise<Subscription> {
    idSchema.parse(tenantId)
    const plan = await getPlan(planName)
    const startDate = now()

    return db.transaction(async (tx) => {
      const [subscription] = await tx
        .insert(subscriptions)
        .values({ tenantId, planId: plan.planId, status: 'ACTIVE', startDate, autoRenew: true })
        .onConflictDoUpdate({
          target: subscriptions.tenantId,
          set: { planId: plan.planId, status: 'ACTIVE', startDate, endDate: null },
        })
        .returning()

      for (const metric of usageMetrics) {
        await tx
          .update(usage)
          .set({ limit: plan.limits[metric] })
          .where(and(eq(usage.subscriptionId, subscription.subscriptionId), eq(usage.metric, metric)))
      }

      const firstReset = nextReset(startDate, plan.duration)
      await tx
        .update(usage)
        .set({ resetDate: firstReset })
        .where(and(eq(usage.subscriptionId, subscription.subscriptionId), gt(usage.resetDate, firstReset)))
      return subscription
    })
  }

  async function getCounter(subscriptionId: number, metric: UsageMetric): Promise<Usage | null> {
    const [row] = await db
      .select()
      .from(usage)
      .where(and(eq(usage.subscriptionId, subscriptionId), eq(usage.metric, metric)))
      .limit(1)
    return row ?? null
  }

  /**
   * Adds `amount` to the counter, creating it from the plan limit when
   * absent and resetting it first when its reset date has passed. The
   * increment is applied only if it stays within the limit.
   */
  async function recordUsage(
    subscriptionId: number,
    metric: UsageMetric,
    amount = 1,
  ): Promise<Usage> {
    const increment = usageIncrementSchema.parse({ metric, amount })

    const [found] = await db
      .select({ subscription: subscriptions, plan: plans })
      .from(subscriptions)
      .innerJoin(plans, eq(plans.planId, subscriptions.planId))
      .where(eq(subscriptions.subscriptionId, subscriptionId))
      .limit(1)
    if (!found) {
      throw new NotFoundError('subscription', String(subscriptionId))
    }
    if (found.subscription.status !== 'ACTIVE') {
      throw new SubscriptionInactiveError(subscriptionId, found.subscription.status)
    }

    const at = now()
    await db
      .insert(usage)
      .values({
        subscriptionId,
        metric: increment.metric,
        used: 0,
        limit: found.plan.limits[increment.metric],
        resetDate: nextReset(at, found.plan.duration),
      })
      .onConflictDoNothing({ target: [usage.subscriptionId, usage.metric] })

    const current = await getCounter(subscriptionId, increment.metric)
    if (current && current.resetDate <= at) {
      await db
        .update(usage)
        .set({ used: 0, resetDate: rollForward(current.resetDate, found.plan.duration, at) })
        .where(and(eq(usage.usageId, current.usageId), eq(usage.resetDate, current.resetDate)))
    }

    const [updated] = await db
      .update(usage)
      .set({ used: sql`${usage.used} + ${increment.amount}` })
      .where(
        and(
          eq(usage.subscriptionId, subscriptionId),
          eq(usage.metric, increment.metric),
          or(eq(usage.limit, -1), lte(sql`${usage.used} + ${increment.amount}`, usage.limit)),
        ),
      )
      .returning()
    if (updated) return updated

    const counter = await getCounter(subscriptionId, increment.metric)
    if (!counter) {
      throw new NotFoundError('usage', `${subscriptionId}/${increment.metric}`)
    }
    throw new UsageLimitExceededError(increment.metric, counter.used, counter.limit, increment.amount)
  }

  /**
   * Zeroes every counter whose reset date has passed and moves its reset
   * date forward by whole periods until it is in the future. Returns the
   * number of counters reset.
   */
  async function resetUsage(): Promise<number> {
    const at = now()
    const due = await db
      .select({ usageId: usage.usageId, resetDate: usage.resetDate, duration: plans.duration })
      .from(usage)
      .innerJoin(subscriptions, eq(subscriptions.subscriptionId, usage.subscriptionId))
      .innerJoin(plans, eq(plans.planId, subscriptions.planId))
      .where(lte(usage.resetDate, at))

    for (const counter of due) {
      await db
        .update(usage)
        .set({ used: 0, resetDate: rollForward(counter.resetDate, counter.duration, at) })
        .where(eq(usage.usageId, counter.usageId))
    }
    return due.length
  }

  return {
    subscribe,
    recordUsage,
    resetUsage,
    getCounter,
  }
}

export type BillingService = ReturnType<typeof createBillingService>
