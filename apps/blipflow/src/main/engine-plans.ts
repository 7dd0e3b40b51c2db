import type { EngineAttempt } from "../shared/contracts.js";
import { describeError } from "./errors.js";
import type { Logger } from "./logger.js";

export type ProfilePlan = {
  name: "profile";
  profilePath: string;
};

export type DegradedPlan = {
  name: "degraded";
  warpResolution: number;
  subsampling: number;
};

export type EnginePlan = ProfilePlan | DegradedPlan;

export const DEGRADED_PLAN: DegradedPlan = {
  name: "degraded",
  warpResolution: 6,
  subsampling: 1,
};

/** The bundled profile goes first when one exists; the degraded plan is always last. */
export const buildEnginePlans = (profilePath: string | null): EnginePlan[] =>
  profilePath ? [{ name: "profile", profilePath }, DEGRADED_PLAN] : [DEGRADED_PLAN];

export const describePlan = (plan: EnginePlan): string =>
  plan.name === "profile"
    ? `profile ${plan.profilePath}`
    : `degraded (warpres=${plan.warpResolution}, subsamp=${plan.subsampling})`;

export type PlanRunOutcome<T> =
  | { ok: true; value: T; plan: EnginePlan; attempts: EngineAttempt[] }
  | { ok: false; attempts: EngineAttempt[] };

/**
 * Tries each plan in order and stops at the first that succeeds. Every attempt
 * is logged and returned, whatever the outcome.
 */
export const runEnginePlans = async <T>(
  plans: readonly EnginePlan[],
  attempt: (plan: EnginePlan) => Promise<T>,
  logger?: Logger,
  now: () => number = Date.now
): Promise<PlanRunOutcome<T>> => {
  const attempts: EngineAttempt[] = [];
  for (const [index, plan] of plans.entries()) {
    const startedAt = now();
    logger?.info("engine attempt", {
      plan: plan.name,
      detail: describePlan(plan),
      attempt: index + 1,
    });
    try {
      const value = await attempt(plan);
      const durationMs = now() - startedAt;
      attempts.push({ plan: plan.name, ok: true, durationMs });
      logger?.info("engine attempt succeeded", { plan: plan.name, durationMs });
      return { ok: true, value, plan, attempts };
    } catch (error) {
      const durationMs = now() - startedAt;
      const message = describeError(error);
      attempts.push({ plan: plan.name, ok: false, durationMs, error: message });
      const hasNext = index < plans.length - 1;
      logger?.warn(hasNext ? "engine attempt failed; retrying" : "engine attempt failed", {
        plan: plan.name,
        durationMs,
        error: message,
      });
    }
  }
  return { ok: false, attempts };
};
