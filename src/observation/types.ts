// ============================================================================
// OBSERVATION TYPES — handles, snapshots and the channel contract
// ============================================================================

import { z } from "zod";
import type { ElementLocator } from "../browser";
import type { Logger } from "../shared";

/** Time allowed for any single call into the document context (ms). */
export const DEFAULT_BOUNDARY_TIMEOUT_MS = 10_000;

/**
 * Correlates an armed probe with later retrieve/disarm calls.
 * Only the channel that issued a handle accepts it.
 */
export interface ObservationHandle {
  readonly id: string;
  readonly locator: ElementLocator;
  /** Document-clock reading taken when the probe was armed. */
  readonly startTime: number;
}

export type ProbeState = "armed" | "accumulating" | "disarmed";

export const mutationSnapshotSchema = z
  .object({
    state: z.enum(["armed", "accumulating", "disarmed"]),
    startTime: z.number(),
    firstMutationTime: z.number().nullable(),
    lastMutationTime: z.number().nullable(),
    mutationCount: z.number().int().nonnegative(),
    capturedAt: z.number(),
  })
  .refine(s => (s.mutationCount === 0) === (s.firstMutationTime === null), {
    message: "mutationCount must be 0 exactly when no mutation time is present",
  })
  .refine(s => (s.firstMutationTime === null) === (s.lastMutationTime === null), {
    message: "first and last mutation times must be present together",
  })
  .refine(
    s =>
      s.firstMutationTime === null ||
      s.lastMutationTime === null ||
      (s.startTime <= s.firstMutationTime && s.firstMutationTime <= s.lastMutationTime),
    { message: "mutation times must satisfy startTime <= firstMutationTime <= lastMutationTime" }
  );

/** Accumulated observation state, in document-clock milliseconds. */
export type MutationSnapshot = z.infer<typeof mutationSnapshotSchema>;

export const armResponseSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("armed"), startTime: z.number() }),
  z.object({ status: z.literal("not-found") }),
  z.object({ status: z.literal("conflict") }),
]);

export const retrieveResponseSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("ok"), snapshot: mutationSnapshotSchema }),
  z.object({ status: z.literal("missing") }),
]);

export const disarmResponseSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("disarmed") }),
  z.object({ status: z.literal("missing") }),
]);

/** The contract the detector and monitor rely on; `MutationChannel` implements it. */
export interface ObservationChannel {
  arm(locator: ElementLocator): Promise<ObservationHandle>;
  retrieve(handle: ObservationHandle): Promise<MutationSnapshot>;
  disarm(handle: ObservationHandle): Promise<void>;
}

export interface MutationChannelConfig {
  /** Upper bound for each call into the document context (default: DEFAULT_BOUNDARY_TIMEOUT_MS) */
  boundaryTimeoutMs?: number;
  logger?: Logger;
}
