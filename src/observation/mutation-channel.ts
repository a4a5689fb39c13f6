// ============================================================================
// MUTATION CHANNEL — arms, reads and disarms document-side mutation probes
// ============================================================================

import { randomUUID } from "crypto";
import type { z } from "zod";

import type { ElementLocator, ScriptExecutor, Serializable } from "../browser";
import { describeLocator, parseLocator } from "../browser";
import type { Logger } from "../shared";
import {
  ContextResponseError,
  ElementNotFoundError,
  InvalidHandleError,
  ObservationConflictError,
  consoleLogger,
  errorMessage,
  withTimeout,
} from "../shared";

import { CHANNEL_SCRIPT } from "./channel-script";
import type {
  MutationChannelConfig,
  MutationSnapshot,
  ObservationChannel,
  ObservationHandle,
} from "./types";
import {
  DEFAULT_BOUNDARY_TIMEOUT_MS,
  armResponseSchema,
  disarmResponseSchema,
  retrieveResponseSchema,
} from "./types";

type ChannelOp = "arm" | "retrieve" | "disarm";

/**
 * The only component allowed to touch document-side instrumentation.
 *
 * Handles are tracked here as well as in the document, so misuse (a foreign or
 * disposed handle) is rejected without a round trip.
 */
export class MutationChannel implements ObservationChannel {
  private readonly document: ScriptExecutor;
  private readonly boundaryTimeoutMs: number;
  private readonly logger: Logger;
  private readonly live = new Map<string, ObservationHandle>();

  constructor(document: ScriptExecutor, config: MutationChannelConfig = {}) {
    this.document = document;
    this.boundaryTimeoutMs = config.boundaryTimeoutMs ?? DEFAULT_BOUNDARY_TIMEOUT_MS;
    this.logger = config.logger ?? consoleLogger;
  }

  async arm(locator: ElementLocator): Promise<ObservationHandle> {
    const target = parseLocator(locator);
    const id = `probe-${randomUUID()}`;
    let response: z.infer<typeof armResponseSchema>;
    try {
      response = await this.call("arm", { key: id, locator: target }, armResponseSchema);
    } catch (error) {
      // The document may still complete an arm the controller gave up on.
      if (error instanceof ContextResponseError) await this.release(id);
      throw error;
    }

    switch (response.status) {
      case "not-found":
        throw new ElementNotFoundError(describeLocator(target), "nothing to observe");
      case "conflict":
        throw new ObservationConflictError(
          describeLocator(target),
          `${describeLocator(target)} already has a live observation; disarm it before arming another`
        );
      case "armed": {
        const handle: ObservationHandle = Object.freeze({ id, locator: target, startTime: response.startTime });
        this.live.set(id, handle);
        this.logger.log(`[MutationChannel] Armed ${id} on ${describeLocator(target)}`);
        return handle;
      }
    }
  }

  async retrieve(handle: ObservationHandle): Promise<MutationSnapshot> {
    this.assertLive(handle);
    const response = await this.call("retrieve", { key: handle.id }, retrieveResponseSchema);
    if (response.status === "missing") {
      // The document lost its state (reload or navigation) under a live handle.
      this.live.delete(handle.id);
      throw new InvalidHandleError(`Observation ${handle.id} no longer exists in the document`);
    }
    return response.snapshot;
  }

  async disarm(handle: ObservationHandle): Promise<void> {
    if (!this.live.has(handle.id)) return;
    // Stays live until the document confirms, so a failed disarm can be retried.
    const response = await this.call("disarm", { key: handle.id }, disarmResponseSchema);
    this.live.delete(handle.id);
    if (response.status === "missing") {
      this.logger.log(`[MutationChannel] ${handle.id} was already gone from the document`);
      return;
    }
    this.logger.log(`[MutationChannel] Disarmed ${handle.id}`);
  }

  /** Number of handles armed through this channel and not yet disarmed. */
  get liveCount(): number {
    return this.live.size;
  }

  /** Best-effort removal of a probe whose arm outcome is unknown. */
  private async release(id: string): Promise<void> {
    try {
      await this.call("disarm", { key: id }, disarmResponseSchema);
    } catch (error) {
      this.logger.warn(`[MutationChannel] Could not release ${id} after a failed arm: ${errorMessage(error)}`);
    }
  }

  private assertLive(handle: ObservationHandle): void {
    if (!this.live.has(handle.id)) {
      throw new InvalidHandleError(`Observation ${handle.id} was never armed on this channel or has been disarmed`);
    }
  }

  private async call<T>(
    op: ChannelOp,
    payload: { [key: string]: Serializable },
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const raw = await withTimeout(
      this.document.executeInContext(CHANNEL_SCRIPT, [op, payload]),
      this.boundaryTimeoutMs,
      () => new ContextResponseError(`Document did not answer "${op}" within ${this.boundaryTimeoutMs}ms`)
    );
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new ContextResponseError(
        `Unexpected "${op}" response from document: ${errorMessage(parsed.error)}`,
        { cause: parsed.error }
      );
    }
    return parsed.data;
  }
}
