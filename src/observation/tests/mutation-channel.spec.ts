import { describe, it, expect, vi, afterEach } from "vitest";
import { By } from "../../browser";
import type { ScriptExecutor, Serializable } from "../../browser";
import {
  ContextResponseError,
  ElementNotFoundError,
  InvalidHandleError,
  ObservationConflictError,
  delay,
  silentLogger,
} from "../../shared";
import { MutationChannel } from "../index";
import { JsdomDocument, flushMicrotasks } from "../../browser/tests/jsdom-document";

const PAGE = `<!doctype html><html><body>
  <div id="response" class="chat-response" data-testid="answer"><span>…</span></div>
  <div id="other"></div>
</body></html>`;

/** Runs every call against the real document, but only after `lateMs`. */
class LateDocument implements ScriptExecutor {
  lateMs = 0;

  constructor(private readonly inner: JsdomDocument) {}

  async executeInContext(script: string, args: readonly Serializable[]): Promise<unknown> {
    await delay(this.lateMs);
    return this.inner.executeInContext(script, args);
  }
}

function probeCount(doc: JsdomDocument): unknown {
  return doc.dom.window.eval("Object.keys(window.__streamProbeChannel.probes).length");
}

describe("MutationChannel", () => {
  let doc: JsdomDocument | undefined;

  afterEach(() => {
    doc?.close();
    doc = undefined;
  });

  function setup(): { doc: JsdomDocument; channel: MutationChannel } {
    const created = new JsdomDocument(PAGE);
    doc = created;
    return { doc: created, channel: new MutationChannel(created, { logger: silentLogger }) };
  }

  it("starts with an empty snapshot", async () => {
    const { channel } = setup();
    const handle = await channel.arm(By.id("response"));

    const snapshot = await channel.retrieve(handle);

    expect(snapshot.state).toBe("armed");
    expect(snapshot.mutationCount).toBe(0);
    expect(snapshot.firstMutationTime).toBeNull();
    expect(snapshot.lastMutationTime).toBeNull();
    expect(snapshot.startTime).toBe(handle.startTime);
    expect(snapshot.capturedAt).toBeGreaterThanOrEqual(snapshot.startTime);
  });

  it("records one timestamp per content mutation", async () => {
    const { doc, channel } = setup();
    const handle = await channel.arm(By.css(".chat-response"));
    const target = doc.element("response");

    target.textContent = "Hel";
    await flushMicrotasks();
    target.textContent = "Hello";
    await flushMicrotasks();
    target.appendChild(doc.document.createTextNode(" there"));
    await flushMicrotasks();

    const snapshot = await channel.retrieve(handle);

    expect(snapshot.state).toBe("accumulating");
    expect(snapshot.mutationCount).toBe(3);
    expect(snapshot.firstMutationTime).not.toBeNull();
    expect(snapshot.startTime).toBeLessThanOrEqual(snapshot.firstMutationTime ?? -1);
    expect(snapshot.firstMutationTime ?? Infinity).toBeLessThanOrEqual(snapshot.lastMutationTime ?? -1);
  });

  it("counts mutations still queued when the snapshot is taken", async () => {
    const { doc, channel } = setup();
    const handle = await channel.arm(By.testId("answer"));

    doc.element("response").textContent = "queued";
    const snapshot = await channel.retrieve(handle);

    expect(snapshot.mutationCount).toBe(1);
  });

  it("watches character data in descendants", async () => {
    const { doc, channel } = setup();
    const handle = await channel.arm(By.xpath("//div[@id='response']"));
    const span = doc.element("response").querySelector("span");
    const textNode = span?.firstChild;
    if (!textNode) throw new Error("fixture span has no text");

    textNode.nodeValue = "streamed";
    await flushMicrotasks();

    expect((await channel.retrieve(handle)).mutationCount).toBe(1);
  });

  it("ignores mutations outside the observed subtree", async () => {
    const { doc, channel } = setup();
    const handle = await channel.arm(By.id("response"));

    doc.element("other").textContent = "noise";
    await flushMicrotasks();

    expect((await channel.retrieve(handle)).mutationCount).toBe(0);
  });

  it("reading a snapshot does not re-arm or reset the probe", async () => {
    const { doc, channel } = setup();
    const handle = await channel.arm(By.id("response"));
    doc.element("response").textContent = "one";
    await flushMicrotasks();

    const first = await channel.retrieve(handle);
    const second = await channel.retrieve(handle);

    expect(second.startTime).toBe(first.startTime);
    expect(second.mutationCount).toBe(1);
  });

  it("fails with ElementNotFoundError when the locator resolves to nothing", async () => {
    const { channel } = setup();

    await expect(channel.arm(By.id("missing"))).rejects.toBeInstanceOf(ElementNotFoundError);
    expect(channel.liveCount).toBe(0);
  });

  it("refuses a second live observation on the same element", async () => {
    const { channel } = setup();
    await channel.arm(By.id("response"));

    await expect(channel.arm(By.css("#response"))).rejects.toBeInstanceOf(ObservationConflictError);
  });

  it("allows re-arming an element after it was disarmed", async () => {
    const { channel } = setup();
    const first = await channel.arm(By.id("response"));
    await channel.disarm(first);

    const second = await channel.arm(By.id("response"));

    expect(second.id).not.toBe(first.id);
    expect(channel.liveCount).toBe(1);
  });

  it("stops recording once disarmed and rejects the disposed handle", async () => {
    const { doc, channel } = setup();
    const handle = await channel.arm(By.id("response"));

    await channel.disarm(handle);
    doc.element("response").textContent = "late";
    await flushMicrotasks();

    await expect(channel.retrieve(handle)).rejects.toBeInstanceOf(InvalidHandleError);
    expect(doc.dom.window.eval("Object.keys(window.__streamProbeChannel.probes).length")).toBe(0);
  });

  it("treats repeated disarm as a no-op", async () => {
    const { doc, channel } = setup();
    const handle = await channel.arm(By.id("response"));

    await channel.disarm(handle);
    const callsAfterFirst = doc.scripts.length;
    await channel.disarm(handle);

    expect(doc.scripts.length).toBe(callsAfterFirst);
  });

  it("rejects handles issued by another channel", async () => {
    const { doc, channel } = setup();
    const other = new MutationChannel(doc, { logger: silentLogger });
    const foreign = await other.arm(By.id("response"));

    await expect(channel.retrieve(foreign)).rejects.toBeInstanceOf(InvalidHandleError);
  });

  it("reports a handle whose document state vanished as invalid", async () => {
    const { doc, channel } = setup();
    const handle = await channel.arm(By.id("response"));

    doc.dom.window.eval("delete window.__streamProbeChannel");

    await expect(channel.retrieve(handle)).rejects.toBeInstanceOf(InvalidHandleError);
    await expect(channel.retrieve(handle)).rejects.toThrow(/never armed|disarmed/);
  });

  it("rejects malformed responses from the document", async () => {
    const document: ScriptExecutor = {
      executeInContext: vi.fn(async () => ({ status: "armed", startTime: "soon" })),
    };
    const channel = new MutationChannel(document, { logger: silentLogger });

    await expect(channel.arm(By.id("response"))).rejects.toBeInstanceOf(ContextResponseError);
  });

  it("rejects snapshots that break the count/time invariant", async () => {
    const executeInContext = vi.fn(async (_script: string, args: readonly unknown[]) => {
      if (args[0] === "arm") return { status: "armed", startTime: 10 };
      return {
        status: "ok",
        snapshot: {
          state: "accumulating",
          startTime: 10,
          firstMutationTime: null,
          lastMutationTime: null,
          mutationCount: 3,
          capturedAt: 20,
        },
      };
    });
    const channel = new MutationChannel({ executeInContext }, { logger: silentLogger });
    const handle = await channel.arm(By.id("response"));

    await expect(channel.retrieve(handle)).rejects.toBeInstanceOf(ContextResponseError);
  });

  it("bounds each call into the document", async () => {
    const document: ScriptExecutor = {
      executeInContext: () => new Promise(() => {}),
    };
    const channel = new MutationChannel(document, { logger: silentLogger, boundaryTimeoutMs: 20 });

    await expect(channel.arm(By.id("response"))).rejects.toThrow(/did not answer "arm" within 20ms/);
  });

  it("releases a probe that the document armed after the controller gave up", async () => {
    const { doc } = setup();
    const late = new LateDocument(doc);
    late.lateMs = 60;
    const logger = { log: vi.fn(), warn: vi.fn() };
    const channel = new MutationChannel(late, { logger, boundaryTimeoutMs: 20 });

    await expect(channel.arm(By.id("response"))).rejects.toThrow('Document did not answer "arm" within 20ms');
    await delay(150);

    expect(logger.warn).toHaveBeenCalledWith(
      expect.stringMatching(/^\[MutationChannel\] Could not release probe-\S+ after a failed arm: Document did not answer "disarm" within 20ms$/)
    );
    expect(probeCount(doc)).toBe(0);
    const fresh = new MutationChannel(doc, { logger: silentLogger });
    await expect(fresh.arm(By.id("response"))).resolves.toMatchObject({ locator: By.id("response") });
  });

  it("keeps a handle live until the document confirms the disarm", async () => {
    const { doc } = setup();
    const late = new LateDocument(doc);
    const channel = new MutationChannel(late, { logger: silentLogger, boundaryTimeoutMs: 20 });
    const handle = await channel.arm(By.id("response"));

    late.lateMs = 60;
    await expect(channel.disarm(handle)).rejects.toBeInstanceOf(ContextResponseError);
    expect(channel.liveCount).toBe(1);

    late.lateMs = 0;
    await channel.disarm(handle);

    expect(channel.liveCount).toBe(0);
    await delay(100);
    expect(probeCount(doc)).toBe(0);
    await expect(channel.arm(By.id("response"))).resolves.toBeDefined();
  });

  it("rejects snapshots whose mutation times precede the arm time", async () => {
    const executeInContext = vi.fn(async (_script: string, args: readonly unknown[]) => {
      if (args[0] === "arm") return { status: "armed", startTime: 10 };
      return {
        status: "ok",
        snapshot: {
          state: "accumulating",
          startTime: 10,
          firstMutationTime: 5,
          lastMutationTime: 12,
          mutationCount: 2,
          capturedAt: 20,
        },
      };
    });
    const channel = new MutationChannel({ executeInContext }, { logger: silentLogger });
    const handle = await channel.arm(By.id("response"));

    await expect(channel.retrieve(handle)).rejects.toThrow(/startTime <= firstMutationTime <= lastMutationTime/);
  });

  it("rejects snapshots whose first mutation is after the last", async () => {
    const executeInContext = vi.fn(async (_script: string, args: readonly unknown[]) => {
      if (args[0] === "arm") return { status: "armed", startTime: 10 };
      return {
        status: "ok",
        snapshot: {
          state: "accumulating",
          startTime: 10,
          firstMutationTime: 30,
          lastMutationTime: 15,
          mutationCount: 2,
          capturedAt: 40,
        },
      };
    });
    const channel = new MutationChannel({ executeInContext }, { logger: silentLogger });
    const handle = await channel.arm(By.id("response"));

    await expect(channel.retrieve(handle)).rejects.toBeInstanceOf(ContextResponseError);
  });

  it("validates locators before crossing the boundary", async () => {
    const executeInContext = vi.fn(async () => null);
    const channel = new MutationChannel({ executeInContext }, { logger: silentLogger });

    await expect(channel.arm(By.css(""))).rejects.toThrow(/locator value must not be empty/);
    expect(executeInContext).not.toHaveBeenCalled();
  });
});
