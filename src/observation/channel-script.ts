// ============================================================================
// CHANNEL SCRIPT — document-side half of the mutation channel
// ============================================================================

/**
 * Runs inside the rendered document as `(script)(op, payload)`.
 *
 * Installs a single registry on `window.__streamProbeChannel` the first time it
 * runs. Each probe owns one MutationObserver and moves through
 * `armed -> accumulating -> disarmed`. Timestamps come from the document's own
 * `performance.now()`. Only plain data is returned.
 *
 * Kept to ES2017 syntax with no external references: it is shipped as source text.
 */
export const CHANNEL_SCRIPT = String.raw`
function (op, payload) {
  var channel = window.__streamProbeChannel;
  if (!channel) {
    channel = { probes: {}, watched: new WeakSet() };
    window.__streamProbeChannel = channel;
  }

  function locate(locator) {
    var doc = window.document;
    var value = locator.value;
    switch (locator.strategy) {
      case "css":
      case "tagName":
        return doc.querySelector(value);
      case "id":
        return doc.getElementById(value);
      case "name":
        return doc.getElementsByName(value)[0] || null;
      case "className":
        return doc.getElementsByClassName(value)[0] || null;
      case "testId":
        return doc.querySelector('[data-testid="' + value.replace(/(["\\])/g, "\\$1") + '"]');
      case "xpath":
        return doc.evaluate(value, doc, null, 9, null).singleNodeValue;
      default:
        return null;
    }
  }

  function record(probe, records) {
    if (probe.state === "disarmed" || records.length === 0) return;
    var at = performance.now();
    for (var i = 0; i < records.length; i++) probe.timestamps.push(at);
    probe.state = "accumulating";
  }

  function summarize(probe) {
    var first = null;
    var last = null;
    for (var i = 0; i < probe.timestamps.length; i++) {
      var t = probe.timestamps[i];
      if (first === null || t < first) first = t;
      if (last === null || t > last) last = t;
    }
    return {
      state: probe.state,
      startTime: probe.startTime,
      firstMutationTime: first,
      lastMutationTime: last,
      mutationCount: probe.timestamps.length,
      capturedAt: performance.now()
    };
  }

  var probe = channel.probes[payload.key];

  if (op === "arm") {
    if (probe) return { status: "armed", startTime: probe.startTime };
    var target = locate(payload.locator);
    if (!target) return { status: "not-found" };
    if (channel.watched.has(target)) return { status: "conflict" };

    var created = { state: "armed", startTime: performance.now(), timestamps: [], target: target, observer: null };
    created.observer = new MutationObserver(function (records) { record(created, records); });
    created.observer.observe(target, { childList: true, characterData: true, subtree: true });
    channel.watched.add(target);
    channel.probes[payload.key] = created;
    return { status: "armed", startTime: created.startTime };
  }

  if (op === "retrieve") {
    if (!probe) return { status: "missing" };
    record(probe, probe.observer.takeRecords());
    return { status: "ok", snapshot: summarize(probe) };
  }

  if (op === "disarm") {
    if (!probe) return { status: "missing" };
    probe.observer.disconnect();
    probe.state = "disarmed";
    channel.watched.delete(probe.target);
    delete channel.probes[payload.key];
    return { status: "disarmed" };
  }

  return { status: "unknown-op", op: String(op) };
}
`;
