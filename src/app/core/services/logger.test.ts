import { afterEach, describe, expect, it } from "vitest";
import { consoleStore, visibleEntries, type LogEntry } from "../store/consoleStore";
import { addLogSink, logDebug, logWarn, warnSink } from "./logger";

afterEach(() => {
  consoleStore.getState().clear();
  consoleStore.setState({ maxEntries: 400 });
});

describe("logger", () => {
  it("delivers entries to added sinks until they unsubscribe", () => {
    const received: LogEntry[] = [];
    const remove = addLogSink((entry) => received.push(entry));

    logWarn("mesh missing", { scope: "urdf", data: { file: "a.stl" } });
    remove();
    logWarn("after removal");

    expect(received).toHaveLength(1);
    expect(received[0]).toMatchObject({ level: "warn", message: "mesh missing", scope: "urdf", data: { file: "a.stl" } });
  });

  it("feeds the console store", () => {
    warnSink("annotations")("no match");
    const [entry] = consoleStore.getState().entries;
    expect(entry).toMatchObject({ level: "warn", message: "no match", scope: "annotations" });
  });
});

describe("consoleStore", () => {
  it("drops the oldest entries beyond the limit", () => {
    consoleStore.setState({ maxEntries: 2 });
    logWarn("one");
    logWarn("two");
    logWarn("three");
    expect(consoleStore.getState().entries.map((entry) => entry.message)).toEqual(["two", "three"]);
  });

  it("hides debug entries until the level is toggled on", () => {
    logDebug("detail");
    logWarn("visible");
    expect(visibleEntries(consoleStore.getState()).map((entry) => entry.message)).toEqual(["visible"]);

    consoleStore.getState().toggleLevel("debug");
    expect(visibleEntries(consoleStore.getState()).map((entry) => entry.message)).toEqual(["detail", "visible"]);
    consoleStore.getState().toggleLevel("debug");
  });
});
