import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, vi } from "vitest";
import { createConsoleRecognizer } from "../../recognizer/console.js";
import type { PhraseListener, PhraseRecognizer } from "../../recognizer/types.js";
import { createCoercionRegistry } from "../coercion.js";
import { CoercionError, ConfigError, ResourceUnavailableError } from "../errors.js";
import { createHandlerRegistry, defineHandler } from "../handlers.js";
import { createGrammarSession, type SessionDeps } from "../session.js";
import { loadVocabulary } from "../vocabulary.js";
import { MOVE_CONFIG, meaning, moveVocabulary, phrase, silent } from "./helpers.js";

function harness(overrides: Partial<SessionDeps> = {}) {
  const recognizer = createConsoleRecognizer();
  const createRecognizer = vi.fn(() => recognizer);
  const move = vi.fn();
  const halt = vi.fn();
  const onError = vi.fn();
  const onOutcome = vi.fn();
  const sessionError = vi.fn();
  const deps: SessionDeps = {
    vocabulary: moveVocabulary(),
    coercion: createCoercionRegistry(),
    handlers: createHandlerRegistry([
      defineHandler("mover").on(["string", "float"], move),
      defineHandler("halt").on([], halt),
      defineHandler("go").on([], () => undefined),
      defineHandler("tagger").on([], () => undefined),
    ]),
    createRecognizer,
    sessionLog: silent,
    sessionWarn: silent,
    sessionError,
    onError,
    onOutcome,
    ...overrides,
  };
  return { recognizer, createRecognizer, move, halt, onError, onOutcome, sessionError, deps };
}

function recordingRecognizer() {
  const listeners = new Set<PhraseListener>();
  const unsubscribe = vi.fn();
  const dispose = vi.fn();
  let running = false;
  const recognizer: PhraseRecognizer = {
    get isRunning() {
      return running;
    },
    start: () => {
      running = true;
    },
    stop: () => {
      running = false;
    },
    onPhrase: (listener) => {
      listeners.add(listener);
      return () => {
        unsubscribe();
        listeners.delete(listener);
      };
    },
    dispose,
  };
  return { recognizer, listeners, unsubscribe, dispose };
}

describe("GrammarSession lifecycle", () => {
  it("starts listening on activation when the vocabulary auto-starts", () => {
    const { deps } = harness();
    const session = createGrammarSession(deps);

    expect(session.status).toBe("inactive");
    expect(session.activate()).toBe(true);
    expect(session.isRunning).toBe(true);
    expect(session.status).toBe("listening");
  });

  it("waits for start() under manual start", () => {
    const { deps } = harness();
    const session = createGrammarSession(deps);

    session.activate({ startBehavior: "manual" });
    expect(session.isRunning).toBe(false);
    expect(session.status).toBe("stopped");

    session.start();
    session.start();
    expect(session.isRunning).toBe(true);

    session.stop();
    session.stop();
    expect(session.isRunning).toBe(false);
  });

  it("treats start and stop before activation as no-ops", () => {
    const { deps, createRecognizer } = harness();
    const session = createGrammarSession(deps);
    session.start();
    session.stop();
    expect(session.isRunning).toBe(false);
    expect(createRecognizer).not.toHaveBeenCalled();
  });

  it("surfaces configuration errors from activate without starting", () => {
    const { deps, createRecognizer } = harness({
      handlers: createHandlerRegistry([defineHandler("halt").on([], () => undefined)]),
    });
    const session = createGrammarSession(deps);

    expect(() => session.activate()).toThrow(ConfigError);
    expect(createRecognizer).not.toHaveBeenCalled();
    expect(session.isRunning).toBe(false);
  });

  it("does not start when the grammar file is missing", () => {
    const { deps, createRecognizer, onError } = harness({
      vocabulary: loadVocabulary({ ...MOVE_CONFIG, grammarPath: "missing.grxml" }),
      grammarRoot: os.tmpdir(),
    });
    const session = createGrammarSession(deps);

    expect(session.activate()).toBe(false);
    expect(createRecognizer).not.toHaveBeenCalled();
    expect(onError).toHaveBeenCalledWith(expect.any(ResourceUnavailableError));
    expect(session.status).toBe("inactive");
  });

  it("hands the resolved grammar file to the recognizer factory", () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), "grammar-"));
    fs.writeFileSync(path.join(root, "commands.grxml"), "<grammar/>");
    const { deps, createRecognizer } = harness({
      vocabulary: loadVocabulary({ ...MOVE_CONFIG, grammarPath: "commands.grxml" }),
      grammarRoot: root,
    });

    expect(createGrammarSession(deps).activate()).toBe(true);
    expect(createRecognizer).toHaveBeenCalledWith(path.join(root, "commands.grxml"));
  });

  it("tears down safely whether or not it was started", () => {
    const never = createGrammarSession(harness().deps);
    expect(() => never.teardown()).not.toThrow();
    expect(never.status).toBe("torn-down");

    const { deps, recognizer, move } = harness();
    const session = createGrammarSession(deps);
    session.activate();
    session.teardown();
    session.teardown();

    expect(session.isRunning).toBe(false);
    expect(recognizer.feed("action=move direction=left distance=1")).toBe(false);
    expect(move).not.toHaveBeenCalled();
    expect(session.activate()).toBe(false);
  });

  it("removes its phrase listener on teardown", () => {
    const fake = recordingRecognizer();
    const { deps } = harness({ createRecognizer: () => fake.recognizer });
    const session = createGrammarSession(deps);
    session.activate();
    expect(fake.listeners.size).toBe(1);

    session.teardown();
    session.teardown();

    expect(fake.unsubscribe).toHaveBeenCalledTimes(1);
    expect(fake.dispose).toHaveBeenCalledTimes(1);
    expect(fake.listeners.size).toBe(0);
    expect(session.isRunning).toBe(false);
  });
});

describe("GrammarSession phrase handling", () => {
  it("dispatches recognized phrases from the recognizer", () => {
    const { deps, recognizer, move, onOutcome } = harness();
    createGrammarSession(deps).activate();

    recognizer.feed("action=move direction=left distance=2.5");

    expect(move).toHaveBeenCalledWith("left", 2.5);
    expect(onOutcome).toHaveBeenCalledWith({
      kind: "dispatched",
      report: { action: "move", outcomes: [{ handler: "mover", status: "invoked" }] },
    });
  });

  it("ignores phrases while stopped", () => {
    const { deps, recognizer, halt } = harness();
    const session = createGrammarSession(deps);
    session.activate({ startBehavior: "manual" });

    expect(recognizer.feed("action=stop")).toBe(false);
    expect(halt).not.toHaveBeenCalled();
  });

  it("dispatches only the first primary action in an event", () => {
    const { deps, halt } = harness();
    const go = vi.fn();
    const session = createGrammarSession({
      ...deps,
      handlers: createHandlerRegistry([
        defineHandler("mover"),
        defineHandler("halt").on([], halt),
        defineHandler("go").on([], go),
        defineHandler("tagger"),
      ]),
    });

    session.handlePhrase(phrase(meaning("action", "stop"), meaning("action", "go")));

    expect(halt).toHaveBeenCalledTimes(1);
    expect(go).not.toHaveBeenCalled();
  });

  it("returns no-action outcomes without reporting errors", () => {
    const { deps, onError } = harness();
    const session = createGrammarSession(deps);

    expect(session.handlePhrase(phrase(meaning("direction", "left")))).toEqual({
      kind: "no-action",
      reason: "no-primary-key",
    });
    expect(session.handlePhrase(phrase(meaning("action", "fly")))).toEqual({
      kind: "no-action",
      reason: "unknown-action",
      triggerKeyword: "fly",
    });
    expect(onError).not.toHaveBeenCalled();
  });

  it("aborts the event on a coercion failure and keeps handling later events", () => {
    const { deps, recognizer, move, onError, onOutcome } = harness();
    createGrammarSession(deps).activate();

    recognizer.feed("action=move direction=left distance=far");
    expect(move).not.toHaveBeenCalled();
    expect(onError).toHaveBeenCalledWith(expect.any(CoercionError));
    expect(onOutcome).toHaveBeenLastCalledWith({
      kind: "coercion-failed",
      action: "move",
      key: "distance",
      message: 'Cannot read "far" as float for "distance": not a number',
    });

    recognizer.feed("action=move direction=right distance=1");
    expect(move).toHaveBeenCalledWith("right", 1);
  });

  it("logs handler failures at the recognizer boundary and keeps listening", () => {
    const { deps, recognizer, sessionError, move } = harness();
    const session = createGrammarSession({
      ...deps,
      handlers: createHandlerRegistry([
        defineHandler("mover").on(["string", "float"], move),
        defineHandler("halt").on([], () => {
          throw new Error("motor jammed");
        }),
        defineHandler("go"),
        defineHandler("tagger"),
      ]),
    });
    session.activate();

    expect(() => session.handlePhrase(phrase(meaning("action", "stop")))).toThrow("motor jammed");

    recognizer.feed("action=stop");
    expect(sessionError).toHaveBeenCalledWith("[session] Handler failed: motor jammed");

    recognizer.feed("action=move direction=up distance=3");
    expect(move).toHaveBeenCalledWith("up", 3);
    expect(session.isRunning).toBe(true);
  });

  it("keeps no state between events", () => {
    const { deps, move } = harness();
    const session = createGrammarSession(deps);

    session.handlePhrase(phrase(meaning("action", "move"), meaning("direction", "left"), meaning("distance", "1")));
    const second = session.handlePhrase(phrase(meaning("action", "move"), meaning("direction", "down")));

    expect(move).toHaveBeenCalledTimes(1);
    expect(second).toEqual({
      kind: "dispatched",
      report: { action: "move", outcomes: [{ handler: "mover", status: "no-receiver" }] },
    });
  });
});

describe("GrammarSession key bindings", () => {
  it("fires the bound action with no arguments", () => {
    const { deps, halt } = harness();
    const session = createGrammarSession(deps);

    expect(session.pressKey("s")).toEqual({
      action: "stop",
      outcomes: [{ handler: "halt", status: "invoked" }],
    });
    expect(halt).toHaveBeenCalledWith();
    expect(session.pressKey("q")).toBeUndefined();
  });

  it("reports handlers without a nullary overload as having no receiver", () => {
    const { deps, move } = harness();
    const session = createGrammarSession(deps);

    expect(session.pressKey("m")).toEqual({
      action: "move",
      outcomes: [{ handler: "mover", status: "no-receiver" }],
    });
    expect(move).not.toHaveBeenCalled();
  });
});
