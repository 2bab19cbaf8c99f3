/**
 * Reconciliation Engine Tests
 *
 * Runs the engine against the real ExternalEditor with a scripted launcher,
 * so buffer creation and release happen on disk.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import pino from "pino";

import { ReconciliationEngine } from "../impl/ReconciliationEngine.js";
import { ledgerKind, singleRecordKind, taxonomyTreeKind } from "../content-kinds.js";
import type { ContentKind, ReconcileOutcome } from "../interfaces/IReconciliation.js";
import { ExternalEditor, type EditorLauncher } from "../../editor/index.js";
import { EditFailureError, ErrorCode } from "../../errors.js";
import { FakeRemoteStore, ScriptedPrompter, pathExists, scriptedLauncher } from "../../__tests__/fakes.js";
import type { RemoteResource } from "../../../types/index.js";

const silent = pino({ level: "silent" });

function errorCode(error: Error): ErrorCode | undefined {
  return error instanceof EditFailureError ? error.code : undefined;
}

describe("ReconciliationEngine", () => {
  let tmpRoot: string;
  let store: FakeRemoteStore;

  beforeEach(async () => {
    tmpRoot = await fs.mkdtemp(path.join(os.tmpdir(), "reconcile-test-"));
    store = new FakeRemoteStore();
  });

  afterEach(async () => {
    await fs.rm(tmpRoot, { recursive: true, force: true });
  });

  async function run<T>(
    resource: RemoteResource,
    kind: ContentKind<T>,
    launcher: EditorLauncher,
    prompter: ScriptedPrompter = new ScriptedPrompter()
  ): Promise<ReconcileOutcome> {
    const surface = new ExternalEditor({ command: "test-editor", launcher, tmpRoot, logger: silent });
    const engine = new ReconciliationEngine({ surface, prompter, logger: silent });
    return engine.reconcile({
      fetch: () => store.fetch(resource, resource === "records" ? { type: "task" } : undefined),
      replace: (payload) => store.replace(resource, payload),
      kind,
    });
  }

  async function buffersLeft(): Promise<string[]> {
    return fs.readdir(tmpRoot);
  }

  describe("single record", () => {
    beforeEach(() => {
      store.resources.records = { status: 200, body: "buy milk\n\n" };
    });

    it("returns no-change and issues no replace when the buffer is left untouched", async () => {
      const launcher = scriptedLauncher((current) => current);

      const outcome = await run("records", singleRecordKind("task"), launcher);

      expect(outcome).toEqual({ type: "no-change" });
      expect(store.callsTo("replace")).toHaveLength(0);
      expect(launcher.paths).toHaveLength(1);
      expect(await pathExists(launcher.paths[0] ?? "")).toBe(false);
      expect(await buffersLeft()).toEqual([]);
    });

    it("seeds the buffer with the body minus trailing whitespace", async () => {
      let seen = "";
      const launcher = scriptedLauncher((current) => {
        seen = current;
        return current;
      });

      await run("records", singleRecordKind("task"), launcher);

      expect(seen).toBe("buy milk");
    });

    it("treats trailing whitespace added in the editor as no change", async () => {
      const launcher = scriptedLauncher((current) => `${current}\n\n   \n`);

      const outcome = await run("records", singleRecordKind("task"), launcher);

      expect(outcome).toEqual({ type: "no-change" });
      expect(store.callsTo("replace")).toHaveLength(0);
    });

    it("pushes {type, content} after confirmation", async () => {
      const prompter = new ScriptedPrompter([], [true]);
      const launcher = scriptedLauncher((current) => `${current}\nbuy eggs`);

      const outcome = await run("records", singleRecordKind("task"), launcher, prompter);

      expect(outcome).toEqual({ type: "pushed", status: 200, body: "ok" });
      expect(store.callsTo("replace")).toEqual([
        {
          method: "replace",
          resource: "records",
          payload: { type: "task", content: "buy milk\nbuy eggs" },
        },
      ]);
      expect(prompter.confirmations).toHaveLength(1);
      expect(await buffersLeft()).toEqual([]);
    });

    it("discards the change when the user declines", async () => {
      const prompter = new ScriptedPrompter([], [false]);
      const launcher = scriptedLauncher(() => "something else");

      const outcome = await run("records", singleRecordKind("task"), launcher, prompter);

      expect(outcome).toEqual({ type: "discarded", reason: "declined" });
      expect(store.callsTo("replace")).toHaveLength(0);
      expect(await buffersLeft()).toEqual([]);
    });

    it("discards an emptied buffer without asking", async () => {
      const prompter = new ScriptedPrompter();
      const launcher = scriptedLauncher(() => "\n");

      const outcome = await run("records", singleRecordKind("task"), launcher, prompter);

      expect(outcome).toEqual({ type: "discarded", reason: "empty" });
      expect(prompter.confirmations).toHaveLength(0);
      expect(store.callsTo("replace")).toHaveLength(0);
    });

    it("reports a rejected push as push-failed with the server's answer", async () => {
      store.replaceResponse = { status: 500, body: "database locked" };
      const launcher = scriptedLauncher(() => "changed");

      const outcome = await run("records", singleRecordKind("task"), launcher, new ScriptedPrompter([], [true]));

      expect(outcome).toEqual({ type: "push-failed", status: 500, body: "database locked" });
      expect(await buffersLeft()).toEqual([]);
    });

    it("reports a replace call that never got an answer as push-failed with status 0", async () => {
      store.replace = async () => {
        throw new Error("socket hang up");
      };
      const launcher = scriptedLauncher(() => "changed");

      const outcome = await run("records", singleRecordKind("task"), launcher, new ScriptedPrompter([], [true]));

      expect(outcome).toEqual({ type: "push-failed", status: 0, body: "socket hang up" });
    });
  });

  describe("fetch failures", () => {
    it("reports a 404 verbatim and never creates a buffer", async () => {
      store.resources.records = { status: 404, body: "no task yet" };
      const launcher = scriptedLauncher((current) => current);

      const outcome = await run("records", singleRecordKind("task"), launcher);

      expect(outcome).toEqual({ type: "fetch-failed", status: 404, body: "no task yet" });
      expect(launcher.paths).toHaveLength(0);
      expect(await buffersLeft()).toEqual([]);
    });

    it("reports an unreachable server as fetch-failed with status 0", async () => {
      store.fetch = async () => {
        throw new Error("connect ECONNREFUSED");
      };
      const launcher = scriptedLauncher((current) => current);

      const outcome = await run("records", singleRecordKind("task"), launcher);

      expect(outcome).toEqual({ type: "fetch-failed", status: 0, body: "connect ECONNREFUSED" });
      expect(launcher.paths).toHaveLength(0);
    });
  });

  describe("edit failures", () => {
    beforeEach(() => {
      store.resources.records = { status: 200, body: "buy milk" };
    });

    it("reports a launch failure and still removes the buffer", async () => {
      const paths: string[] = [];
      const launcher: EditorLauncher = async (_command, filePath) => {
        paths.push(filePath);
        throw new Error("spawn test-editor ENOENT");
      };

      const outcome = await run("records", singleRecordKind("task"), launcher);

      expect(outcome.type).toBe("edit-failed");
      if (outcome.type !== "edit-failed") return;
      expect(outcome.error).toBeInstanceOf(EditFailureError);
      expect(errorCode(outcome.error)).toBe(ErrorCode.EDIT_LAUNCH_FAILED);
      expect(paths).toHaveLength(1);
      expect(await pathExists(paths[0] ?? "")).toBe(false);
      expect(await buffersLeft()).toEqual([]);
    });

    it("reports a non-zero editor exit as an edit failure", async () => {
      const launcher: EditorLauncher = async () => 1;

      const outcome = await run("records", singleRecordKind("task"), launcher);

      expect(outcome.type).toBe("edit-failed");
      if (outcome.type !== "edit-failed") return;
      expect(outcome.error.message).toBe('Editor "test-editor" exited with status 1');
      expect(await buffersLeft()).toEqual([]);
    });

    it("reports a buffer that vanished before read-back", async () => {
      const launcher: EditorLauncher = async (_command, filePath) => {
        await fs.rm(filePath);
        return 0;
      };

      const outcome = await run("records", singleRecordKind("task"), launcher);

      expect(outcome.type).toBe("edit-failed");
      if (outcome.type !== "edit-failed") return;
      expect(errorCode(outcome.error)).toBe(ErrorCode.EDIT_BUFFER_FAILED);
      expect(await buffersLeft()).toEqual([]);
    });
  });

  describe("ledger", () => {
    const csv = "date,name,amount\n2024-03-01,Rent,950.00";

    beforeEach(() => {
      store.resources.transactions = { status: 200, body: `${csv}\n` };
    });

    it("returns no-change for an untouched ledger", async () => {
      const outcome = await run("transactions", ledgerKind, scriptedLauncher((current) => current));

      expect(outcome).toEqual({ type: "no-change" });
      expect(store.writeCount).toBe(0);
    });

    it("pushes the edited ledger as {content}", async () => {
      const launcher = scriptedLauncher((current) => `${current}\n2024-03-02,Coffee,3.50`);

      const outcome = await run("transactions", ledgerKind, launcher, new ScriptedPrompter([], [true]));

      expect(outcome).toEqual({ type: "pushed", status: 200, body: "ok" });
      expect(store.callsTo("replace")).toEqual([
        {
          method: "replace",
          resource: "transactions",
          payload: { content: `${csv}\n2024-03-02,Coffee,3.50` },
        },
      ]);
      expect(launcher.paths[0]?.endsWith(".csv")).toBe(true);
    });
  });

  describe("taxonomy tree", () => {
    beforeEach(() => {
      store.resources.categories = {
        status: 200,
        body: JSON.stringify({ categories: { Food: ["Groceries", "Dining"], Home: [] } }),
      };
    });

    it("presents the tree pretty-printed", async () => {
      let seen = "";
      await run(
        "categories",
        taxonomyTreeKind,
        scriptedLauncher((current) => {
          seen = current;
          return current;
        })
      );

      expect(seen).toBe('{\n  "Food": [\n    "Groceries",\n    "Dining"\n  ],\n  "Home": []\n}');
    });

    it("returns no-change when the tree is left alone", async () => {
      const outcome = await run("categories", taxonomyTreeKind, scriptedLauncher((current) => current));

      expect(outcome).toEqual({ type: "no-change" });
      expect(store.writeCount).toBe(0);
    });

    it("pushes the re-serialized tree with its order preserved", async () => {
      const launcher = scriptedLauncher(() =>
        JSON.stringify({ Home: ["Rent"], Food: ["Dining", "Groceries"] }, null, 2)
      );

      const outcome = await run("categories", taxonomyTreeKind, launcher, new ScriptedPrompter([], [true]));

      expect(outcome).toEqual({ type: "pushed", status: 200, body: "ok" });
      expect(store.callsTo("replace")).toEqual([
        {
          method: "replace",
          resource: "categories",
          payload: { content: '{"Home":["Rent"],"Food":["Dining","Groceries"]}' },
        },
      ]);
    });

    it("rejects an edited tree that is not JSON before asking to push", async () => {
      const prompter = new ScriptedPrompter();

      const outcome = await run("categories", taxonomyTreeKind, scriptedLauncher(() => "{ Food: "), prompter);

      expect(outcome.type).toBe("edit-failed");
      if (outcome.type !== "edit-failed") return;
      expect(errorCode(outcome.error)).toBe(ErrorCode.EDIT_INVALID_CONTENT);
      expect(prompter.confirmations).toHaveLength(0);
      expect(store.writeCount).toBe(0);
      expect(await buffersLeft()).toEqual([]);
    });

    it("reports a malformed listing as an edit failure without opening the editor", async () => {
      store.resources.categories = { status: 200, body: "<html>oops</html>" };
      const launcher = scriptedLauncher((current) => current);

      const outcome = await run("categories", taxonomyTreeKind, launcher);

      expect(outcome.type).toBe("edit-failed");
      expect(launcher.paths).toHaveLength(0);
    });
  });
});
