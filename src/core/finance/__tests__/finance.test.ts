/**
 * Financial entry model and ExpenseService tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ExpenseService, parsePaymentMethod } from "../ExpenseService.js";
import { parseAmount, toIsoDate, toPayload, validateEntry } from "../models/financial-entry.js";
import { ReconciliationEngine } from "../../reconciliation/index.js";
import { ErrorCode } from "../../errors.js";
import { FakeRemoteStore, ScriptedPrompter, ScriptedSurface } from "../../__tests__/fakes.js";
import type { TaxonomySnapshot } from "../../../types/index.js";

const food: TaxonomySnapshot = [{ name: "Food", subcategories: ["Groceries", "Dining"] }];

describe("financial entry model", () => {
  it("parses amounts with up to two decimals", () => {
    expect(parseAmount("12")).toBe(12);
    expect(parseAmount(" 12.50 ")).toBe(12.5);
    expect(parseAmount("0.01")).toBe(0.01);
  });

  it("rejects other amounts", () => {
    for (const text of ["0", "0.00", "-3", "1.234", "abc", "", "1e3", "1,50"]) {
      expect(parseAmount(text)).toBeNull();
    }
  });

  it("formats local dates", () => {
    expect(toIsoDate(new Date(2024, 0, 5))).toBe("2024-01-05");
  });

  it("parses payment methods by number or name", () => {
    expect(parsePaymentMethod("1")).toBe("credit");
    expect(parsePaymentMethod("Debit")).toBe("debit");
    expect(parsePaymentMethod("cash")).toBeNull();
  });

  const entry = {
    date: "2024-03-01",
    name: "Lunch",
    amount: 12.5,
    category: "Food",
    subcategory: "Dining",
    paymentMethod: "credit",
  };

  it("accepts an entry whose pair exists", () => {
    const result = validateEntry(entry, food);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(toPayload(result.value)).toEqual({
        date: "2024-03-01",
        name: "Lunch",
        amount: 12.5,
        category: "Food",
        subcategory: "Dining",
        payment_method: "credit",
        notes: "",
      });
    }
  });

  it("rejects a pair missing from the taxonomy", () => {
    const result = validateEntry({ ...entry, subcategory: "Snacks" }, food);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ErrorCode.TAXONOMY_UNKNOWN_NODE);
    }
  });

  it("lists every schema issue", () => {
    const result = validateEntry({ ...entry, date: "2024-02-30", amount: -1, paymentMethod: "cash" }, food);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ErrorCode.VALIDATION_FAILED);
      expect(result.error.issues.map((issue) => issue.split(":")[0])).toEqual([
        "date",
        "amount",
        "paymentMethod",
      ]);
    }
  });
});

describe("ExpenseService", () => {
  let store: FakeRemoteStore;

  beforeEach(() => {
    store = new FakeRemoteStore();
    store.taxonomy = { ok: true, status: 200, snapshot: food };
  });

  function service(prompter: ScriptedPrompter, surface = new ScriptedSurface((text) => text)): ExpenseService {
    const engine = new ReconciliationEngine({ surface, prompter });
    return new ExpenseService({ store, prompter, engine, now: () => new Date(2024, 2, 1) });
  }

  describe("addEntry", () => {
    it("submits a flat payload with today's date and an existing pair", async () => {
      const prompter = new ScriptedPrompter(["", "Lunch", "12.50", "1", "", "1", "2"]);

      const outcome = await service(prompter).addEntry();

      expect(outcome.type).toBe("submitted");
      expect(store.callsTo("submitEntry")).toEqual([
        {
          method: "submitEntry",
          payload: {
            date: "2024-03-01",
            name: "Lunch",
            amount: 12.5,
            category: "Food",
            subcategory: "Dining",
            payment_method: "credit",
            notes: "",
          },
        },
      ]);
      expect(store.callsTo("createCategory")).toEqual([]);
    });

    it("re-prompts invalid fields", async () => {
      const prompter = new ScriptedPrompter([
        "2024-13-01",
        "2024-02-10",
        "",
        "Bus",
        "abc",
        "0",
        "3",
        "cash",
        "debit",
        "monthly pass",
        "1",
        "1",
      ]);

      const outcome = await service(prompter).addEntry();

      expect(prompter.lines.filter((line) => line.includes("Invalid value, try again."))).toHaveLength(5);
      expect(outcome.type === "submitted" && outcome.entry).toEqual({
        date: "2024-02-10",
        name: "Bus",
        amount: 3,
        category: "Food",
        subcategory: "Groceries",
        paymentMethod: "debit",
        notes: "monthly pass",
      });
    });

    it("creates the category pair first on an empty taxonomy", async () => {
      store.taxonomy = { ok: true, status: 200, snapshot: [] };
      const prompter = new ScriptedPrompter(["2024-05-01", "Train", "40", "2", "", "Travel", "Rail"]);

      const outcome = await service(prompter).addEntry();

      expect(outcome.type).toBe("submitted");
      expect(store.calls.map((call) => call.method)).toEqual([
        "listTaxonomy",
        "createCategory",
        "createSubcategory",
        "submitEntry",
      ]);
      const [submitted] = store.callsTo("submitEntry");
      expect(submitted?.payload.category).toBe("Travel");
      expect(submitted?.payload.subcategory).toBe("Rail");
    });

    it("aborts before prompting when the taxonomy cannot be listed", async () => {
      store.taxonomy = { ok: false, status: 503, body: "maintenance" };
      const prompter = new ScriptedPrompter();

      const outcome = await service(prompter).addEntry();

      expect(outcome).toEqual({ type: "taxonomy-unavailable", status: 503, body: "maintenance" });
      expect(prompter.questions).toEqual([]);
    });

    it("reports a rejected submission", async () => {
      store.entryResponse = { status: 422, body: "duplicate" };
      const prompter = new ScriptedPrompter(["", "Lunch", "9", "1", "", "1", "1"]);

      const outcome = await service(prompter).addEntry();

      expect(outcome.type).toBe("rejected");
      expect(outcome.type === "rejected" && [outcome.status, outcome.body]).toEqual([422, "duplicate"]);
    });
  });

  describe("editLedger", () => {
    it("pushes the edited CSV as {content}", async () => {
      store.resources.transactions = { status: 200, body: "date,name\n2024-01-01,Rent\n" };
      const prompter = new ScriptedPrompter([], [true]);
      const surface = new ScriptedSurface((text) => `${text}\n2024-01-02,Milk`);

      const outcome = await service(prompter, surface).editLedger();

      expect(outcome).toEqual({ type: "pushed", status: 200, body: "ok" });
      expect(surface.sessions[0]?.extension).toBe(".csv");
      expect(store.callsTo("replace")).toEqual([
        {
          method: "replace",
          resource: "transactions",
          payload: { content: "date,name\n2024-01-01,Rent\n2024-01-02,Milk" },
        },
      ]);
    });
  });

  describe("editCategories", () => {
    it("edits the tree as JSON and pushes it back", async () => {
      store.resources.categories = {
        status: 200,
        body: JSON.stringify({ categories: { Food: ["Groceries"] } }),
      };
      const prompter = new ScriptedPrompter([], [true]);
      const surface = new ScriptedSurface(() => JSON.stringify({ Food: ["Groceries"], Travel: [] }));

      const outcome = await service(prompter, surface).editCategories();

      expect(outcome.type).toBe("pushed");
      expect(surface.sessions[0]).toEqual({
        initialText: '{\n  "Food": [\n    "Groceries"\n  ]\n}',
        extension: ".json",
      });
      expect(store.callsTo("replace")).toEqual([
        {
          method: "replace",
          resource: "categories",
          payload: { content: '{"Food":["Groceries"],"Travel":[]}' },
        },
      ]);
    });
  });
});
