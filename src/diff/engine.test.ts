import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { CatalogStore } from "../catalog/store.js";
import { LookupError } from "../core/errors.js";
import { MapSecurityContextLookup } from "../device/serviceContexts.js";
import { DiffEngine } from "./engine.js";

type TxTuple = [number, string, string, string];

function seed(store: CatalogStore, services: Record<string, { project: string | null; txs: TxTuple[] }>): void {
  store.resetSchema();
  const inserted = store.insertServices(Object.entries(services).map(([name, s]) => ({ name, project: s.project })));
  for (const service of inserted) {
    const txs = services[service.name]?.txs ?? [];
    store.insertTransactions(
      txs.map(([number, methodName, args, returns]) => ({
        number,
        methodName,
        arguments: args,
        returns,
        serviceId: service.id,
      }))
    );
  }
}

describe("DiffEngine", () => {
  let project: CatalogStore;
  let baseline: CatalogStore;

  beforeEach(() => {
    project = CatalogStore.open(":memory:");
    baseline = CatalogStore.open(":memory:");
  });

  afterEach(() => {
    project.close();
    baseline.close();
  });

  it("should report a changed argument list as modified with old and new values", () => {
    seed(project, { activity: { project: "android.app.IActivityManager", txs: [[3, "startActivity", "Intent,int", "int"]] } });
    seed(baseline, { activity: { project: "android.app.IActivityManager", txs: [[3, "startActivity", "Intent", "int"]] } });

    const diff = new DiffEngine(project, baseline).diffOne("activity");

    expect(diff.status).toBe("existing");
    expect(diff.changed).toBe(true);
    expect(diff.changes).toHaveLength(1);
    const [change] = diff.changes;
    expect(change?.kind).toBe("modified");
    if (change?.kind !== "modified") return;
    expect(change.transaction.arguments).toBe("Intent,int");
    expect(change.baseline.arguments).toBe("Intent");
  });

  it("should report a changed return type as modified", () => {
    seed(project, { window: { project: "IWindowManager", txs: [[1, "getRotation", "", "long"]] } });
    seed(baseline, { window: { project: "IWindowManager", txs: [[1, "getRotation", "", "int"]] } });

    const [change] = new DiffEngine(project, baseline).diffOne("window").changes;
    expect(change?.kind).toBe("modified");
  });

  it("should produce no changes for identical tuples", () => {
    seed(project, { activity: { project: "IActivityManager", txs: [[3, "startActivity", "Intent", "int"]] } });
    seed(baseline, { activity: { project: "IActivityManager", txs: [[3, "startActivity", "Intent", "int"]] } });

    const diff = new DiffEngine(project, baseline).diffOne("activity");
    expect(diff.changes).toEqual([]);
    expect(diff.changed).toBe(false);
  });

  it("should report a transaction absent from the baseline as new", () => {
    seed(project, {
      activity: {
        project: "IActivityManager",
        txs: [
          [3, "startActivity", "Intent", "int"],
          [4, "stopService", "Intent", "int"],
        ],
      },
    });
    seed(baseline, { activity: { project: "IActivityManager", txs: [[3, "startActivity", "Intent", "int"]] } });

    const diff = new DiffEngine(project, baseline).diffOne("activity");
    expect(diff.changes.map((c) => [c.kind, c.transaction.methodName])).toEqual([["new", "stopService"]]);
  });

  it("should stay silent about transactions that exist only in the baseline", () => {
    seed(project, { activity: { project: "IActivityManager", txs: [[3, "startActivity", "Intent", "int"]] } });
    seed(baseline, {
      activity: {
        project: "IActivityManager",
        txs: [
          [3, "startActivity", "Intent", "int"],
          [9, "removedCall", "", "void"],
        ],
      },
    });

    const diff = new DiffEngine(project, baseline).diffOne("activity");
    expect(diff.changes).toEqual([]);
    expect(diff.changed).toBe(false);
  });

  it("should tag a service missing from the baseline as new and list all its transactions", () => {
    seed(project, {
      mount: {
        project: "IMountService",
        txs: [
          [2, "unmount", "String", "void"],
          [1, "mount", "String", "int"],
        ],
      },
    });
    seed(baseline, {});

    const diff = new DiffEngine(project, baseline).diffOne("mount");
    expect(diff.status).toBe("new");
    expect(diff.changed).toBe(true);
    expect(diff.changes.map((c) => [c.kind, c.transaction.number, c.transaction.methodName])).toEqual([
      ["new", 1, "mount"],
      ["new", 2, "unmount"],
    ]);
  });

  it("should throw LookupError when the project catalog lacks the service", () => {
    seed(project, {});
    seed(baseline, { activity: { project: null, txs: [] } });

    expect(() => new DiffEngine(project, baseline).diffOne("activity")).toThrow(LookupError);
  });

  it("should compare every duplicate against the first baseline occurrence", () => {
    seed(project, {
      svc: {
        project: "ISvc",
        txs: [
          [1, "call", "A", "V"],
          [2, "call", "B", "V"],
        ],
      },
    });
    seed(baseline, {
      svc: {
        project: "ISvc",
        txs: [
          [1, "call", "A", "V"],
          [2, "call", "B", "V"],
        ],
      },
    });

    const diff = new DiffEngine(project, baseline).diffOne("svc");
    expect(diff.changes).toHaveLength(1);
    const [change] = diff.changes;
    if (change?.kind !== "modified") throw new Error("expected a modified change");
    expect(change.transaction.number).toBe(2);
    expect(change.baseline.number).toBe(1);
  });

  it("should annotate with a security context and fall back to unknown", () => {
    seed(project, {
      activity: { project: "IActivityManager", txs: [] },
      vendor: { project: null, txs: [] },
    });
    seed(baseline, {});
    const contexts = new MapSecurityContextLookup(new Map([["activity", "u:object_r:activity_service:s0"]]));
    const engine = new DiffEngine(project, baseline, { securityContexts: contexts });

    expect(engine.diffOne("activity").securityContext).toBe("u:object_r:activity_service:s0");
    expect(engine.diffOne("vendor").securityContext).toBe("unknown");
  });

  it("should leave the security context unset when not requested", () => {
    seed(project, { activity: { project: "IActivityManager", txs: [] } });
    seed(baseline, {});
    expect(new DiffEngine(project, baseline).diffOne("activity").securityContext).toBeUndefined();
  });

  describe("diffAll", () => {
    it("should diff every project service in name order", () => {
      seed(project, {
        window: { project: "IWindowManager", txs: [[1, "getRotation", "", "int"]] },
        activity: { project: "IActivityManager", txs: [[3, "startActivity", "Intent,int", "int"]] },
        mount: { project: "IMountService", txs: [[1, "mount", "String", "int"]] },
      });
      seed(baseline, {
        activity: { project: "IActivityManager", txs: [[3, "startActivity", "Intent", "int"]] },
        window: { project: "IWindowManager", txs: [[1, "getRotation", "", "int"]] },
      });

      const result = new DiffEngine(project, baseline).diffAll();
      expect(result.exitCode).toBe(0);
      expect(result.failures).toEqual([]);
      expect(result.diffs.map((d) => [d.service.name, d.status, d.changed])).toEqual([
        ["activity", "existing", true],
        ["mount", "new", true],
        ["window", "existing", false],
      ]);
    });

    it("should record a failing service and continue with the rest", () => {
      seed(project, {
        alpha: { project: null, txs: [] },
        beta: { project: null, txs: [] },
      });
      seed(baseline, {});
      vi.spyOn(console, "error").mockImplementation(() => {});

      const engine = new DiffEngine(project, baseline);
      const original = engine.diffOne.bind(engine);
      vi.spyOn(engine, "diffOne").mockImplementation((name: string) => {
        if (name === "alpha") throw new LookupError("Service not found in project catalog: alpha", name, "project");
        return original(name);
      });

      const result = engine.diffAll();
      expect(result.exitCode).toBe(1);
      expect(result.failures).toEqual([{ serviceName: "alpha", error: "Service not found in project catalog: alpha" }]);
      expect(result.diffs.map((d) => d.service.name)).toEqual(["beta"]);
    });
  });

  it("should list project services absent from the baseline", () => {
    seed(project, {
      activity: { project: null, txs: [] },
      mount: { project: null, txs: [] },
    });
    seed(baseline, { activity: { project: null, txs: [] } });

    expect(Array.from(new DiffEngine(project, baseline).newServiceNames())).toEqual(["mount"]);
  });
});
