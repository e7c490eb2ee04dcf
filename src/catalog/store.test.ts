import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { CatalogStore, lazyRows, withCatalog } from "./store.js";
import { ConfigurationError, StorageError, UniqueConstraintError } from "../core/errors.js";

describe("CatalogStore", () => {
  let store: CatalogStore;

  beforeEach(() => {
    store = CatalogStore.open(":memory:");
    store.resetSchema();
  });

  afterEach(() => {
    store.close();
  });

  it("should insert services and return them with sequential ids", () => {
    const services = store.insertServices([
      { name: "activity", project: "android.app.IActivityManager" },
      { name: "media.audio_flinger", project: null },
    ]);
    expect(services).toEqual([
      { id: 1, name: "activity", project: "android.app.IActivityManager" },
      { id: 2, name: "media.audio_flinger", project: null },
    ]);
  });

  it("should surface a repeated service name as UniqueConstraintError and insert nothing", () => {
    const insert = () =>
      store.insertServices([
        { name: "activity", project: null },
        { name: "window", project: null },
        { name: "activity", project: "android.app.IActivityManager" },
      ]);

    expect(insert).toThrow(UniqueConstraintError);
    expect(insert).toThrow("Duplicate service name: activity");
    expect(store.countServices()).toBe(0);
  });

  it("should list services by name or insertion order", () => {
    store.insertServices([
      { name: "window", project: null },
      { name: "activity", project: null },
    ]);
    expect(Array.from(store.listServices(true), (s) => s.name)).toEqual(["activity", "window"]);
    expect(Array.from(store.listServices(false), (s) => s.name)).toEqual(["window", "activity"]);
  });

  it("should return a restartable sequence reflecting current state", () => {
    store.insertServices([{ name: "a", project: null }]);
    const services = store.listServices(true);
    expect(Array.from(services)).toHaveLength(1);

    store.insertServices([{ name: "b", project: null }]);
    expect(Array.from(services, (s) => s.name)).toEqual(["a", "b"]);
  });

  it("should find a service by name or return null", () => {
    store.insertServices([{ name: "activity", project: "android.app.IActivityManager" }]);
    expect(store.findServiceByName("activity")).toEqual({
      id: 1,
      name: "activity",
      project: "android.app.IActivityManager",
    });
    expect(store.findServiceByName("missing")).toBeNull();
  });

  it("should list transactions by number or in insertion order", () => {
    const [service] = store.insertServices([{ name: "activity", project: "android.app.IActivityManager" }]);
    if (!service) throw new Error("no service inserted");
    store.insertTransactions([
      { number: 3, methodName: "startActivity", arguments: "Intent,int", returns: "int", serviceId: service.id },
      { number: 1, methodName: "finishActivity", arguments: "", returns: "boolean", serviceId: service.id },
      { number: 1, methodName: "finishActivityDup", arguments: "", returns: "boolean", serviceId: service.id },
    ]);

    expect(Array.from(store.listTransactionsForService(service.id, true), (t) => t.methodName)).toEqual([
      "finishActivity",
      "finishActivityDup",
      "startActivity",
    ]);
    expect(Array.from(store.listTransactionsForService(service.id), (t) => t.methodName)).toEqual([
      "startActivity",
      "finishActivity",
      "finishActivityDup",
    ]);
    expect(store.countTransactions(service.id)).toBe(3);
  });

  it("should reject transactions for an unknown service", () => {
    expect(() =>
      store.insertTransactions([{ number: 1, methodName: "x", arguments: "", returns: "V", serviceId: 42 }])
    ).toThrow(StorageError);
  });

  it("should drop existing content on resetSchema", () => {
    store.insertServices([{ name: "activity", project: null }]);
    store.resetSchema();
    expect(store.countServices()).toBe(0);
    expect(store.countTransactions()).toBe(0);
  });
});

describe("withCatalog", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "txcat-store-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should close the handle when the callback throws", () => {
    const opened: CatalogStore[] = [];
    expect(() =>
      withCatalog(join(dir, "service.db"), {}, (store) => {
        opened.push(store);
        throw new Error("boom");
      })
    ).toThrow("boom");
    expect(opened).toHaveLength(1);
    const closed = opened[0];
    expect(closed).toBeDefined();
    expect(() => closed?.countServices()).toThrow(StorageError);
  });

  it("should reopen a written catalog read-only", () => {
    const path = join(dir, "nested", "service.db");
    withCatalog(path, {}, (store) => {
      store.resetSchema();
      store.insertServices([{ name: "activity", project: null }]);
    });
    const names = withCatalog(path, { readonly: true }, (store) => Array.from(store.listServices(), (s) => s.name));
    expect(names).toEqual(["activity"]);
  });

  it("should raise ConfigurationError for a missing read-only catalog", () => {
    expect(() => withCatalog(join(dir, "absent.db"), { readonly: true }, () => 0)).toThrow(ConfigurationError);
  });
});

describe("lazyRows", () => {
  function* failingRows(): Generator<{ n: number }> {
    yield { n: 1 };
    throw Object.assign(new Error("disk I/O error"), { code: "SQLITE_IOERR" });
  }

  it("should wrap an error raised mid-iteration as StorageError", () => {
    const seen: number[] = [];
    let caught: unknown;
    try {
      for (const n of lazyRows("Failed to list services", failingRows, (row) => row.n)) {
        seen.push(n);
      }
    } catch (error) {
      caught = error;
    }

    expect(seen).toEqual([1]);
    expect(caught).toBeInstanceOf(StorageError);
    if (!(caught instanceof StorageError)) return;
    expect(caught.message).toBe("Failed to list services: disk I/O error");
    expect(caught.code).toBe("SQLITE_IOERR");
  });

  it("should re-run the source on every iteration", () => {
    let opens = 0;
    const rows = lazyRows("list", () => {
      opens += 1;
      return [{ n: opens }];
    }, (row) => row.n);

    expect(Array.from(rows)).toEqual([1]);
    expect(Array.from(rows)).toEqual([2]);
  });
});
