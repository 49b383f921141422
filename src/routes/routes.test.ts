import { describe, test, expect } from "vitest";
import { ExitCode } from "@/diagnostics/exitCodes.ts";
import { ProcessFatalError } from "@/diagnostics/errors.ts";
import { ContentBlob, RouteTable, routeForSegments } from "./index.ts";

const blobOf = (text: string) => {
  const bytes = new TextEncoder().encode(text);
  const blob = ContentBlob.create(bytes.length);
  blob.fillView().set(bytes);
  blob.seal();
  return blob;
};

const codeOf = (fn: () => unknown): number | null => {
  try {
    fn();
    return null;
  } catch (error) {
    return error instanceof ProcessFatalError ? error.code : -1;
  }
};

describe("ContentBlob", () => {
  test("creates a zero-filled buffer of the exact size", () => {
    const blob = ContentBlob.create(4);
    expect(blob.length).toBe(4);
    expect(Array.from(blob.view())).toEqual([0, 0, 0, 0]);
  });

  test("refuses writes once sealed", () => {
    const blob = blobOf("hi");
    expect(blob.isSealed()).toBe(true);
    expect(() => blob.fillView()).toThrow("ContentBlob is sealed");
    expect(new TextDecoder().decode(blob.view())).toBe("hi");
  });

  test("absent and released blobs have zero length", () => {
    expect(ContentBlob.lengthOf(null)).toBe(0);
    expect(ContentBlob.lengthOf(undefined)).toBe(0);
    const blob = blobOf("abc");
    ContentBlob.release(blob);
    ContentBlob.release(null);
    expect(ContentBlob.lengthOf(blob)).toBe(0);
    expect(blob.view().length).toBe(0);
  });

  test("rejects negative sizes as an allocation failure", () => {
    expect(codeOf(() => ContentBlob.create(-1))).toBe(ExitCode.ALLOCATION_FAILED);
  });
});

describe("RouteTable", () => {
  test("looks up exact, case-sensitive paths", () => {
    const table = new RouteTable(2);
    table.insert("/a.txt", blobOf("a"));
    expect(table.lookup("/a.txt")?.path).toBe("/a.txt");
    expect(table.lookup("/A.txt")).toBeUndefined();
    expect(table.lookup("/a.txt/")).toBeUndefined();
  });

  test("rejects duplicates and inserts past capacity", () => {
    const table = new RouteTable(1);
    table.insert("/a", blobOf("a"));
    expect(codeOf(() => table.insert("/a", blobOf("again")))).toBe(ExitCode.DUPLICATE_ROUTE);
    expect(codeOf(() => table.insert("/b", blobOf("b")))).toBe(ExitCode.ROUTE_TABLE_FULL);
    expect(table.size).toBe(1);
  });

  test("rejects inserts after freezing", () => {
    const table = new RouteTable(2);
    table.freeze();
    expect(table.isFrozen()).toBe(true);
    expect(codeOf(() => table.insert("/a", blobOf("a")))).toBe(ExitCode.ROUTE_TABLE_FULL);
  });

  test("dispose releases every blob of an unfrozen table", () => {
    const table = new RouteTable(2);
    const a = blobOf("aaa");
    table.insert("/a", a);
    table.dispose();
    expect(a.length).toBe(0);
    expect(table.size).toBe(0);
  });
});

describe("routeForSegments", () => {
  test("maps files to their path relative to the root", () => {
    expect(routeForSegments(["style.css"])).toBe("/style.css");
    expect(routeForSegments(["a", "b", "c.txt"])).toBe("/a/b/c.txt");
  });

  test("collapses index.html onto its directory", () => {
    expect(routeForSegments(["index.html"])).toBe("/");
    expect(routeForSegments(["docs", "index.html"])).toBe("/docs/");
    expect(routeForSegments(["docs", "myindex.html"])).toBe("/docs/myindex.html");
  });
});
