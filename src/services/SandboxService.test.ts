import { describe, test, expect } from "vitest";
import { ExitCode } from "@/diagnostics/exitCodes.ts";
import { assertNotRoot, permissionModel } from "./SandboxService.ts";

describe("Sandbox", () => {
  test("refuses to run as root", () => {
    expect(() => assertNotRoot(0)).toThrow("Do not run an HTTP server as root.");
    try {
      assertNotRoot(0);
    } catch (error) {
      expect(error).toMatchObject({ code: ExitCode.DONT_USE_ROOT, scope: "process" });
    }
    expect(() => assertNotRoot(1000)).not.toThrow();
  });

  test("reads the permission model when one is present", () => {
    const granted = new Set(["fs.read"]);
    const check = permissionModel({ permission: { has: (scope: string) => granted.has(scope) } });

    expect(check).not.toBeNull();
    expect(check?.("fs.read")).toBe(true);
    expect(check?.("fs.write")).toBe(false);
  });

  test("reports no permission model when the process has none", () => {
    expect(permissionModel({})).toBeNull();
    expect(permissionModel({ permission: {} })).toBeNull();
    expect(permissionModel({ permission: { has: true } })).toBeNull();
  });
});
