import { describe, it, expect } from "vitest";
import { RegistryError } from "../../src/engine/errors.js";
import { Registry } from "../../src/engine/registry.js";

describe("Registry", () => {
  it("maps logical ids per kind", () => {
    const registry = new Registry();
    registry.set("epic", "1", 501);
    registry.set("issue", "1", 902);
    registry.set("label", "1", "bug");

    expect(registry.get("epic", "1")).toBe(501);
    expect(registry.get("issue", "1")).toBe(902);
    expect(registry.get("label", "1")).toBe("bug");
    expect(registry.get("milestone", "1")).toBeUndefined();
  });

  it("treats setting the same value again as a no-op", () => {
    const registry = new Registry();
    registry.set("milestone", "m1", 7);
    registry.set("milestone", "m1", 7);

    expect(registry.size("milestone")).toBe(1);
  });

  it("refuses to remap an id that is already registered", () => {
    const registry = new Registry();
    registry.set("epic", "e1", 10);

    expect(() => registry.set("epic", "e1", 11)).toThrow(RegistryError);
    expect(registry.get("epic", "e1")).toBe(10);
  });

  it("reports membership with has()", () => {
    const registry = new Registry();
    registry.set("user", "alice", 42);

    expect(registry.has("user", "alice")).toBe(true);
    expect(registry.has("user", "bob")).toBe(false);
  });

  it("snapshots every kind as plain objects", () => {
    const registry = new Registry();
    registry.set("label", "1", "bug");
    registry.set("issue", "1", 3);

    expect(registry.snapshot()).toEqual({
      label: { "1": "bug" },
      milestone: {},
      iteration: {},
      epic: {},
      issue: { "1": 3 },
      user: {},
    });
  });
});
