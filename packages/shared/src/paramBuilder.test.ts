import { describe, it, expect } from "vitest";
import { ParamBuilder } from "./paramBuilder.js";

describe("ParamBuilder", () => {
  it("increments the placeholder index on each add()", () => {
    const p = new ParamBuilder();
    expect(p.add("a")).toBe("$1");
    expect(p.add("b")).toBe("$2");
    expect(p.length).toBe(2);
  });

  it("list() returns joined placeholders continuing the sequence", () => {
    const p = new ParamBuilder();
    p.add("ANALYZED");
    expect(p.list(["v1", "v2", "v3"])).toBe("$2, $3, $4");
    expect(p.values()).toEqual(["ANALYZED", "v1", "v2", "v3"]);
  });

  it("list() of nothing adds nothing", () => {
    const p = new ParamBuilder();
    expect(p.list([])).toBe("");
    expect(p.length).toBe(0);
  });

  it("values() returns a copy", () => {
    const p = new ParamBuilder();
    p.add("x");
    const v = p.values();
    v.push("injected");
    expect(p.values()).toEqual(["x"]);
  });
});
