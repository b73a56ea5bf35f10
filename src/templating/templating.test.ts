import { describe, expect, it } from "vitest";
import { substitute, Templating } from "./templating.js";

describe("substitute", () => {
  it("replaces bare and braced placeholders", () => {
    expect(substitute("$greeting, ${name}!", { greeting: "hello", name: "world" })).toBe("hello, world!");
  });

  it("leaves unknown placeholders untouched", () => {
    expect(substitute("echo $HOME ${missing}", {})).toBe("echo $HOME ${missing}");
  });

  it("turns $$ into a literal dollar", () => {
    expect(substitute("cost: $$5 for $item", { item: "tea" })).toBe("cost: $5 for tea");
  });

  it("leaves a lone or malformed dollar in place", () => {
    expect(substitute("price $ ${1bad} $", { bad: "x" })).toBe("price $ ${1bad} $");
  });

  it("reads the longest identifier after a bare dollar", () => {
    expect(substitute("$name_suffix $name", { name: "n" })).toBe("$name_suffix n");
  });

  it("does not resolve inherited object properties", () => {
    expect(substitute("$constructor", {})).toBe("$constructor");
  });
});

describe("Templating", () => {
  it("layers call parameters over container variables over globals", () => {
    const templating = new Templating({ a: "1" });
    expect(templating.apply("$a $b", { a: "2", b: "3" }, { b: "4" })).toBe("2 4");
  });

  it("falls back to globals for names no narrower scope defines", () => {
    const templating = new Templating({ domain: "example.test", a: "1" });
    expect(templating.apply("$a.${domain}", { a: "web" })).toBe("web.example.test");
  });

  it("lets call parameters override globals", () => {
    const templating = new Templating({ version: "1.0" });
    expect(templating.apply("v$version", {}, { version: "2.0" })).toBe("v2.0");
  });

  it("merges scopes without mutating them", () => {
    const globals = { a: "1" };
    const templating = new Templating(globals);
    expect(templating.scope({ b: "2" }, { c: "3" })).toEqual({ a: "1", b: "2", c: "3" });
    expect(globals).toEqual({ a: "1" });
  });
});
