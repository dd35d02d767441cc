import { describe, it, expect } from "vitest";
import {
  DEFAULT_ENCODING_STYLE,
  defaultExplode,
  defaultStyle,
} from "../src/openapi/index.js";

describe("defaultStyle", () => {
  it("uses form for query and cookie parameters", () => {
    expect(defaultStyle("query")).toBe("form");
    expect(defaultStyle("cookie")).toBe("form");
  });

  it("uses simple for path and header parameters", () => {
    expect(defaultStyle("path")).toBe("simple");
    expect(defaultStyle("header")).toBe("simple");
  });

  it("gives encodings the query default", () => {
    expect(DEFAULT_ENCODING_STYLE).toBe("form");
  });
});

describe("defaultExplode", () => {
  it("explodes only the form style", () => {
    expect(defaultExplode("form")).toBe(true);
    expect(defaultExplode("simple")).toBe(false);
    expect(defaultExplode("deepObject")).toBe(false);
  });
});
