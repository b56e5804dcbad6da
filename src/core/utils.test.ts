import { describe, expect, it } from "vitest";

import { defaultRunId, pluralize } from "./utils.js";

describe("defaultRunId", () => {
  it("formats the UTC timestamp as YYYYMMDD-HHMMSS", () => {
    expect(defaultRunId(new Date("2024-03-05T07:08:09.123Z"))).toBe("20240305-070809");
  });
});

describe("pluralize", () => {
  it("adds an s except for one", () => {
    expect(pluralize(1, "test")).toBe("1 test");
    expect(pluralize(0, "test")).toBe("0 tests");
  });
});
