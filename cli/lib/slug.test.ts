import { describe, expect, it } from "vitest";

import { identityKey } from "./record.ts";
import { assignSlugs, slugify } from "./slug.ts";

describe("slugify", () => {
  it("replaces unsafe characters with underscores", () => {
    expect(slugify({ name: "test_load", param: "1000/people" })).toBe("test_load_1000_people");
    expect(slugify({ name: "test search", param: "q=a b" })).toBe("test_search_q_a_b");
  });

  it("keeps dots and dashes", () => {
    expect(slugify({ name: "test_io", param: "1.5-mb" })).toBe("test_io_1.5-mb");
  });

  it("trims separators at both ends", () => {
    expect(slugify({ name: "[x]" })).toBe("x");
  });

  it("falls back for names with no safe characters", () => {
    expect(slugify({ name: "???" })).toBe("benchmark");
  });

  it("limits the length", () => {
    expect(slugify({ name: "a".repeat(300) })).toHaveLength(120);
  });
});

describe("assignSlugs", () => {
  it("gives colliding identities distinct slugs", () => {
    const a = { name: "test_load", param: "1/2" };
    const b = { name: "test_load", param: "1 2" };
    const c = { name: "TEST_LOAD_1_2" };

    const slugs = assignSlugs([a, b, c]);

    expect(slugs.get(identityKey(a))).toBe("test_load_1_2");
    expect(slugs.get(identityKey(b))).toBe("test_load_1_2-2");
    expect(slugs.get(identityKey(c))).toBe("TEST_LOAD_1_2-3");
  });
});
