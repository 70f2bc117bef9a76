import { describe, it, expect } from "vitest";
import { createAppTarget } from "./app-target";
import { LinkNode } from "./link-node";
import { countProgress } from "./progress";

const target = createAppTarget({
  uri: "https://app.test",
  separator: "=",
  color: "#e6e6e6",
});

describe("countProgress", () => {
  it("counts linked and resolved nodes separately", () => {
    const creating = new LinkNode(target, "a", "");
    const updating = new LinkNode(target, "b", "");
    const done = new LinkNode(target, "c", "");
    updating.setUrl("https://s.test/b");
    done.setUrl("https://s.test/c");
    done.markResolved();

    expect(countProgress([creating, updating, done])).toEqual({
      total: 3,
      linked: 1,
      resolved: 1,
    });
  });

  it("handles an empty node list", () => {
    expect(countProgress([])).toEqual({ total: 0, linked: 0, resolved: 0 });
  });
});
