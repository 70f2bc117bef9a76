import { describe, it, expect } from "vitest";
import { createAppTarget } from "./app-target";
import { LinkNode } from "./link-node";

const roads = createAppTarget({
  uri: "https://roads.test",
  separator: "+",
  color: "#a1e6a1",
});

describe("LinkNode", () => {
  it("starts unlinked, without URL and unresolved", () => {
    const node = new LinkNode(roads, "start", "hello");
    expect(node.linked).toBe(false);
    expect(node.dependencies).toEqual([]);
    expect(node.url).toBeUndefined();
    expect(node.resolved).toBe(false);
    expect(node.preview).toBe(true);
    expect(node.getStatus()).toBe("creating");
  });

  it("links the nodes whose name occurs in its text, in node order", () => {
    const a = new LinkNode(roads, "alpha", "go to gamma then beta");
    const b = new LinkNode(roads, "beta", "");
    const c = new LinkNode(roads, "gamma", "");

    a.link([a, b, c]);

    expect(a.linked).toBe(true);
    expect(a.dependencies).toEqual([b, c]);
  });

  it("depends on itself when its own name is in its text", () => {
    const node = new LinkNode(roads, "loop", "share loop");
    node.link([node]);
    expect(node.dependencies).toEqual([node]);
  });

  it("refuses to be linked twice", () => {
    const node = new LinkNode(roads, "once", "");
    node.link([]);
    expect(() => node.link([])).toThrow('Link "once" is already linked');
  });

  it("substitutes every occurrence of every dependency", () => {
    const a = new LinkNode(roads, "alpha", "beta, gamma and beta again");
    const b = new LinkNode(roads, "beta", "");
    const c = new LinkNode(roads, "gamma", "");
    a.link([a, b, c]);
    b.setUrl("https://s.test/b");
    c.setUrl("https://s.test/c");

    expect(a.substitute()).toBe(
      "https://s.test/b, https://s.test/c and https://s.test/b again",
    );
  });

  it("cannot substitute a dependency that has no URL", () => {
    const a = new LinkNode(roads, "alpha", "see beta");
    const b = new LinkNode(roads, "beta", "");
    a.link([a, b]);

    expect(() => a.substitute()).toThrow(
      'Cannot substitute "beta" in "alpha": no URL yet',
    );
  });

  it("is ready once every dependency is resolved", () => {
    const a = new LinkNode(roads, "alpha", "see beta");
    const b = new LinkNode(roads, "beta", "");
    a.link([a, b]);
    b.link([a, b]);

    expect(a.isReady()).toBe(false);
    expect(b.isReady()).toBe(true);

    b.setUrl("https://s.test/b");
    b.markResolved();

    expect(a.isReady()).toBe(true);
    expect(b.isReady()).toBe(false);
  });

  it("reports its status from URL and resolution", () => {
    const node = new LinkNode(roads, "n", "");
    node.setUrl("https://s.test/n");
    expect(node.getStatus()).toBe("updating");
    node.markResolved();
    expect(node.getStatus()).toBe("done");
  });
});
