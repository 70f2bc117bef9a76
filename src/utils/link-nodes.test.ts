import { describe, it, expect } from "vitest";
import { createAppTarget } from "./app-target";
import { LinkNode } from "./link-node";
import { findAmbiguousNames, linkNodes } from "./link-nodes";

const quizz = createAppTarget({
  uri: "https://quizz.test",
  separator: "?",
  color: "#e6a1a1",
});

describe("linkNodes", () => {
  it("returns edges in node order, including later-defined nodes", () => {
    const nodes = [
      new LinkNode(quizz, "intro", "first question: q1"),
      new LinkNode(quizz, "q1", "next: q2, back: intro"),
      new LinkNode(quizz, "q2", "the end"),
    ];

    expect(linkNodes(nodes)).toEqual([
      { from: "intro", to: "q1" },
      { from: "q1", to: "intro" },
      { from: "q1", to: "q2" },
    ]);
    expect(nodes[0].dependencies).toEqual([nodes[1]]);
    expect(nodes[2].dependencies).toEqual([]);
  });

  it("keeps self references as edges", () => {
    const nodes = [new LinkNode(quizz, "self", "share self")];
    expect(linkNodes(nodes)).toEqual([{ from: "self", to: "self" }]);
  });
});

describe("findAmbiguousNames", () => {
  it("reports names contained in other names", () => {
    const nodes = [
      new LinkNode(quizz, "q1", ""),
      new LinkNode(quizz, "q10", ""),
      new LinkNode(quizz, "end", ""),
    ];
    expect(findAmbiguousNames(nodes)).toEqual([{ inner: "q1", outer: "q10" }]);
  });

  it("finds nothing among distinct names", () => {
    const nodes = [new LinkNode(quizz, "left", ""), new LinkNode(quizz, "right", "")];
    expect(findAmbiguousNames(nodes)).toEqual([]);
  });
});
