import { describe, it, expect } from "vitest";
import type { ParserConfig } from "../types";
import { AppTargetTable } from "./app-target";
import { ParseError } from "./errors";
import { parseDocument, splitLines } from "./parse-document";

const targets = AppTargetTable.fromConfig([
  { uri: "https://quest.test", separator: "$", color: "#a1e6e6" },
  { uri: "https://dice.test", separator: "%", color: "#e6a1e6" },
]);

const parser: ParserConfig = {
  separatorLength: 5,
  debugName: "DEBUG",
  debugTarget: { uri: "https://debug.test/roads", color: "#ffffff" },
};

describe("parseDocument", () => {
  it("splits fragments on header lines and picks the target by separator", () => {
    const nodes = parseDocument(
      ["$$$$$ intro", "Welcome", "roll here: roll", "%%%%% roll", "1d6"],
      { targets, parser },
    );

    expect(nodes.map((n) => n.name)).toEqual(["intro", "roll"]);
    expect(nodes.map((n) => n.target.name)).toEqual(["quest.test", "dice.test"]);
    expect(nodes[0].rawText).toBe("Welcome\nroll here: roll");
    expect(nodes[1].rawText).toBe("1d6");
  });

  it("accepts headers without a space and with an empty body", () => {
    const nodes = parseDocument(["%%%%%first", "$$$$$   second"], {
      targets,
      parser,
    });

    expect(nodes.map((n) => [n.name, n.rawText])).toEqual([
      ["first", ""],
      ["second", ""],
    ]);
  });

  it("treats short or unknown separators as body text", () => {
    const nodes = parseDocument(["$$$$$ a", "$$$$ b", "===== c"], {
      targets,
      parser,
    });

    expect(nodes).toHaveLength(1);
    expect(nodes[0].rawText).toBe("$$$$ b\n===== c");
  });

  it("reads accented link names in full", () => {
    const nodes = parseDocument(
      ["$$$$$ énigme", "go to café", "%%%%% café", "back to énigme"],
      { targets, parser },
    );

    expect(nodes.map((n) => n.name)).toEqual(["énigme", "café"]);
    expect(nodes[0].rawText).toBe("go to café");
  });

  it("accepts separators that are special in regular expressions", () => {
    const special = AppTargetTable.fromConfig([
      { uri: "https://dash.test", separator: "-", color: "#000000" },
      { uri: "https://bracket.test", separator: "]", color: "#000000" },
    ]);

    const nodes = parseDocument(["----- a", "]]]]] b"], {
      targets: special,
      parser,
    });

    expect(nodes.map((n) => [n.name, n.target.name])).toEqual([
      ["a", "dash.test"],
      ["b", "bracket.test"],
    ]);
  });

  it("does not start a link on an unknown separator", () => {
    expect(() =>
      parseDocument(["===== a", "$$$$$ b"], { targets, parser }),
    ).toThrow("Text found before the first link header (line 1)");
  });

  it("rejects an empty document", () => {
    expect(() => parseDocument([], { targets, parser })).toThrow(ParseError);
    expect(() => parseDocument(["", "  "], { targets, parser })).toThrow(
      "Empty data file",
    );
  });

  it("rejects text before the first header", () => {
    expect(() =>
      parseDocument(["stray", "$$$$$ a"], { targets, parser }),
    ).toThrow("Text found before the first link header (line 1)");
  });

  it("rejects duplicate names", () => {
    expect(() =>
      parseDocument(["$$$$$ a", "x", "%%%%% a"], { targets, parser }),
    ).toThrow('Duplicate link name "a" (line 3)');
  });

  it("appends a debug link listing every name", () => {
    const nodes = parseDocument(["$$$$$ ab", "%%%%% cd"], {
      targets,
      parser,
      includeDebug: true,
    });

    const debug = nodes[2];
    expect(debug.name).toBe("DEBUG");
    expect(debug.target.uri).toBe("https://debug.test/roads");
    expect(debug.target.name).toBe("roads");
    expect(debug.preview).toBe(false);
    expect(debug.rawText).toBe(
      "Debug\nab\na&#x200B;b\ncd\nc&#x200B;d",
    );
  });

  it("rejects a debug name already used by a link", () => {
    expect(() =>
      parseDocument(["$$$$$ DEBUG"], { targets, parser, includeDebug: true }),
    ).toThrow('Duplicate link name "DEBUG"');
  });
});

describe("splitLines", () => {
  it("trims the document and splits on any line break", () => {
    expect(splitLines("\n$$$$$ a\r\nline\n\n")).toEqual(["$$$$$ a", "line"]);
  });

  it("returns no lines for blank content", () => {
    expect(splitLines(" \n ")).toEqual([]);
  });
});
