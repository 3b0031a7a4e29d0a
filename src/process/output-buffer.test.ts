import { describe, it, expect } from "vitest";
import { OutputBuffer } from "./output-buffer.js";

describe("OutputBuffer", () => {
  it("joins lines split across chunks", () => {
    const buffer = new OutputBuffer();
    buffer.push("hello wo");
    buffer.push("rld\nsecond");
    buffer.push(" line\n");
    expect(buffer.lines()).toEqual(["hello world", "second line"]);
  });

  it("includes the unterminated last line", () => {
    const buffer = new OutputBuffer();
    buffer.push("ready\r\nlistening on 8000");
    expect(buffer.lines()).toEqual(["ready", "listening on 8000"]);
  });

  it("drops the oldest lines past the limit", () => {
    const buffer = new OutputBuffer(3);
    buffer.push("1\n2\n3\n4\n5\n");
    expect(buffer.lines()).toEqual(["3", "4", "5"]);
  });

  it("returns only the requested tail", () => {
    const buffer = new OutputBuffer();
    buffer.push("a\nb\nc\n");
    expect(buffer.lines(2)).toEqual(["b", "c"]);
  });

  it("clears", () => {
    const buffer = new OutputBuffer();
    buffer.push("a\nb");
    buffer.clear();
    expect(buffer.lines()).toEqual([]);
  });
});
