import { join as joinPath } from "node:path";

import { describe, expect, it } from "vitest";

import { DirectoryStack, countSegments } from "./directory-stack.js";

describe("DirectoryStack", () => {
  it("pops one level at a time", () => {
    const stack = new DirectoryStack(["one", "two", "three"]);
    stack.pop();
    expect(stack.segments).toEqual(["one", "two"]);
  });

  it("empties a single element stack", () => {
    const stack = new DirectoryStack(["one"]);
    stack.pop();
    expect(stack.segments).toEqual([]);
  });

  it("stays empty when popped while empty", () => {
    const stack = new DirectoryStack();
    stack.pop();
    stack.pop();
    expect(stack.segments).toEqual([]);
    expect(stack.depth).toBe(0);
  });

  it("never reports a negative depth", () => {
    const stack = new DirectoryStack(["."]);
    let expected = 1;
    const operations = "ppoppppoooopoppoooooopp";
    for (const operation of operations) {
      if (operation === "p") {
        stack.push(`dir${expected}`);
        expected += 1;
      } else {
        stack.pop();
        expected = Math.max(0, expected - 1);
      }
      expect(stack.depth).toBe(expected);
      expect(stack.depth).toBeGreaterThanOrEqual(0);
    }
  });

  it("joins segments into the current path", () => {
    const stack = new DirectoryStack(["."]);
    stack.push("mydir");
    expect(stack.segments).toEqual([".", "mydir"]);
    expect(stack.current()).toBe("mydir");
    stack.push("nested");
    expect(stack.current()).toBe(joinPath("mydir", "nested"));
  });

  it("joins an empty stack to the working directory", () => {
    expect(new DirectoryStack().current()).toBe(".");
  });

  it("replaces its contents", () => {
    const stack = new DirectoryStack(["a", "b"]);
    stack.replace([joinPath("root", "two")]);
    expect(stack.depth).toBe(1);
    expect(stack.pathDepth()).toBe(2);
  });

  it("does not share the array it was built from", () => {
    const segments = ["a"];
    const stack = new DirectoryStack(segments);
    stack.push("b");
    expect(segments).toEqual(["a"]);
  });

  it("counts path segments", () => {
    expect(countSegments("root")).toBe(1);
    expect(countSegments(joinPath("root", "one", "two"))).toBe(3);
    expect(new DirectoryStack().pathDepth()).toBe(0);
  });
});
