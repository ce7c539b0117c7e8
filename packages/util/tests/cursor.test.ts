import { describe, it, expect, afterEach } from "vitest";
import { config, PreconditionError } from "@tinystd/core";
import { Cursor, ReverseCursor } from "../src/cursor.js";
import {
  begin,
  beginEnd,
  end,
  rbegin,
  rbeginRend,
  rend,
  toArray,
} from "../src/begin-end.js";
import { size } from "../src/size.js";

describe("Cursor", () => {
  const letters = ["a", "b", "c", "d"];

  it("reads relative to its index", () => {
    const c = new Cursor(letters, 1);
    expect(c.get()).toBe("b");
    expect(c.get(2)).toBe("d");
    expect(c.next().get()).toBe("c");
    expect(c.prev().get()).toBe("a");
  });

  it("measures distance and equality on the same source", () => {
    const first = new Cursor(letters, 0);
    const last = new Cursor(letters, 4);
    expect(first.distance(last)).toBe(4);
    expect(last.distance(first)).toBe(-4);
    expect(first.add(4).equals(last)).toBe(true);
    expect(new Cursor([...letters], 0).equals(first)).toBe(false);
  });

  it("collects a half-open range", () => {
    expect(new Cursor(letters, 1).collectTo(new Cursor(letters, 3))).toEqual(["b", "c"]);
  });

  describe("checked mode", () => {
    afterEach(() => {
      config.reset();
    });

    it("rejects reads outside the source", () => {
      config.set({ checks: { preconditions: true } });
      expect(() => new Cursor(letters, 4).get()).toThrow(PreconditionError);
      expect(() => new Cursor(letters, 0).get(-1)).toThrow(PreconditionError);
    });

    it("rejects distance across sources", () => {
      config.set({ checks: { preconditions: true } });
      expect(() => new Cursor(letters).distance(new Cursor([...letters]))).toThrow(
        PreconditionError
      );
    });
  });
});

describe("ReverseCursor", () => {
  const digits = [1, 2, 3];

  it("reads the element before its base", () => {
    const r = new ReverseCursor(new Cursor(digits, 3));
    expect(r.get()).toBe(3);
    expect(r.next().get()).toBe(2);
    expect(r.get(2)).toBe(1);
    expect(r.base.index).toBe(3);
  });

  it("walks backwards over the whole source", () => {
    const [first, last] = rbeginRend(digits);
    expect(first.distance(last)).toBe(3);
    expect(first.collectTo(last)).toEqual([3, 2, 1]);
    expect(first.add(3).equals(last)).toBe(true);
    expect(last.prev().get()).toBe(1);
  });
});

describe("begin / end", () => {
  it("builds cursors over arrays and strings", () => {
    const xs = [10, 20, 30];
    expect(begin(xs).get()).toBe(10);
    expect(end(xs).index).toBe(3);
    expect(rbegin(xs).get()).toBe(30);
    expect(rend(xs).base.index).toBe(0);
    expect(begin("xyz").get(1)).toBe("y");
  });

  it("pairs begin and end for spreading", () => {
    const countBetween = (first: Cursor<number[]>, last: Cursor<number[]>): number =>
      first.distance(last);
    expect(countBetween(...beginEnd([1, 2, 3, 4]))).toBe(4);
  });

  it("collects cursor ranges in either direction", () => {
    const xs = ["p", "q", "r"];
    expect(toArray(begin(xs).next(), end(xs))).toEqual(["q", "r"]);
    expect(toArray(...rbeginRend(xs))).toEqual(["r", "q", "p"]);
  });

  it("delegates to containers with their own begin and end", () => {
    const container = {
      begin: () => "first",
      end: () => "last",
      rbegin: () => 1,
      rend: () => 2,
    };
    expect(begin(container)).toBe("first");
    expect(end(container)).toBe("last");
    expect(beginEnd(container)).toEqual(["first", "last"]);
    expect(rbegin(container)).toBe(1);
    expect(rend(container)).toBe(2);
    expect(rbeginRend(container)).toEqual([1, 2]);
  });
});

describe("size", () => {
  it("reads size methods, size properties and lengths", () => {
    expect(size({ size: () => 7 })).toBe(7);
    expect(size(new Map([["a", 1]]))).toBe(1);
    expect(size(new Set([1, 2, 3]))).toBe(3);
    expect(size([1, 2])).toBe(2);
    expect(size(new Uint16Array(5))).toBe(5);
    expect(size("hello")).toBe(5);
  });
});
