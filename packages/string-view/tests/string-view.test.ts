import { describe, it, expect, afterEach, vi } from "vitest";
import { config, OutOfRangeError, PreconditionError } from "@tinystd/core";
import { Cursor, beginEnd, size, toArray } from "@tinystd/util";
import {
  BasicString,
  BasicStringView,
  charTraits,
  sv,
  swap,
  StringView,
} from "../src/index.js";

const code = (ch: string): number => ch.charCodeAt(0);

describe("BasicStringView", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    config.reset();
  });

  describe("hello", () => {
    const hello = sv`hello`;

    it("reports size and ends", () => {
      expect(hello.size()).toBe(5);
      expect(hello.length).toBe(5);
      expect(hello.empty()).toBe(false);
      expect(hello.front()).toBe(code("h"));
      expect(hello.back()).toBe(code("o"));
    });

    it("matches its prefix and suffix", () => {
      expect(hello.startsWith(sv`he`)).toBe(true);
      expect(hello.endsWith(sv`lo`)).toBe(true);
      expect(hello.startsWith(sv`lo`)).toBe(false);
      expect(hello.endsWith(sv`he`)).toBe(false);
    });

    it("compares equal to the same content", () => {
      expect(hello.compare(sv`hello`)).toBe(0);
      expect(hello.compare(StringView.from("hello"))).toBe(0);
    });

    it("reads the terminator at size()", () => {
      expect(hello.get(5)).toBe(0);
      expect(hello.at(5)).toBe(0);
    });

    it("decodes to a string", () => {
      expect(hello.toString()).toBe("hello");
      expect(`${hello}`).toBe("hello");
    });
  });

  describe("construction", () => {
    it("defaults to an empty view over the shared empty buffer", () => {
      const view = new BasicStringView(charTraits);
      expect(view.size()).toBe(0);
      expect(view.empty()).toBe(true);
      expect(view.get(0)).toBe(0);
      expect(view.data().source).toBe(charTraits.empty);
      expect(view.toString()).toBe("");
      expect(StringView.empty().data().source).toBe(charTraits.empty);
    });

    it("scans a pointer for its terminator", () => {
      const buffer = new Uint8Array([code("h"), code("i"), 0, code("x"), 0]);
      expect(BasicStringView.fromPointer(charTraits, new Cursor(buffer, 0)).size()).toBe(2);
      expect(StringView.fromPointer(new Cursor(buffer, 3)).toString()).toBe("x");
      expect(StringView.fromPointer(new Cursor(buffer, 2)).empty()).toBe(true);
    });

    it("views a terminated array without scanning", () => {
      const array = new Uint8Array([code("a"), 0, code("b"), 0]);
      const view = StringView.fromArray(array);
      expect(view.size()).toBe(3);
      expect(view.get(1)).toBe(0);
    });

    it("trusts an explicit length", () => {
      const buffer = charTraits.encode("hi");
      const view = StringView.of(new Cursor(buffer, 0), 2);
      expect(view.toString()).toBe("hi");
      expect(view.data().source).toBe(buffer);
    });

    it("borrows an owner at its current size", () => {
      const owner = BasicString.from(charTraits, "owned");
      const view = StringView.borrow(owner);
      expect(view.size()).toBe(5);
      expect(view.data().source).toBe(owner.data().source);
      expect(BasicStringView.borrow(owner).compare(owner)).toBe(0);
    });

    it("never copies the viewed buffer", () => {
      const buffer = charTraits.encode("abc");
      const view = StringView.fromArray(buffer);
      buffer[0] = code("x");
      expect(view.toString()).toBe("xbc");
    });
  });

  describe("bounds", () => {
    it("throws OutOfRangeError past size()", () => {
      const view = sv`abc`;
      expect(() => view.at(4)).toThrow(OutOfRangeError);
      expect(() => view.at(-1)).toThrow(OutOfRangeError);
      expect(() => view.at(7)).toThrow("position 7 is out of range for size 3");
    });

    it("leaves get() unchecked by default", () => {
      const buffer = charTraits.encode("ab");
      const view = StringView.of(new Cursor(buffer, 0), 1);
      expect(view.get(2)).toBe(0);
    });

    it("scans to the end of an unterminated buffer when unchecked", () => {
      const buffer = new Uint8Array([1, 2, 3]);
      expect(StringView.fromPointer(new Cursor(buffer, 0)).size()).toBe(3);
    });

    describe("checked mode", () => {
      it("rejects reads past the terminator", () => {
        config.set({ checks: { preconditions: true } });
        expect(() => sv`abc`.get(4)).toThrow(PreconditionError);
      });

      it("rejects back() on an empty view", () => {
        config.set({ checks: { preconditions: true } });
        expect(() => new BasicStringView(charTraits).back()).toThrow(
          "back() of an empty string view"
        );
      });

      it("rejects an unterminated pointer", () => {
        config.set({ checks: { preconditions: true } });
        expect(() => StringView.fromPointer(new Cursor(new Uint8Array([1, 2]), 0))).toThrow(
          "character sequence has no terminator"
        );
      });

      it("rejects an explicit length that misses the terminator", () => {
        config.set({ checks: { preconditions: true } });
        const buffer = charTraits.encode("abc");
        expect(() => StringView.of(new Cursor(buffer, 0), 2)).toThrow(PreconditionError);
        expect(StringView.of(new Cursor(buffer, 0), 3).size()).toBe(3);
      });

      it("enables through the environment", () => {
        vi.stubEnv("TINYSTD_CHECKS_PRECONDITIONS", "1");
        config.reset();
        expect(() => sv`abc`.get(9)).toThrow(PreconditionError);
      });
    });
  });

  describe("removePrefix", () => {
    it("drops leading code units", () => {
      const view = sv`hello`;
      view.removePrefix(2);
      expect(view.size()).toBe(3);
      expect(view.toString()).toBe("llo");
      expect(view.get(3)).toBe(0);
      expect(view.data().index).toBe(2);
    });

    it("clamps to size()", () => {
      const view = sv`hello`;
      view.removePrefix(10);
      expect(view.empty()).toBe(true);
      expect(view.get(0)).toBe(0);
      expect(view.data().index).toBe(5);
    });

    it("does not affect other views of the same literal", () => {
      const literal = () => sv`shared`;
      const first = literal();
      const second = literal();
      first.removePrefix(3);
      expect(second.toString()).toBe("shared");
      expect(first.data().source).toBe(second.data().source);
    });
  });

  describe("swap and clone", () => {
    it("exchanges two views and leaves a third untouched", () => {
      const a = sv`first`;
      const b = sv`second`;
      const c = a.clone();
      c.removePrefix(1);
      a.swap(b);
      expect(a.toString()).toBe("second");
      expect(b.toString()).toBe("first");
      expect(c.toString()).toBe("irst");
    });

    it("swaps back with the free function", () => {
      const a = sv`x`;
      const b = sv`yz`;
      swap(a, b);
      swap(a, b);
      expect(a.toString()).toBe("x");
      expect(b.size()).toBe(2);
    });

    it("clones as an independent value", () => {
      const original = sv`value`;
      const copy = original.clone();
      copy.removePrefix(2);
      expect(original.size()).toBe(5);
      expect(copy.toString()).toBe("lue");
      expect(copy.data().source).toBe(original.data().source);
    });
  });

  describe("compare", () => {
    it("orders abc before abd", () => {
      expect(sv`abc`.compare(sv`abd`)).toBe(-1);
      expect(sv`abd`.compare(sv`abc`)).toBe(1);
    });

    it("breaks ties on length", () => {
      expect(sv`ab`.compare(sv`abc`)).toBe(-1);
      expect(sv`abc`.compare(sv`ab`)).toBe(1);
      expect(new BasicStringView(charTraits).compare(sv`a`)).toBe(-1);
    });

    it("compares code units as unsigned values", () => {
      expect(sv`z`.compare(sv`é`)).toBe(-1);
    });

    it("is antisymmetric and transitive", () => {
      const words = [sv`pear`, sv`apple`, sv`app`, sv`fig`, sv``];
      for (const a of words) {
        expect(a.compare(a)).toBe(0);
        for (const b of words) {
          expect(a.compare(b)).toBe(-b.compare(a) || 0);
          for (const c of words) {
            if (a.compare(b) <= 0 && b.compare(c) <= 0) {
              expect(a.compare(c)).toBeLessThanOrEqual(0);
            }
          }
        }
      }
    });

    it("accepts a pointer or an owner", () => {
      const hello = sv`hello`;
      expect(hello.compare(new Cursor(charTraits.encode("help"), 0))).toBe(-1);
      expect(hello.compare(BasicString.from(charTraits, "hello"))).toBe(0);
      expect(hello.compare(BasicString.from(charTraits, "hell"))).toBe(1);
    });
  });

  describe("startsWith / endsWith", () => {
    it("matches single code units", () => {
      const view = sv`hello`;
      expect(view.startsWith(code("h"))).toBe(true);
      expect(view.startsWith(code("e"))).toBe(false);
      expect(view.endsWith(code("o"))).toBe(true);
    });

    it("never matches a code unit on an empty view", () => {
      const empty = new BasicStringView(charTraits);
      expect(empty.startsWith(0)).toBe(false);
      expect(empty.endsWith(0)).toBe(false);
    });

    it("rejects a longer prefix or suffix", () => {
      expect(sv`he`.startsWith(sv`hello`)).toBe(false);
      expect(sv`lo`.endsWith(sv`hello`)).toBe(false);
    });

    it("always matches the empty view", () => {
      expect(sv`abc`.startsWith(sv``)).toBe(true);
      expect(sv`abc`.endsWith(sv``)).toBe(true);
      expect(sv``.startsWith(sv``)).toBe(true);
    });

    it("works after removePrefix", () => {
      const view = sv`prefix-body`;
      view.removePrefix(7);
      expect(view.startsWith(sv`bo`)).toBe(true);
      expect(view.endsWith(sv`body`)).toBe(true);
      expect(view.startsWith(sv`prefix`)).toBe(false);
    });
  });

  describe("toOwned", () => {
    it("copies into a new owner that compares equal", () => {
      const view = sv`copy me`;
      const owned = view.toOwned();
      expect(owned.size()).toBe(7);
      expect(owned.view().compare(view)).toBe(0);
      expect(owned.data().source).not.toBe(view.data().source);
      expect(owned.toString()).toBe("copy me");
    });

    it("copies only the viewed window", () => {
      const view = sv`window`;
      view.removePrefix(3);
      expect(view.toOwned().toString()).toBe("dow");
    });
  });

  describe("iteration", () => {
    it("iterates code units forwards and backwards", () => {
      const view = sv`abc`;
      expect([...view]).toEqual([97, 98, 99]);
      expect([...view.reversed()]).toEqual([99, 98, 97]);
    });

    it("exposes begin/end and reverse cursors", () => {
      const view = sv`abc`;
      expect(view.begin().distance(view.end())).toBe(3);
      expect(toArray(view.begin(), view.end())).toEqual([97, 98, 99]);
      expect(toArray(view.rbegin(), view.rend())).toEqual([99, 98, 97]);
      expect(toArray(...beginEnd(view))).toEqual([97, 98, 99]);
      expect(view.rbegin().get()).toBe(99);
    });

    it("iterates nothing for an empty view", () => {
      const empty = StringView.empty();
      expect([...empty]).toEqual([]);
      expect(empty.begin().equals(empty.end())).toBe(true);
    });

    it("reports its size to generic helpers", () => {
      expect(size(sv`four`)).toBe(4);
    });
  });
});
