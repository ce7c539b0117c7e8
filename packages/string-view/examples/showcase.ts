/**
 * @tinystd/string-view Showcase
 *
 * Views, owners and literals side by side. Every line asserts its result, so
 * the file doubles as a smoke test.
 *
 * Run: npx tsx packages/string-view/examples/showcase.ts
 */

import { invariant, sortWith } from "@tinystd/core";
import { beginEnd, toArray } from "@tinystd/util";
import {
  BasicString,
  charTraits,
  lessThan,
  ordStringView,
  StringView,
  sv,
  u16sv,
  wsv,
  writeView,
} from "../src/index.js";

// ============================================================================
// 1. LITERALS - views over interned, terminated buffers
// ============================================================================

const greeting = sv`hello`;
invariant(greeting.size() === 5);
invariant(greeting.get(greeting.size()) === 0, "the terminator follows the content");
invariant(greeting.startsWith(sv`he`) && greeting.endsWith(sv`lo`));

// ============================================================================
// 2. BORROWING - a view of an owner sees it as it was when borrowed
// ============================================================================

const owner = BasicString.from(charTraits, "config");
const borrowed = StringView.borrow(owner);
owner.append(".json");
invariant(borrowed.toString() === "config");
invariant(owner.view().toString() === "config.json");

// ============================================================================
// 3. SLICING - removePrefix moves the start, never the buffer
// ============================================================================

const path = sv`/usr/local`;
path.removePrefix(5);
invariant(path.toString() === "local");
invariant(toArray(...beginEnd(path)).length === 5);

// ============================================================================
// 4. ORDERING - free operators and the Ord instance agree
// ============================================================================

invariant(lessThan(sv`abc`, sv`abd`));
const sorted = sortWith(ordStringView<Uint8Array>(), [sv`pear`, sv`fig`, sv`apple`]);
invariant(sorted.map(String).join(",") === "apple,fig,pear");

// ============================================================================
// 5. WIDTHS - the same text in different code units
// ============================================================================

invariant(u16sv`😀`.size() === 2);
invariant(wsv`😀`.size() === 1);

// ============================================================================
// 6. OUTPUT - write the viewed bytes to a stream
// ============================================================================

writeView(process.stdout, sv`done\n`);
