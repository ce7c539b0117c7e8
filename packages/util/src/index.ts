// Cursors
export { Cursor, ReverseCursor, type Source } from "./cursor.js";
export {
  begin,
  end,
  rbegin,
  rend,
  beginEnd,
  rbeginRend,
  toArray,
  type Ranged,
  type ReverseRanged,
} from "./begin-end.js";
export { size, type Sized } from "./size.js";

// Flags
export { Bitmask, bitmask, type Flag } from "./bitmask.js";

// Output
export {
  PrintBytesAsHex,
  printBytesAsHex,
  type ByteSource,
  type HexOptions,
  type TextSink,
} from "./print-bytes-as-hex.js";
export { asprintf, vasprintf, eprintf } from "./format.js";

// Calls
export { forEachArgument, continueWith } from "./functional.js";
export { charToInt } from "./char-to-int.js";
