/**
 * @tinystd/string-view
 *
 * Non-owning views over terminated code-unit buffers, the owning
 * BasicString they borrow from, and the traits that make both generic over
 * character width.
 */

// Traits
export {
  charTraits,
  char16Traits,
  char32Traits,
  wcharTraits,
  type CharArray,
  type CharPointer,
  type CharTraits,
} from "./char-traits.js";

// Owner and view
export { BasicString } from "./basic-string.js";
export { BasicStringView } from "./string-view.js";
export {
  StringView,
  U16StringView,
  U32StringView,
  WStringView,
  type StringViewFactory,
} from "./factories.js";

// Operators
export {
  equals,
  notEquals,
  lessThan,
  lessThanOrEqual,
  greaterThan,
  greaterThanOrEqual,
  ordStringView,
  swap,
  type Comparand,
} from "./operators.js";

// Literals and output
export { sv, u16sv, u32sv, wsv, type LiteralTag } from "./literals.js";
export { writeView, type CodeUnitSink } from "./stream.js";
