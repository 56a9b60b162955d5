/**
 * Value and condition positions
 *
 * Comparisons and `not` produce a C++ `bool`. Conditions use it directly;
 * value positions wrap it back into a `LuaValue`. Any other value is tested
 * with the runtime truthiness predicate (only nil and false are false).
 */

import type { CppFragment } from "../types.js";

export const asValue = (fragment: CppFragment): string =>
  fragment.nativeBool ? `LuaValue(${fragment.text})` : fragment.text;

export const asCondition = (fragment: CppFragment): string =>
  fragment.nativeBool ? fragment.text : `is_lua_truthy(${fragment.text})`;

export const negateCondition = (fragment: CppFragment): string =>
  fragment.nativeBool
    ? `!(${fragment.text})`
    : `!is_lua_truthy(${fragment.text})`;
