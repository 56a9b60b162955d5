/**
 * Statement hoisting
 *
 * Generated statements are appended to the top frame of the unit's hoisting
 * stack. `captureStatements` pushes a fresh frame for the duration of a
 * callback and hands the captured lines back; the caller decides where they
 * go.
 */

import type { EmitterContext } from "../types.js";
import { getIndent } from "../types.js";
import { internalError } from "./errors.js";

const currentFrame = (context: EmitterContext): string[] => {
  const frame = context.unit.hoist[context.unit.hoist.length - 1];
  if (!frame) {
    throw internalError("hoisting stack is empty", context);
  }
  return frame;
};

/**
 * Append one statement at the context's indentation
 */
export const emitLine = (context: EmitterContext, line: string): void => {
  currentFrame(context).push(getIndent(context) + line);
};

/**
 * Append lines that already carry their indentation
 */
export const emitLines = (
  context: EmitterContext,
  lines: readonly string[]
): void => {
  currentFrame(context).push(...lines);
};

/**
 * Run `emit` with a fresh frame on top of the hoisting stack.
 *
 * The frame is popped even when `emit` throws. A frame other than the one
 * pushed here being on top afterwards is an internal error.
 */
export const captureStatements = <T>(
  context: EmitterContext,
  emit: () => T
): [string[], T] => {
  const stack = context.unit.hoist;
  const frame: string[] = [];
  stack.push(frame);

  const release = (): boolean => stack.pop() === frame;

  let result: T;
  try {
    result = emit();
  } catch (err) {
    release();
    throw err;
  }

  if (!release()) {
    throw internalError("unbalanced hoisting frame", context);
  }
  return [frame, result];
};
