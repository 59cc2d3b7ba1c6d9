/**
 * Navigation Stack
 *
 * Pure operations over an immutable view history. The root frame is always the
 * main menu and is never popped. Stacks that arrive empty are normalized to the root.
 */

import { ROOT_VIEW, type NavFrame, type NavStack, type PopResult, type ViewId } from './types.js';

const ROOT_FRAME: NavFrame = { view: ROOT_VIEW };

/**
 * Fresh stack holding only the root frame.
 */
export const createNavStack = (): NavStack => [ROOT_FRAME];

const normalize = (stack: NavStack): NavStack => (stack.length === 0 ? createNavStack() : stack);

/**
 * Current top frame.
 */
export const peekFrame = (stack: NavStack): NavFrame => {
  const normalized = normalize(stack);
  return normalized[normalized.length - 1] ?? ROOT_FRAME;
};

/**
 * Appends a frame unless it duplicates the current top.
 */
export const pushFrame = (stack: NavStack, view: ViewId): NavStack => {
  const normalized = normalize(stack);
  if (peekFrame(normalized).view === view) {
    return normalized;
  }
  return [...normalized, { view }];
};

/**
 * Removes the top frame. The root frame stays.
 */
export const popFrame = (stack: NavStack): PopResult => {
  const normalized = normalize(stack);
  if (normalized.length <= 1) {
    return { stack: normalized, popped: null };
  }
  return {
    stack: normalized.slice(0, -1),
    popped: peekFrame(normalized),
  };
};

/**
 * Rewrites the top frame. When the frame below already shows `view` the top is
 * dropped instead, so the history never holds the same view twice in a row.
 * The root frame is never rewritten; replacing it appends instead.
 */
export const replaceTop = (stack: NavStack, view: ViewId): NavStack => {
  const normalized = normalize(stack);
  if (normalized.length <= 1) {
    return pushFrame(normalized, view);
  }
  const below = normalized.slice(0, -1);
  return peekFrame(below).view === view ? below : [...below, { view }];
};

export const resetStack = (): NavStack => createNavStack();
